export { AnthropicProvider, DEFAULT_ANTHROPIC_MODEL } from './anthropic-provider.js';
export type { AnthropicMessagesClient, AnthropicProviderConfig } from './anthropic-provider.js';
export { BedrockProvider, DEFAULT_BEDROCK_MODEL, DEFAULT_BEDROCK_REGION, toConverseRequestBody } from './bedrock-provider.js';
export type { BedrockProviderConfig } from './bedrock-provider.js';
export { createProvider, detectProviderType } from './provider-factory.js';
export type { ProviderConfig } from './provider-factory.js';
