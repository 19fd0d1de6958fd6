/**
 * Provider Factory
 *
 * Creates the LLM provider named in the configuration, or auto-detects one
 * from the credentials that are present.
 */

import type { ProviderType, RoamingAgentConfig } from '../../config/index.js';
import { ConfigError } from '../errors.js';
import type { LLMProvider } from '../llm-provider.js';
import { AnthropicProvider } from './anthropic-provider.js';
import { BedrockProvider } from './bedrock-provider.js';

export type ProviderConfig = Pick<
  RoamingAgentConfig,
  'provider' | 'model' | 'awsRegion' | 'bedrockApiKey' | 'anthropicApiKey'
>;

/**
 * Create an LLM provider, auto-detecting the type if none is configured.
 *
 * Detection order:
 * 1. `provider` explicit → use that
 * 2. Bedrock API key set → 'bedrock'
 * 3. Anthropic API key set → 'anthropic'
 * 4. Default → 'bedrock'
 */
export function createProvider(config: ProviderConfig): LLMProvider {
  const type = config.provider ?? detectProviderType(config);

  switch (type) {
    case 'bedrock': {
      if (!config.bedrockApiKey) {
        throw new ConfigError(
          'AWS_BEARER_TOKEN_BEDROCK not set. Set the environment variable or choose another provider.'
        );
      }
      return new BedrockProvider({ apiKey: config.bedrockApiKey, model: config.model, region: config.awsRegion });
    }

    case 'anthropic': {
      if (!config.anthropicApiKey) {
        throw new ConfigError(
          'ANTHROPIC_API_KEY not set. Set the environment variable or choose another provider.'
        );
      }
      return new AnthropicProvider({ apiKey: config.anthropicApiKey, model: config.model });
    }
  }
}

export function detectProviderType(config: ProviderConfig): ProviderType {
  if (config.bedrockApiKey) return 'bedrock';
  if (config.anthropicApiKey) return 'anthropic';
  return 'bedrock';
}
