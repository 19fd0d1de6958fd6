import { describe, it, expect } from 'vitest';
import { ConfigError } from '../errors.js';
import { AnthropicProvider } from './anthropic-provider.js';
import { BedrockProvider } from './bedrock-provider.js';
import { createProvider, detectProviderType } from './provider-factory.js';

const base = { awsRegion: 'us-west-2' };

describe('detectProviderType', () => {
  it('prefers Bedrock when its key is set', () => {
    expect(detectProviderType({ ...base, bedrockApiKey: 'test-secret', anthropicApiKey: 'test-secret' })).toBe('bedrock');
  });

  it('falls back to Anthropic when only its key is set', () => {
    expect(detectProviderType({ ...base, anthropicApiKey: 'test-secret' })).toBe('anthropic');
  });

  it('defaults to Bedrock', () => {
    expect(detectProviderType(base)).toBe('bedrock');
  });
});

describe('createProvider', () => {
  it('creates the explicitly configured provider', () => {
    const provider = createProvider({
      ...base,
      provider: 'anthropic',
      bedrockApiKey: 'test-secret',
      anthropicApiKey: 'test-secret',
    });

    expect(provider).toBeInstanceOf(AnthropicProvider);
    expect(provider.name).toBe('anthropic');
  });

  it('creates Bedrock from detected credentials', () => {
    expect(createProvider({ ...base, bedrockApiKey: 'test-secret' })).toBeInstanceOf(BedrockProvider);
  });

  it('fails when the chosen provider has no key', () => {
    expect(() => createProvider({ ...base, provider: 'anthropic' })).toThrow(ConfigError);
    expect(() => createProvider(base)).toThrow(/AWS_BEARER_TOKEN_BEDROCK not set/);
  });
});
