/**
 * Roaming Agent Configuration
 *
 * Centralized configuration loading from environment variables.
 * Entry points load `.env` through `dotenv/config` before calling this.
 */

import type { LogLevel } from '../logging/logger.js';

export type ProviderType = 'bedrock' | 'anthropic';

export const DEFAULT_SYSTEM_PROMPT =
  "As an agent in charge of roaming-related work for the telecommunications company, you will be responsible for handling customers' roaming-related requests";

/**
 * Environment configuration interface
 */
export interface RoamingAgentConfig {
  // LLM
  provider?: ProviderType;
  model?: string;
  awsRegion: string;
  bedrockApiKey?: string;
  anthropicApiKey?: string;
  systemPrompt: string;
  maxTokens: number;
  temperature: number;
  topP: number;

  // Conversation loop
  maxTurns: number;

  // Tool session
  toolTimeoutMs: number;

  // Roaming tool server
  roamingApiBaseUrl: string;

  logLevel: LogLevel;
}

/**
 * Parse an integer from environment variable
 */
function parseInt(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value === '') return defaultValue;
  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Parse a float from environment variable
 */
function parseFloat(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value === '') return defaultValue;
  const parsed = Number.parseFloat(value);
  return Number.isNaN(parsed) ? defaultValue : parsed;
}

function parseProvider(value: string | undefined): ProviderType | undefined {
  if (value === 'bedrock' || value === 'anthropic') return value;
  return undefined;
}

function parseLogLevel(value: string | undefined): LogLevel {
  if (value === 'debug' || value === 'info' || value === 'warn' || value === 'error') return value;
  return 'info';
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): RoamingAgentConfig {
  return {
    // LLM
    provider: parseProvider(env.ROAMING_AGENT_LLM_PROVIDER),
    model: env.ROAMING_AGENT_MODEL || undefined,
    awsRegion: env.AWS_REGION ?? 'us-west-2',
    bedrockApiKey: env.AWS_BEARER_TOKEN_BEDROCK || undefined,
    anthropicApiKey: env.ANTHROPIC_API_KEY || undefined,
    systemPrompt: env.ROAMING_AGENT_SYSTEM_PROMPT || DEFAULT_SYSTEM_PROMPT,
    maxTokens: parseInt(env.ROAMING_AGENT_MAX_TOKENS, 2048),
    temperature: parseFloat(env.ROAMING_AGENT_TEMPERATURE, 0),
    topP: parseFloat(env.ROAMING_AGENT_TOP_P, 1),

    // Conversation loop
    maxTurns: parseInt(env.ROAMING_AGENT_MAX_TURNS, 10),

    // Tool session
    toolTimeoutMs: parseInt(env.ROAMING_AGENT_TOOL_TIMEOUT_MS, 60000),

    // Roaming tool server
    roamingApiBaseUrl: env.ROAMING_API_BASE_URL ?? 'http://localhost:8000',

    logLevel: parseLogLevel(env.LOG_LEVEL),
  };
}

/**
 * Cached configuration instance
 */
let cachedConfig: RoamingAgentConfig | null = null;

/**
 * Get configuration (loads once and caches)
 */
export function getConfig(): RoamingAgentConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}

/**
 * Reset cached configuration (useful for testing)
 */
export function resetConfig(): void {
  cachedConfig = null;
}

/**
 * Validate configuration values
 */
export function validateConfig(config: RoamingAgentConfig): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (config.maxTurns < 1) {
    errors.push('ROAMING_AGENT_MAX_TURNS must be at least 1');
  }
  if (config.maxTokens < 1) {
    errors.push('ROAMING_AGENT_MAX_TOKENS must be at least 1');
  }
  if (config.temperature < 0 || config.temperature > 1) {
    errors.push('ROAMING_AGENT_TEMPERATURE must be between 0 and 1');
  }
  if (config.topP < 0 || config.topP > 1) {
    errors.push('ROAMING_AGENT_TOP_P must be between 0 and 1');
  }
  if (config.toolTimeoutMs < 1) {
    errors.push('ROAMING_AGENT_TOOL_TIMEOUT_MS must be positive');
  }
  if (config.provider === 'bedrock' && !config.bedrockApiKey) {
    errors.push('AWS_BEARER_TOKEN_BEDROCK is required for the bedrock provider');
  }
  if (config.provider === 'anthropic' && !config.anthropicApiKey) {
    errors.push('ANTHROPIC_API_KEY is required for the anthropic provider');
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}
