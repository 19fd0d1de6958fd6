/**
 * Roaming Agent
 *
 * LLM tool-calling conversation loop over a stdio tool server, plus the
 * roaming tool server it is usually paired with.
 */

// Types
export * from './types/index.js';

// Conversation loop
export { AgentLoop, DEFAULT_INFERENCE_CONFIG, DEFAULT_MAX_TURNS, MAX_TURNS_NOTICE } from './agent/agent-loop.js';
export type { AgentLoopConfig } from './agent/agent-loop.js';
export { TurnExecutor, TERMINAL_NOTICES, TOOL_USE_NOTICE } from './agent/turn-executor.js';
export type { TurnOutcome } from './agent/turn-executor.js';
export { ToolInvocationBridge } from './agent/tool-bridge.js';
export type { ToolOutcome } from './agent/tool-bridge.js';
export { listToolSpecs, toConverseTools } from './agent/tool-catalog.js';
export {
  Conversation,
  assistantMessage,
  isTextBlock,
  isToolResultBlock,
  isToolUseBlock,
  toolRequestMessage,
  toolResultContentFromSession,
  toolResultMessage,
  userMessage,
} from './agent/messages.js';
export { QueryMetricsRecorder, formatTimingSummary } from './agent/query-metrics.js';
export type { Clock } from './agent/query-metrics.js';
export * from './agent/errors.js';

// Providers
export type { LLMProvider } from './agent/llm-provider.js';
export { mergeConsecutiveRoles } from './agent/llm-provider.js';
export * from './agent/providers/index.js';

// Tool protocol
export { JsonRpcStdioClient } from './mcp/stdio-client.js';
export type { JsonRpcStdioClientOptions } from './mcp/stdio-client.js';
export { StdioToolSession, resolveServerCommand } from './mcp/tool-session.js';
export type { ServerInfo, StdioToolSessionOptions, ToolSession } from './mcp/tool-session.js';
export { ToolRegistry, errorResult, textResult } from './mcp/tool-registry.js';
export type { ToolDefinition, ToolDescriptor } from './mcp/tool-registry.js';
export { ToolServer } from './mcp/tool-server.js';
export type { ToolServerInfo } from './mcp/tool-server.js';

// Roaming tools
export { RoamingApiClient, RoamingApiError } from './roaming/roaming-api.js';
export type { RoamingPlan, RoamingUsage, SubscriptionRequest, SubscriptionResult } from './roaming/roaming-api.js';
export { formatRecommendation, selectBestPlans } from './roaming/plan-selection.js';
export type { RankedPlan } from './roaming/plan-selection.js';
export { roamingTools } from './roaming/roaming-tools.js';
export type { RoamingToolContext } from './roaming/roaming-tools.js';

// Configuration and logging
export { DEFAULT_SYSTEM_PROMPT, getConfig, loadConfig, resetConfig, validateConfig } from './config/index.js';
export type { ProviderType, RoamingAgentConfig } from './config/index.js';
export { makeLogger, makeNoopLogger } from './logging/logger.js';
export type { LogLevel, Logger } from './logging/logger.js';
