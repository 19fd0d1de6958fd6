/**
 * Agent Core Types
 *
 * Provider-neutral conversation, tool and loop types shared by the
 * conversation loop, the LLM providers and the tool session client.
 */

// ============================================================================
// Conversation Types
// ============================================================================

export type Role = 'user' | 'assistant';

/**
 * A tool invocation requested by the model.
 */
export interface ToolUseBlock {
  readonly toolUseId: string;
  readonly name: string;
  readonly input: Readonly<Record<string, unknown>>;
}

export type ToolResultContent =
  | { readonly json: Readonly<Record<string, unknown>> }
  | { readonly text: string };

/**
 * Outcome of a tool invocation, paired with its ToolUseBlock by `toolUseId`.
 */
export interface ToolResultBlock {
  readonly toolUseId: string;
  readonly content: readonly ToolResultContent[];
}

export type ContentBlock =
  | { readonly text: string }
  | { readonly toolUse: ToolUseBlock }
  | { readonly toolResult: ToolResultBlock };

export interface Message {
  readonly role: Role;
  readonly content: readonly ContentBlock[];
}

// ============================================================================
// Tool Types
// ============================================================================

/**
 * Tool input schema in JSON Schema format.
 */
export interface ToolInputSchema {
  type: 'object';
  properties: Record<string, unknown>;
  required: string[];
}

/**
 * A callable tool as advertised by the tool session.
 */
export interface ToolSpec {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
}

/**
 * A single content item returned by a tool session call.
 */
export interface ToolCallContent {
  type: string;
  text?: string;
  [key: string]: unknown;
}

export interface ToolCallResult {
  content: ToolCallContent[];
  isError?: boolean;
}

// ============================================================================
// LLM Types
// ============================================================================

export type StopReason = 'toolUse' | 'maxTokens' | 'stopSequence' | 'contentFiltered' | 'endTurn';

export interface InferenceConfig {
  maxTokens: number;
  temperature: number;
  topP: number;
}

export interface ConverseRequest {
  systemPrompt: string;
  messages: readonly Message[];
  inferenceConfig: InferenceConfig;
  toolConfig: { tools: readonly ToolSpec[] };
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface ConverseResponse {
  stopReason: StopReason;
  /** The assistant message the model produced */
  message: Message;
  usage: TokenUsage;
}

// ============================================================================
// Agent Loop Types
// ============================================================================

export type LoopState = 'thinking' | 'toolDispatch' | 'terminal';

/**
 * Timing record for one tool invocation.
 */
export interface ToolCallRecord {
  name: string;
  args: Readonly<Record<string, unknown>>;
  durationMs: number;
}

/**
 * Per-query timing and usage figures, returned alongside the transcript.
 */
export interface QueryMetrics {
  queryStartedAt: Date;
  toolListingMs: number;
  llmRequestsMs: number[];
  toolCalls: ToolCallRecord[];
  usage: TokenUsage;
  totalMs: number;
}

/**
 * Result of running the conversation loop for one query
 */
export interface AgentLoopResult {
  transcript: string;
  metrics: QueryMetrics;
  /** LLM responses processed */
  turns: number;
  llmCalls: number;
  finalState: LoopState;
}
