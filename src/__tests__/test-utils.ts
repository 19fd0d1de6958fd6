/**
 * Test Utilities
 *
 * In-process stand-ins for the LLM provider and the tool session, plus
 * builders for model responses.
 */

import { PassThrough } from 'stream';
import { ToolSessionClosedError } from '../agent/errors.js';
import type { LLMProvider } from '../agent/llm-provider.js';
import type { Clock } from '../agent/query-metrics.js';
import type { RawToolDefinition } from '../mcp/json-rpc.js';
import { makeNoopLogger } from '../logging/logger.js';
import { JsonRpcStdioClient } from '../mcp/stdio-client.js';
import type { ToolSession } from '../mcp/tool-session.js';
import { StdioToolSession } from '../mcp/tool-session.js';
import type {
  ContentBlock,
  ConverseRequest,
  ConverseResponse,
  StopReason,
  ToolCallResult,
} from '../types/agent-types.js';

// ============================================================================
// Response builders
// ============================================================================

export function response(stopReason: StopReason, content: ContentBlock[]): ConverseResponse {
  return {
    stopReason,
    message: { role: 'assistant', content },
    usage: { inputTokens: 10, outputTokens: 5 },
  };
}

export function textResponse(text: string, stopReason: StopReason = 'endTurn'): ConverseResponse {
  return response(stopReason, [{ text }]);
}

export function toolUse(toolUseId: string, name: string, input: Record<string, unknown> = {}): ContentBlock {
  return { toolUse: { toolUseId, name, input } };
}

// ============================================================================
// Scripted provider
// ============================================================================

/**
 * Replays a fixed list of responses and records every request it receives.
 */
export class ScriptedProvider implements LLMProvider {
  readonly name = 'scripted';
  readonly requests: ConverseRequest[] = [];
  private readonly script: ConverseResponse[];
  private readonly next: ((call: number) => ConverseResponse) | undefined;

  constructor(script: ConverseResponse[] | ((call: number) => ConverseResponse)) {
    this.script = Array.isArray(script) ? [...script] : [];
    this.next = Array.isArray(script) ? undefined : script;
  }

  async converse(request: ConverseRequest): Promise<ConverseResponse> {
    this.requests.push(request);
    if (this.next) {
      return this.next(this.requests.length);
    }
    const reply = this.script.shift();
    if (!reply) {
      throw new Error(`No scripted response for call ${this.requests.length}`);
    }
    return reply;
  }
}

// ============================================================================
// Fake tool session
// ============================================================================

export type ToolHandler = (args: Readonly<Record<string, unknown>>) => ToolCallResult | Promise<ToolCallResult>;

export class FakeToolSession implements ToolSession {
  readonly calls: { name: string; args: Readonly<Record<string, unknown>> }[] = [];
  listCount = 0;
  closed = false;

  constructor(
    private tools: RawToolDefinition[] = [],
    private readonly handlers: Record<string, ToolHandler> = {},
  ) {}

  setTools(tools: RawToolDefinition[]): void {
    this.tools = tools;
  }

  async listTools(): Promise<RawToolDefinition[]> {
    this.listCount++;
    return this.tools;
  }

  async callTool(name: string, args: Readonly<Record<string, unknown>>): Promise<ToolCallResult> {
    this.calls.push({ name, args });
    const handler = this.handlers[name];
    if (!handler) {
      throw new Error(`Unknown tool: ${name}`);
    }
    return handler(args);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export function toolDefinition(name: string, description = `${name} tool`): RawToolDefinition {
  return {
    name,
    description,
    inputSchema: { type: 'object', properties: { q: { type: 'string' } }, required: ['q'] },
  };
}

export function textContent(text: string): ToolCallResult {
  return { content: [{ type: 'text', text }] };
}

/**
 * Clock that advances by `stepMs` every time it is read.
 */
export function steppingClock(stepMs: number): Clock {
  let now = 0;
  return () => {
    const current = now;
    now += stepMs;
    return current;
  };
}

/**
 * A stdio session whose server has already gone away.
 */
export function closedStdioSession(reason = 'Tool server exited (code 1)'): StdioToolSession {
  const client = new JsonRpcStdioClient(new PassThrough(), new PassThrough(), { logger: makeNoopLogger() });
  client.close(new ToolSessionClosedError(reason));
  return new StdioToolSession(client);
}
