/**
 * Tool Invocation Bridge
 *
 * Executes one model-requested tool call against the tool session and folds
 * the request/result pair into the conversation.
 */

import type { Logger } from 'pino';
import type { ToolSession } from '../mcp/tool-session.js';
import type { ToolCallRecord, ToolCallResult, ToolUseBlock } from '../types/agent-types.js';
import { ToolInvocationError, ToolSessionClosedError, errorMessage } from './errors.js';
import type { Conversation } from './messages.js';
import { toolRequestMessage, toolResultContentFromSession, toolResultMessage } from './messages.js';
import type { Clock } from './query-metrics.js';

export interface ToolOutcome {
  /** Transcript line describing the call */
  summary: string;
  record: ToolCallRecord;
}

export class ToolInvocationBridge {
  constructor(
    private readonly session: ToolSession,
    private readonly logger: Logger,
    private readonly clock: Clock = () => performance.now(),
  ) {}

  async invoke(toolUse: ToolUseBlock, conversation: Conversation): Promise<ToolOutcome> {
    const { name, input, toolUseId } = toolUse;
    const start = this.clock();

    this.logger.info({ tool: name, toolUseId }, 'Executing tool');

    let result: ToolCallResult;
    try {
      result = await this.session.callTool(name, input);
    } catch (err) {
      this.logger.warn({ tool: name, err: errorMessage(err) }, 'Tool call failed');
      // A dead session fails every later query too, so it is not folded into a per-call error
      if (err instanceof ToolSessionClosedError) throw err;
      throw new ToolInvocationError(`Tool ${name} failed: ${errorMessage(err)}`, name, input, err);
    }

    if (result.isError) {
      const detail = result.content.map((c) => c.text ?? JSON.stringify(c)).join(' ');
      this.logger.warn({ tool: name, detail: detail.slice(0, 300) }, 'Tool reported an error');
      throw new ToolInvocationError(`Tool ${name} reported an error: ${detail}`, name, input);
    }

    // Build both messages before appending so a malformed result leaves the conversation untouched
    const request = toolRequestMessage(toolUse);
    const response = toolResultMessage(toolUseId, toolResultContentFromSession(result.content));
    conversation.append(request, response);

    const durationMs = this.clock() - start;
    this.logger.info({ tool: name, durationMs }, 'Tool completed');

    return {
      summary: `[Calling tool ${name} with args ${JSON.stringify(input)}]`,
      record: { name, args: input, durationMs },
    };
  }
}
