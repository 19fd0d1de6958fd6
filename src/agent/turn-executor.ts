/**
 * Turn Executor
 *
 * Processes one model response: dispatches tool calls and thinking text for a
 * tool-use response, or recognises a terminal stop reason.
 */

import type { ConverseResponse, StopReason } from '../types/agent-types.js';
import type { Conversation } from './messages.js';
import { assistantMessage, isTextBlock, isToolUseBlock } from './messages.js';
import type { QueryMetricsRecorder } from './query-metrics.js';
import type { ToolInvocationBridge } from './tool-bridge.js';

export const TOOL_USE_NOTICE = 'received toolUse request';

export const TERMINAL_NOTICES: Record<Exclude<StopReason, 'toolUse' | 'endTurn'>, string> = {
  maxTokens: '[Max tokens reached, ending conversation.]',
  stopSequence: '[Stop sequence reached, ending conversation.]',
  contentFiltered: '[Content filtered, ending conversation.]',
};

export type TurnOutcome =
  | { state: 'toolDispatch'; lines: string[]; toolCalls: number }
  | { state: 'terminal'; lines: string[]; stopReason: StopReason };

export class TurnExecutor {
  constructor(private readonly bridge: ToolInvocationBridge) {}

  async execute(
    response: ConverseResponse,
    conversation: Conversation,
    metrics: QueryMetricsRecorder,
  ): Promise<TurnOutcome> {
    const { stopReason } = response;

    switch (stopReason) {
      case 'toolUse': {
        const lines = [TOOL_USE_NOTICE];
        let toolCalls = 0;

        // Blocks are handled strictly in the order the backend returned them
        for (const block of response.message.content) {
          if (isTextBlock(block)) {
            lines.push(`[Thinking: ${block.text}]`);
            conversation.append(assistantMessage(block.text));
          } else if (isToolUseBlock(block)) {
            const outcome = await this.bridge.invoke(block.toolUse, conversation);
            metrics.recordToolCall(outcome.record);
            lines.push(outcome.summary);
            toolCalls++;
          }
        }
        return { state: 'toolDispatch', lines, toolCalls };
      }

      case 'endTurn': {
        const texts = response.message.content.filter(isTextBlock);
        const finalText = texts[texts.length - 1];
        return { state: 'terminal', lines: finalText ? [finalText.text] : [], stopReason };
      }

      case 'maxTokens':
      case 'stopSequence':
      case 'contentFiltered':
        return { state: 'terminal', lines: [TERMINAL_NOTICES[stopReason]], stopReason };
    }
  }
}
