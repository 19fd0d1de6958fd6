/**
 * Message Model
 *
 * Constructors for the four message shapes the conversation carries, and the
 * append-only Conversation that accumulates them for one query.
 */

import type {
  ContentBlock,
  Message,
  ToolCallContent,
  ToolResultContent,
  ToolUseBlock,
} from '../types/agent-types.js';
import { MalformedToolResultError } from './errors.js';

// ============================================================================
// Constructors
// ============================================================================

function freezeContent(content: ToolResultContent): ToolResultContent {
  if ('json' in content) return Object.freeze({ json: Object.freeze({ ...content.json }) });
  return Object.freeze({ text: content.text });
}

function freezeBlock(block: ContentBlock): ContentBlock {
  if ('toolUse' in block) {
    const { toolUseId, name, input } = block.toolUse;
    // input is copied: the provider response that produced it stays the caller's
    return Object.freeze({ toolUse: Object.freeze({ toolUseId, name, input: Object.freeze({ ...input }) }) });
  }
  if ('toolResult' in block) {
    const { toolUseId, content } = block.toolResult;
    return Object.freeze({ toolResult: Object.freeze({ toolUseId, content: Object.freeze(content.map(freezeContent)) }) });
  }
  return Object.freeze({ text: block.text });
}

function freezeMessage(role: Message['role'], content: ContentBlock[]): Message {
  return Object.freeze({ role, content: Object.freeze(content.map(freezeBlock)) });
}

export function userMessage(text: string): Message {
  return freezeMessage('user', [{ text }]);
}

export function assistantMessage(text: string): Message {
  return freezeMessage('assistant', [{ text }]);
}

/**
 * Echo of a model-issued tool call, kept in the conversation so the backend
 * can pair it with the result that follows.
 */
export function toolRequestMessage(toolUse: ToolUseBlock): Message {
  return freezeMessage('assistant', [{ toolUse }]);
}

export function toolResultMessage(toolUseId: string, content: readonly ToolResultContent[]): Message {
  if (content.length === 0) {
    throw new MalformedToolResultError(`Tool result for ${toolUseId} has no content`, toolUseId);
  }
  return freezeMessage('user', [{ toolResult: { toolUseId, content } }]);
}

/**
 * Convert tool session content items into tool-result content.
 * Text items are wrapped as `{ json: { text } }`; other items are passed as JSON.
 */
export function toolResultContentFromSession(items: readonly ToolCallContent[]): ToolResultContent[] {
  return items.map((item) => {
    if (item.type === 'text' && typeof item.text === 'string') {
      return { json: { text: item.text } };
    }
    return { json: { ...item } };
  });
}

// ============================================================================
// Block helpers
// ============================================================================

export function isTextBlock(block: ContentBlock): block is { readonly text: string } {
  return 'text' in block;
}

export function isToolUseBlock(block: ContentBlock): block is { readonly toolUse: ToolUseBlock } {
  return 'toolUse' in block;
}

export function isToolResultBlock(
  block: ContentBlock,
): block is Extract<ContentBlock, { readonly toolResult: unknown }> {
  return 'toolResult' in block;
}

// ============================================================================
// Conversation
// ============================================================================

/**
 * Ordered, append-only sequence of messages for a single query.
 */
export class Conversation {
  private readonly messages: Message[] = [];

  constructor(initial: readonly Message[] = []) {
    this.messages.push(...initial);
  }

  /** Append one or more messages as a single step. */
  append(...messages: Message[]): void {
    this.messages.push(...messages);
  }

  get length(): number {
    return this.messages.length;
  }

  snapshot(): readonly Message[] {
    return Object.freeze([...this.messages]);
  }

  /**
   * Tool-use ids that have not yet been answered by a tool result.
   * Must be empty whenever the conversation is sent to the model.
   */
  unansweredToolUseIds(): string[] {
    const pending = new Set<string>();
    for (const message of this.messages) {
      for (const block of message.content) {
        if (isToolUseBlock(block)) {
          pending.add(block.toolUse.toolUseId);
        } else if (isToolResultBlock(block)) {
          pending.delete(block.toolResult.toolUseId);
        }
      }
    }
    return [...pending];
  }
}
