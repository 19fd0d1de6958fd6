/**
 * LLM Provider Interface
 *
 * Provider-neutral abstraction for one model round trip. Each provider
 * converts the conversation to its wire format at the boundary and maps its
 * stop reasons onto StopReason.
 */

import type { ContentBlock, ConverseRequest, ConverseResponse, Message, Role } from '../types/agent-types.js';

export interface LLMProvider {
  readonly name: string;
  converse(request: ConverseRequest): Promise<ConverseResponse>;
}

/**
 * Merge consecutive same-role messages. Backends require alternating
 * user/assistant turns; the conversation itself keeps one message per step.
 */
export function mergeConsecutiveRoles(messages: readonly Message[]): { role: Role; content: ContentBlock[] }[] {
  const merged: { role: Role; content: ContentBlock[] }[] = [];
  for (const message of messages) {
    const last = merged[merged.length - 1];
    if (last && last.role === message.role) {
      last.content.push(...message.content);
    } else {
      merged.push({ role: message.role, content: [...message.content] });
    }
  }
  return merged;
}
