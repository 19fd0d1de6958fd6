import { describe, it, expect } from 'vitest';
import { MalformedToolResultError } from './errors.js';
import {
  Conversation,
  assistantMessage,
  toolRequestMessage,
  toolResultContentFromSession,
  toolResultMessage,
  userMessage,
} from './messages.js';
import { mergeConsecutiveRoles } from './llm-provider.js';

describe('message constructors', () => {
  it('builds a user message', () => {
    expect(userMessage('hi')).toEqual({ role: 'user', content: [{ text: 'hi' }] });
  });

  it('builds an assistant message', () => {
    expect(assistantMessage('thinking')).toEqual({ role: 'assistant', content: [{ text: 'thinking' }] });
  });

  it('builds a tool request as an assistant message', () => {
    const message = toolRequestMessage({ toolUseId: 't1', name: 'get_roaming_usage', input: { phone_number: '010' } });

    expect(message).toEqual({
      role: 'assistant',
      content: [{ toolUse: { toolUseId: 't1', name: 'get_roaming_usage', input: { phone_number: '010' } } }],
    });
  });

  it('builds a tool result as a user message', () => {
    const message = toolResultMessage('t1', [{ json: { text: 'ok' } }]);

    expect(message).toEqual({
      role: 'user',
      content: [{ toolResult: { toolUseId: 't1', content: [{ json: { text: 'ok' } }] } }],
    });
  });

  it('rejects a tool result without content', () => {
    expect(() => toolResultMessage('t1', [])).toThrow(MalformedToolResultError);
  });

  it('freezes messages', () => {
    const message = userMessage('hi');

    expect(Object.isFrozen(message)).toBe(true);
    expect(Object.isFrozen(message.content)).toBe(true);
  });

  it('freezes blocks and keeps tool input apart from the model response', () => {
    const input = { country: 'Japan' };
    const request = toolRequestMessage({ toolUseId: 't1', name: 'list_roaming_plans', input });
    const result = toolResultMessage('t1', [{ json: { text: 'ok' } }]);

    const [requestBlock] = request.content;
    const [resultBlock] = result.content;
    if (!requestBlock || !('toolUse' in requestBlock) || !resultBlock || !('toolResult' in resultBlock)) {
      throw new Error('unexpected block shape');
    }
    expect(Object.isFrozen(requestBlock)).toBe(true);
    expect(Object.isFrozen(requestBlock.toolUse)).toBe(true);
    expect(Object.isFrozen(requestBlock.toolUse.input)).toBe(true);
    expect(Object.isFrozen(resultBlock.toolResult.content[0])).toBe(true);

    input.country = 'France';
    expect(requestBlock.toolUse.input).toEqual({ country: 'Japan' });
    expect(Object.isFrozen(input)).toBe(false);
  });
});

describe('toolResultContentFromSession', () => {
  it('wraps text items as json text', () => {
    expect(toolResultContentFromSession([{ type: 'text', text: 'hello' }])).toEqual([{ json: { text: 'hello' } }]);
  });

  it('passes other items through as json', () => {
    expect(toolResultContentFromSession([{ type: 'image', data: 'abc' }])).toEqual([
      { json: { type: 'image', data: 'abc' } },
    ]);
  });
});

describe('Conversation', () => {
  it('appends messages in order', () => {
    const conversation = new Conversation([userMessage('q')]);

    conversation.append(assistantMessage('a'), assistantMessage('b'));

    expect(conversation.length).toBe(3);
    expect(conversation.snapshot().map((m) => m.content)).toEqual([[{ text: 'q' }], [{ text: 'a' }], [{ text: 'b' }]]);
  });

  it('returns snapshots that later appends do not change', () => {
    const conversation = new Conversation([userMessage('q')]);
    const before = conversation.snapshot();

    conversation.append(assistantMessage('a'));

    expect(before).toHaveLength(1);
  });

  it('tracks tool uses until they are answered', () => {
    const conversation = new Conversation([userMessage('q')]);
    conversation.append(toolRequestMessage({ toolUseId: 't1', name: 'a', input: {} }));

    expect(conversation.unansweredToolUseIds()).toEqual(['t1']);

    conversation.append(toolResultMessage('t1', [{ text: 'done' }]));

    expect(conversation.unansweredToolUseIds()).toEqual([]);
  });
});

describe('mergeConsecutiveRoles', () => {
  it('merges adjacent messages with the same role', () => {
    const merged = mergeConsecutiveRoles([
      userMessage('q'),
      assistantMessage('thinking'),
      toolRequestMessage({ toolUseId: 't1', name: 'a', input: {} }),
      toolResultMessage('t1', [{ text: 'r' }]),
    ]);

    expect(merged).toEqual([
      { role: 'user', content: [{ text: 'q' }] },
      { role: 'assistant', content: [{ text: 'thinking' }, { toolUse: { toolUseId: 't1', name: 'a', input: {} } }] },
      { role: 'user', content: [{ toolResult: { toolUseId: 't1', content: [{ text: 'r' }] } }] },
    ]);
  });

  it('leaves the source messages untouched', () => {
    const first = assistantMessage('a');

    mergeConsecutiveRoles([first, assistantMessage('b')]);

    expect(first.content).toEqual([{ text: 'a' }]);
  });
});
