import { describe, it, expect } from 'vitest';
import { FakeToolSession, response, textContent, textResponse, toolUse } from '../__tests__/test-utils.js';
import { makeNoopLogger } from '../logging/logger.js';
import { Conversation, userMessage } from './messages.js';
import { QueryMetricsRecorder } from './query-metrics.js';
import { ToolInvocationBridge } from './tool-bridge.js';
import { TOOL_USE_NOTICE, TurnExecutor } from './turn-executor.js';

function setup(session = new FakeToolSession()) {
  const executor = new TurnExecutor(new ToolInvocationBridge(session, makeNoopLogger()));
  const conversation = new Conversation([userMessage('q')]);
  const metrics = new QueryMetricsRecorder();
  return { executor, conversation, metrics, session };
}

describe('TurnExecutor', () => {
  it('handles thinking text and tool calls in response order', async () => {
    const { executor, conversation, metrics } = setup(
      new FakeToolSession([], { lookup: () => textContent('found') }),
    );

    const outcome = await executor.execute(
      response('toolUse', [{ text: 'Checking.' }, toolUse('t1', 'lookup', { q: 'x' }), { text: 'Done checking.' }]),
      conversation,
      metrics,
    );

    expect(outcome).toEqual({
      state: 'toolDispatch',
      toolCalls: 1,
      lines: [
        TOOL_USE_NOTICE,
        '[Thinking: Checking.]',
        '[Calling tool lookup with args {"q":"x"}]',
        '[Thinking: Done checking.]',
      ],
    });
    expect(conversation.snapshot().map((m) => m.role)).toEqual(['user', 'assistant', 'assistant', 'user', 'assistant']);
    expect(metrics.finish().toolCalls.map((c) => c.name)).toEqual(['lookup']);
  });

  it('returns the last text block on endTurn without touching the conversation', async () => {
    const { executor, conversation, metrics } = setup();

    const outcome = await executor.execute(
      response('endTurn', [{ text: 'one' }, { text: 'two' }]),
      conversation,
      metrics,
    );

    expect(outcome).toEqual({ state: 'terminal', lines: ['two'], stopReason: 'endTurn' });
    expect(conversation.length).toBe(1);
  });

  it('returns the fixed notice for stopSequence', async () => {
    const { executor, conversation, metrics } = setup();

    const outcome = await executor.execute(textResponse('half', 'stopSequence'), conversation, metrics);

    expect(outcome).toEqual({
      state: 'terminal',
      lines: ['[Stop sequence reached, ending conversation.]'],
      stopReason: 'stopSequence',
    });
  });

  it('returns the fixed notice for contentFiltered', async () => {
    const { executor, conversation, metrics } = setup();

    const outcome = await executor.execute(textResponse('', 'contentFiltered'), conversation, metrics);

    expect(outcome.lines).toEqual(['[Content filtered, ending conversation.]']);
  });
});
