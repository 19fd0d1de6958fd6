/**
 * BedrockProvider Unit Tests
 *
 * fetch is stubbed, so no request leaves the process.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { assistantMessage, toolRequestMessage, toolResultMessage, userMessage } from '../messages.js';
import { ProviderError } from '../errors.js';
import type { ConverseRequest } from '../../types/index.js';
import { BedrockProvider, toConverseRequestBody } from './bedrock-provider.js';

const request: ConverseRequest = {
  systemPrompt: 'You handle roaming requests.',
  messages: [
    userMessage('plans for Japan'),
    assistantMessage('Checking.'),
    toolRequestMessage({ toolUseId: 't1', name: 'list_roaming_plans', input: { country: 'Japan' } }),
    toolResultMessage('t1', [{ json: { text: 'ZERO_LITE_8GB' } }]),
  ],
  inferenceConfig: { maxTokens: 2048, temperature: 0, topP: 1 },
  toolConfig: {
    tools: [
      {
        name: 'list_roaming_plans',
        description: 'Plans',
        inputSchema: { type: 'object', properties: { country: { type: 'string' } }, required: ['country'] },
      },
    ],
  },
};

function stubFetch(body: unknown, status = 200) {
  const fetchMock = vi.fn().mockResolvedValue(
    new Response(typeof body === 'string' ? body : JSON.stringify(body), { status }),
  );
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

function converseReply(stopReason: string, content: unknown[], usage?: unknown) {
  return { output: { message: { role: 'assistant', content } }, stopReason, usage };
}

async function captureError(promise: Promise<unknown>): Promise<ProviderError> {
  const err = await promise.catch((e: unknown) => e);
  if (!(err instanceof ProviderError)) throw new Error('expected ProviderError');
  return err;
}

describe('toConverseRequestBody', () => {
  it('builds the Converse payload with merged roles', () => {
    expect(toConverseRequestBody(request)).toEqual({
      system: [{ text: 'You handle roaming requests.' }],
      messages: [
        { role: 'user', content: [{ text: 'plans for Japan' }] },
        {
          role: 'assistant',
          content: [
            { text: 'Checking.' },
            { toolUse: { toolUseId: 't1', name: 'list_roaming_plans', input: { country: 'Japan' } } },
          ],
        },
        { role: 'user', content: [{ toolResult: { toolUseId: 't1', content: [{ json: { text: 'ZERO_LITE_8GB' } }] } }] },
      ],
      inferenceConfig: { maxTokens: 2048, temperature: 0, topP: 1 },
      toolConfig: {
        tools: [
          {
            toolSpec: {
              name: 'list_roaming_plans',
              description: 'Plans',
              inputSchema: {
                json: { type: 'object', properties: { country: { type: 'string' } }, required: ['country'] },
              },
            },
          },
        ],
      },
    });
  });

  it('omits toolConfig when there are no tools', () => {
    const body = toConverseRequestBody({ ...request, toolConfig: { tools: [] } });

    expect(body).not.toHaveProperty('toolConfig');
  });
});

describe('BedrockProvider', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('posts to the model endpoint with the bearer token', async () => {
    const fetchMock = stubFetch(converseReply('end_turn', [{ text: 'hello' }]));
    const provider = new BedrockProvider({ apiKey: 'test-secret' });

    await provider.converse(request);

    expect(fetchMock).toHaveBeenCalledTimes(1);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe(
      'https://bedrock-runtime.us-west-2.amazonaws.com/model/anthropic.claude-3-5-sonnet-20241022-v2%3A0/converse',
    );
    expect(init.method).toBe('POST');
    expect(init.headers.Authorization).toBe('Bearer test-secret');
    expect(JSON.parse(init.body)).toEqual(toConverseRequestBody(request));
  });

  it('uses the configured region and model', async () => {
    const fetchMock = stubFetch(converseReply('end_turn', [{ text: 'hello' }]));
    const provider = new BedrockProvider({ apiKey: 'test-secret', region: 'eu-central-1', model: 'my-model' });

    await provider.converse(request);

    expect(fetchMock.mock.calls[0][0]).toBe('https://bedrock-runtime.eu-central-1.amazonaws.com/model/my-model/converse');
  });

  it('parses text and tool use blocks and skips other kinds', async () => {
    stubFetch(
      converseReply(
        'tool_use',
        [
          { reasoningContent: { reasoningText: { text: 'hidden' } } },
          { text: 'Let me check.' },
          { toolUse: { toolUseId: 't2', name: 'get_roaming_usage', input: { phone_number: '010' } } },
        ],
        { inputTokens: 120, outputTokens: 30, totalTokens: 150 },
      ),
    );
    const provider = new BedrockProvider({ apiKey: 'test-secret' });

    const result = await provider.converse(request);

    expect(result).toEqual({
      stopReason: 'toolUse',
      message: {
        role: 'assistant',
        content: [
          { text: 'Let me check.' },
          { toolUse: { toolUseId: 't2', name: 'get_roaming_usage', input: { phone_number: '010' } } },
        ],
      },
      usage: { inputTokens: 120, outputTokens: 30 },
    });
  });

  it.each([
    ['end_turn', 'endTurn'],
    ['max_tokens', 'maxTokens'],
    ['stop_sequence', 'stopSequence'],
    ['content_filtered', 'contentFiltered'],
    ['guardrail_intervened', 'contentFiltered'],
  ])('maps %s to %s', async (wire, expected) => {
    stubFetch(converseReply(wire, []));
    const provider = new BedrockProvider({ apiKey: 'test-secret' });

    const result = await provider.converse(request);

    expect(result.stopReason).toBe(expected);
    expect(result.usage).toEqual({ inputTokens: 0, outputTokens: 0 });
  });

  it('rejects an unknown stop reason', async () => {
    stubFetch(converseReply('something_new', []));
    const provider = new BedrockProvider({ apiKey: 'test-secret' });

    const err = await captureError(provider.converse(request));

    expect(err.message).toBe('Unsupported stop reason: something_new');
  });

  it('reports HTTP errors with status and body', async () => {
    stubFetch('{"message":"The security token included in the request is invalid."}', 403);
    const provider = new BedrockProvider({ apiKey: 'test-secret' });

    const err = await captureError(provider.converse(request));

    expect(err.status).toBe(403);
    expect(err.message).toBe(
      'Bedrock API error: Status 403\nBody: {"message":"The security token included in the request is invalid."}',
    );
  });

  it('reports connection failures', async () => {
    vi.stubGlobal('fetch', vi.fn().mockRejectedValue(new Error('connect ECONNREFUSED')));
    const provider = new BedrockProvider({ apiKey: 'test-secret' });

    const err = await captureError(provider.converse(request));

    expect(err.message).toBe('Bedrock connection failed: connect ECONNREFUSED');
    expect(err.code).toBe('PROVIDER_ERROR');
  });

  it('reports a non-JSON body', async () => {
    stubFetch('<html>gateway</html>');
    const provider = new BedrockProvider({ apiKey: 'test-secret' });

    const err = await captureError(provider.converse(request));

    expect(err.message).toBe('Bedrock returned non-JSON response');
  });

  it('reports a body without output', async () => {
    stubFetch({ stopReason: 'end_turn' });
    const provider = new BedrockProvider({ apiKey: 'test-secret' });

    const err = await captureError(provider.converse(request));

    expect(err.message).toMatch(/^Unexpected Bedrock response shape: /);
  });
});
