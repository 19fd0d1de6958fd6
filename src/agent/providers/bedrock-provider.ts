// Amazon Bedrock Converse provider
//
//   POST https://bedrock-runtime.{region}.amazonaws.com/model/{modelId}/converse
//   - System prompt is a top-level "system" field (not a message role)
//   - Content is an array of { text } / { toolUse } / { toolResult } objects
//   - Authentication: Amazon Bedrock API key sent as a Bearer token
//     (AWS_BEARER_TOKEN_BEDROCK)

import { z } from 'zod';
import type { ContentBlock, ConverseRequest, ConverseResponse, StopReason } from '../../types/agent-types.js';
import { ProviderError, errorMessage } from '../errors.js';
import type { LLMProvider } from '../llm-provider.js';
import { mergeConsecutiveRoles } from '../llm-provider.js';
import { toConverseTools } from '../tool-catalog.js';

export const DEFAULT_BEDROCK_MODEL = 'anthropic.claude-3-5-sonnet-20241022-v2:0';
export const DEFAULT_BEDROCK_REGION = 'us-west-2';

// ── Converse API wire types ───────────────────────────────────────────────────

const TextPartSchema = z.object({ text: z.string() });

const ToolUsePartSchema = z.object({
  toolUse: z.object({
    toolUseId: z.string(),
    name: z.string(),
    input: z.record(z.unknown()),
  }),
});

const ConverseResponseSchema = z.object({
  output: z.object({
    message: z.object({
      role: z.string(),
      // Reasoning and other block kinds are not part of the conversation model
      content: z.array(z.record(z.unknown())),
    }),
  }),
  stopReason: z.string(),
  usage: z
    .object({
      inputTokens: z.number(),
      outputTokens: z.number(),
    })
    .passthrough()
    .optional(),
});

const STOP_REASONS: Record<string, StopReason> = {
  tool_use: 'toolUse',
  end_turn: 'endTurn',
  max_tokens: 'maxTokens',
  stop_sequence: 'stopSequence',
  content_filtered: 'contentFiltered',
  guardrail_intervened: 'contentFiltered',
};

// ── Request conversion ────────────────────────────────────────────────────────

export function toConverseRequestBody(request: ConverseRequest): Record<string, unknown> {
  // Conversation blocks already use the Converse field names
  return {
    system: [{ text: request.systemPrompt }],
    messages: mergeConsecutiveRoles(request.messages),
    inferenceConfig: {
      maxTokens: request.inferenceConfig.maxTokens,
      temperature: request.inferenceConfig.temperature,
      topP: request.inferenceConfig.topP,
    },
    // Bedrock rejects an empty tool list
    ...(request.toolConfig.tools.length > 0
      ? { toolConfig: { tools: toConverseTools(request.toolConfig.tools) } }
      : {}),
  };
}

// ── Provider ──────────────────────────────────────────────────────────────────

export interface BedrockProviderConfig {
  /** Amazon Bedrock API key */
  apiKey: string;
  model?: string;
  region?: string;
  /** Overrides the regional runtime endpoint */
  baseUrl?: string;
}

export class BedrockProvider implements LLMProvider {
  readonly name = 'bedrock';
  private readonly model: string;
  private readonly baseUrl: string;
  private readonly apiKey: string;

  constructor(config: BedrockProviderConfig) {
    this.model = config.model ?? DEFAULT_BEDROCK_MODEL;
    const region = config.region ?? DEFAULT_BEDROCK_REGION;
    this.baseUrl = (config.baseUrl ?? `https://bedrock-runtime.${region}.amazonaws.com`).replace(/\/$/, '');
    this.apiKey = config.apiKey;
  }

  async converse(request: ConverseRequest): Promise<ConverseResponse> {
    const url = `${this.baseUrl}/model/${encodeURIComponent(this.model)}/converse`;

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          'Content-Type': 'application/json',
          Accept: 'application/json',
        },
        body: JSON.stringify(toConverseRequestBody(request)),
      });
    } catch (err) {
      throw new ProviderError(`Bedrock connection failed: ${errorMessage(err)}`, undefined, err);
    }

    if (!response.ok) {
      const errorBody = await response.text().catch(() => '(no body)');
      throw new ProviderError(`Bedrock API error: Status ${response.status}\nBody: ${errorBody}`, response.status);
    }

    let data: unknown;
    try {
      data = await response.json();
    } catch (err) {
      throw new ProviderError('Bedrock returned non-JSON response', response.status, err);
    }

    const parsed = ConverseResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new ProviderError(
        `Unexpected Bedrock response shape: ${parsed.error.issues[0]?.message ?? 'invalid'}`,
        response.status,
        parsed.error,
      );
    }

    const stopReason = STOP_REASONS[parsed.data.stopReason];
    if (!stopReason) {
      throw new ProviderError(`Unsupported stop reason: ${parsed.data.stopReason}`, response.status);
    }

    const content: ContentBlock[] = [];
    for (const part of parsed.data.output.message.content) {
      const text = TextPartSchema.safeParse(part);
      if (text.success) {
        content.push({ text: text.data.text });
        continue;
      }
      const toolUse = ToolUsePartSchema.safeParse(part);
      if (toolUse.success) {
        content.push({ toolUse: toolUse.data.toolUse });
      }
    }

    return {
      stopReason,
      message: { role: 'assistant', content },
      usage: {
        inputTokens: parsed.data.usage?.inputTokens ?? 0,
        outputTokens: parsed.data.usage?.outputTokens ?? 0,
      },
    };
  }
}
