/**
 * Anthropic LLM Provider
 *
 * Implements LLMProvider using the @anthropic-ai/sdk.
 * Converts conversation messages ↔ Anthropic native format at the boundary.
 */

import Anthropic from '@anthropic-ai/sdk';
import type {
  ContentBlock,
  ConverseRequest,
  ConverseResponse,
  StopReason,
  ToolResultContent,
} from '../../types/agent-types.js';
import { ProviderError, errorMessage } from '../errors.js';
import type { LLMProvider } from '../llm-provider.js';
import { mergeConsecutiveRoles } from '../llm-provider.js';

export const DEFAULT_ANTHROPIC_MODEL = 'claude-3-5-sonnet-20241022';

/** The slice of the SDK client the provider uses */
export interface AnthropicMessagesClient {
  messages: {
    create(body: Anthropic.MessageCreateParamsNonStreaming): Promise<Anthropic.Message>;
  };
}

export interface AnthropicProviderConfig {
  apiKey: string;
  model?: string;
  /** Injected client, for tests */
  client?: AnthropicMessagesClient;
}

const STOP_REASONS: Record<string, StopReason> = {
  tool_use: 'toolUse',
  end_turn: 'endTurn',
  max_tokens: 'maxTokens',
  stop_sequence: 'stopSequence',
  refusal: 'contentFiltered',
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Tool results travel as text; a `{ json: { text } }` payload is unwrapped. */
function toolResultText(item: ToolResultContent): string {
  if ('text' in item) return item.text;
  const { text } = item.json;
  if (typeof text === 'string' && Object.keys(item.json).length === 1) return text;
  return JSON.stringify(item.json);
}

export class AnthropicProvider implements LLMProvider {
  readonly name = 'anthropic';
  private client: AnthropicMessagesClient;
  private model: string;

  constructor(config: AnthropicProviderConfig) {
    this.client = config.client ?? new Anthropic({ apiKey: config.apiKey });
    this.model = config.model ?? DEFAULT_ANTHROPIC_MODEL;
  }

  async converse(request: ConverseRequest): Promise<ConverseResponse> {
    const messages: Anthropic.MessageParam[] = mergeConsecutiveRoles(request.messages).map((m) => ({
      role: m.role,
      content: m.content.map((block) => this.toAnthropicBlock(block)),
    }));

    const tools: Anthropic.Tool[] = request.toolConfig.tools.map((t) => ({
      name: t.name,
      description: t.description,
      input_schema: { type: 'object', properties: t.inputSchema.properties, required: t.inputSchema.required },
    }));

    let response: Anthropic.Message;
    try {
      response = await this.client.messages.create({
        model: this.model,
        max_tokens: request.inferenceConfig.maxTokens,
        temperature: request.inferenceConfig.temperature,
        top_p: request.inferenceConfig.topP,
        system: request.systemPrompt,
        messages,
        ...(tools.length > 0 ? { tools } : {}),
      });
    } catch (err) {
      const status = err instanceof Anthropic.APIError ? err.status : undefined;
      throw new ProviderError(`Anthropic request failed: ${errorMessage(err)}`, status, err);
    }

    const reason: string | null = response.stop_reason;
    const stopReason = reason === null ? undefined : STOP_REASONS[reason];
    if (!stopReason) {
      throw new ProviderError(`Unsupported stop reason: ${reason ?? 'null'}`);
    }

    return {
      stopReason,
      message: { role: 'assistant', content: this.fromAnthropicContent(response.content) },
      usage: {
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
      },
    };
  }

  /** Convert a conversation block → Anthropic native format for API calls */
  private toAnthropicBlock(block: ContentBlock): Anthropic.ContentBlockParam {
    if ('text' in block) {
      return { type: 'text', text: block.text };
    }
    if ('toolUse' in block) {
      return {
        type: 'tool_use',
        id: block.toolUse.toolUseId,
        name: block.toolUse.name,
        input: block.toolUse.input,
      };
    }
    return {
      type: 'tool_result',
      tool_use_id: block.toolResult.toolUseId,
      content: block.toolResult.content.map((item) => ({ type: 'text' as const, text: toolResultText(item) })),
    };
  }

  /** Convert Anthropic response content → conversation blocks */
  private fromAnthropicContent(content: Anthropic.ContentBlock[]): ContentBlock[] {
    const blocks: ContentBlock[] = [];
    for (const block of content) {
      if (block.type === 'text') {
        blocks.push({ text: block.text });
      } else if (block.type === 'tool_use') {
        if (!isRecord(block.input)) {
          throw new ProviderError(`Tool use ${block.id} has non-object input`);
        }
        blocks.push({ toolUse: { toolUseId: block.id, name: block.name, input: block.input } });
      }
    }
    return blocks;
  }
}
