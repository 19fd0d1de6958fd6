/**
 * Agent Loop
 *
 * Iterative LLM call → tool execution cycle for a single query, driven by the
 * stop reason of each response. Non-streaming; tool calls run one at a time
 * and every response is fully processed before the next model call.
 */

import type { Logger } from 'pino';
import { makeLogger } from '../logging/logger.js';
import type { ToolSession } from '../mcp/tool-session.js';
import type {
  AgentLoopResult,
  ConverseResponse,
  InferenceConfig,
  LoopState,
  ToolSpec,
} from '../types/agent-types.js';
import { MalformedToolResultError } from './errors.js';
import type { LLMProvider } from './llm-provider.js';
import { Conversation, userMessage } from './messages.js';
import type { Clock } from './query-metrics.js';
import { QueryMetricsRecorder } from './query-metrics.js';
import { ToolInvocationBridge } from './tool-bridge.js';
import { listToolSpecs } from './tool-catalog.js';
import { TurnExecutor } from './turn-executor.js';

export const DEFAULT_MAX_TURNS = 10;

export const MAX_TURNS_NOTICE = '[Max turns reached, ending conversation.]';

export const DEFAULT_INFERENCE_CONFIG: InferenceConfig = { maxTokens: 2048, temperature: 0, topP: 1 };

export interface AgentLoopConfig {
  provider: LLMProvider;
  toolSession: ToolSession;
  systemPrompt: string;
  inferenceConfig?: InferenceConfig;
  /** Cap on model round trips per query (default: 10) */
  maxTurns?: number;
  logger?: Logger;
  clock?: Clock;
}

export class AgentLoop {
  private provider: LLMProvider;
  private toolSession: ToolSession;
  private systemPrompt: string;
  private inferenceConfig: InferenceConfig;
  private maxTurns: number;
  private logger: Logger;
  private clock: Clock | undefined;
  private executor: TurnExecutor;

  constructor(config: AgentLoopConfig) {
    this.provider = config.provider;
    this.toolSession = config.toolSession;
    this.systemPrompt = config.systemPrompt;
    this.inferenceConfig = config.inferenceConfig ?? DEFAULT_INFERENCE_CONFIG;
    this.maxTurns = config.maxTurns ?? DEFAULT_MAX_TURNS;
    this.logger = config.logger ?? makeLogger({ component: 'agent-loop' });
    this.clock = config.clock;
    this.executor = new TurnExecutor(new ToolInvocationBridge(this.toolSession, this.logger, this.clock));

    if (!Number.isInteger(this.maxTurns) || this.maxTurns < 1) {
      throw new RangeError(`maxTurns must be a positive integer, got ${this.maxTurns}`);
    }
  }

  async run(query: string): Promise<AgentLoopResult> {
    const metrics = new QueryMetricsRecorder(this.clock);
    const log = this.logger.child({ queryStartedAt: metrics.queryStartedAt.toISOString() });

    // 1. Initial conversation
    const conversation = new Conversation([userMessage(query)]);

    // 2. Tool catalog, re-fetched for every query
    const listing = await metrics.time(() => listToolSpecs(this.toolSession));
    metrics.recordToolListing(listing.durationMs);
    const tools: readonly ToolSpec[] = listing.value;
    log.debug({ tools: tools.map((t) => t.name) }, 'Tools available');

    // 3. Stop-reason state machine
    const transcript: string[] = [];
    let state: LoopState = 'thinking';
    let turns = 0;
    let response = await this.callModel(conversation, tools, metrics);

    while (true) {
      const outcome = await this.executor.execute(response, conversation, metrics);
      transcript.push(...outcome.lines);
      turns++;

      if (outcome.state === 'terminal') {
        log.debug({ from: state, stopReason: outcome.stopReason, turns }, 'Loop finished');
        state = 'terminal';
        break;
      }

      log.debug({ from: state, toolCalls: outcome.toolCalls, turns }, 'Tool round complete');
      state = 'toolDispatch';

      if (turns >= this.maxTurns) {
        log.warn({ turns }, 'Turn budget exhausted');
        transcript.push(MAX_TURNS_NOTICE);
        state = 'terminal';
        break;
      }

      response = await this.callModel(conversation, tools, metrics);
    }

    return {
      transcript: transcript.join('\n\n'),
      metrics: metrics.finish(),
      turns,
      llmCalls: metrics.llmCallCount,
      finalState: state,
    };
  }

  private async callModel(
    conversation: Conversation,
    tools: readonly ToolSpec[],
    metrics: QueryMetricsRecorder,
  ): Promise<ConverseResponse> {
    const unanswered = conversation.unansweredToolUseIds();
    if (unanswered.length > 0) {
      throw new MalformedToolResultError(`Tool use without a result: ${unanswered.join(', ')}`, unanswered[0]);
    }

    const { value, durationMs } = await metrics.time(() =>
      this.provider.converse({
        systemPrompt: this.systemPrompt,
        messages: conversation.snapshot(),
        inferenceConfig: this.inferenceConfig,
        toolConfig: { tools },
      }),
    );
    metrics.recordLlmRequest(durationMs, value.usage);
    this.logger.info(
      { provider: this.provider.name, stopReason: value.stopReason, durationMs },
      'Model request complete',
    );
    return value;
  }
}
