/**
 * Query Metrics
 *
 * Per-query timing accumulator. One recorder is created for each query and
 * passed explicitly to whatever needs to record into it.
 */

import type { QueryMetrics, TokenUsage, ToolCallRecord } from '../types/agent-types.js';

export type Clock = () => number;

const systemClock: Clock = () => performance.now();

export class QueryMetricsRecorder {
  private readonly startedAt: Date;
  private readonly startMs: number;
  private toolListingMs = 0;
  private readonly llmRequestsMs: number[] = [];
  private readonly toolCalls: ToolCallRecord[] = [];
  private readonly usage: TokenUsage = { inputTokens: 0, outputTokens: 0 };

  constructor(private readonly clock: Clock = systemClock, now: Date = new Date()) {
    this.startedAt = now;
    this.startMs = clock();
  }

  get queryStartedAt(): Date {
    return this.startedAt;
  }

  /** Run `fn` and return its result with the elapsed milliseconds. */
  async time<T>(fn: () => Promise<T>): Promise<{ value: T; durationMs: number }> {
    const start = this.clock();
    const value = await fn();
    return { value, durationMs: this.clock() - start };
  }

  recordToolListing(durationMs: number): void {
    this.toolListingMs = durationMs;
  }

  recordLlmRequest(durationMs: number, usage?: TokenUsage): void {
    this.llmRequestsMs.push(durationMs);
    if (usage) {
      this.usage.inputTokens += usage.inputTokens;
      this.usage.outputTokens += usage.outputTokens;
    }
  }

  recordToolCall(record: ToolCallRecord): void {
    this.toolCalls.push(record);
  }

  get llmCallCount(): number {
    return this.llmRequestsMs.length;
  }

  /** Snapshot of everything recorded so far, with the total measured up to now. */
  finish(): QueryMetrics {
    return {
      queryStartedAt: this.startedAt,
      toolListingMs: this.toolListingMs,
      llmRequestsMs: [...this.llmRequestsMs],
      toolCalls: [...this.toolCalls],
      usage: { ...this.usage },
      totalMs: this.clock() - this.startMs,
    };
  }
}

// ============================================================================
// Formatting
// ============================================================================

function seconds(ms: number): string {
  return `${(ms / 1000).toFixed(3)}s`;
}

function sum(values: number[]): number {
  return values.reduce((total, v) => total + v, 0);
}

function average(values: number[]): number {
  return values.length === 0 ? 0 : sum(values) / values.length;
}

function formatTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/**
 * Human-readable timing summary appended after the transcript.
 */
export function formatTimingSummary(metrics: QueryMetrics): string {
  const toolDurations = metrics.toolCalls.map((c) => c.durationMs);

  const lines = [
    '[Timing summary]',
    `• Query started: ${formatTimestamp(metrics.queryStartedAt)}`,
    `• Total time: ${seconds(metrics.totalMs)}`,
    `• Tool listing: ${seconds(metrics.toolListingMs)}`,
    `• Model calls: ${metrics.llmRequestsMs.length}`,
    `• Model time: ${seconds(sum(metrics.llmRequestsMs))} (avg ${seconds(average(metrics.llmRequestsMs))})`,
    `• Tool calls: ${metrics.toolCalls.length}`,
    `• Tool time: ${seconds(sum(toolDurations))} (avg ${seconds(average(toolDurations))})`,
    `• Tokens: ${metrics.usage.inputTokens} in / ${metrics.usage.outputTokens} out`,
  ];

  if (metrics.toolCalls.length > 0) {
    lines.push('', '[Per-tool timing]');
    metrics.toolCalls.forEach((call, i) => {
      lines.push(`${i + 1}. ${call.name} → ${seconds(call.durationMs)}`);
    });
  }

  return lines.join('\n');
}
