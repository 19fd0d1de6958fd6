/**
 * JSON-RPC stdio client
 *
 * Newline-delimited JSON-RPC 2.0 over a readable/writable stream pair.
 * Implements the request/response pattern with per-request timeouts.
 */

import * as readline from 'readline';
import type { Readable, Writable } from 'stream';
import type { Logger } from 'pino';
import { JsonRpcError, ToolSessionClosedError } from '../agent/errors.js';
import { makeLogger } from '../logging/logger.js';
import { JsonRpcResponseSchema } from './json-rpc.js';

export interface JsonRpcStdioClientOptions {
  /** Timeout for requests in ms (default: 60000) */
  requestTimeoutMs?: number;
  logger?: Logger;
}

interface PendingRequest {
  method: string;
  resolve: (result: unknown) => void;
  reject: (e: Error) => void;
  timeout: ReturnType<typeof setTimeout>;
}

export class JsonRpcStdioClient {
  private readonly pendingRequests = new Map<number, PendingRequest>();
  private readonly requestTimeoutMs: number;
  private readonly logger: Logger;
  private readonly lines: readline.Interface;
  private nextId = 1;
  private closedWith: Error | null = null;

  constructor(
    input: Readable,
    private readonly output: Writable,
    options: JsonRpcStdioClientOptions = {},
  ) {
    this.requestTimeoutMs = options.requestTimeoutMs ?? 60000;
    this.logger = options.logger ?? makeLogger({ component: 'json-rpc' });

    this.lines = readline.createInterface({ input, crlfDelay: Infinity });
    this.lines.on('line', (line) => this.handleLine(line));
    this.lines.on('close', () => this.close(new ToolSessionClosedError('Tool session stream ended')));
    // EPIPE and friends arrive here when the server stops reading
    this.output.on('error', (err) => {
      this.logger.warn({ err: err.message }, 'Tool session write failed');
      this.close(new ToolSessionClosedError(`Tool session write failed: ${err.message}`, err));
    });
  }

  get pendingCount(): number {
    return this.pendingRequests.size;
  }

  get isClosed(): boolean {
    return this.closedWith !== null;
  }

  request(method: string, params?: Record<string, unknown>): Promise<unknown> {
    if (this.closedWith) {
      return Promise.reject(this.closedWith);
    }

    const id = this.nextId++;

    return new Promise<unknown>((resolve, reject) => {
      const timeout = setTimeout(() => {
        this.pendingRequests.delete(id);
        reject(new Error(`Request timeout: ${method} (${this.requestTimeoutMs}ms)`));
      }, this.requestTimeoutMs);

      this.pendingRequests.set(id, { method, resolve, reject, timeout });
      this.write({ jsonrpc: '2.0', id, method, ...(params ? { params } : {}) });
    });
  }

  notify(method: string, params?: Record<string, unknown>): void {
    if (this.closedWith) return;
    this.write({ jsonrpc: '2.0', method, ...(params ? { params } : {}) });
  }

  /**
   * Stop reading and reject everything still pending.
   */
  close(reason: Error = new ToolSessionClosedError()): void {
    if (this.closedWith) return;
    this.closedWith = reason;

    for (const pending of this.pendingRequests.values()) {
      clearTimeout(pending.timeout);
      pending.reject(reason);
    }
    this.pendingRequests.clear();
    this.lines.close();
  }

  private write(message: Record<string, unknown>): void {
    if (this.output.destroyed || this.output.writableEnded) {
      this.close(new ToolSessionClosedError('Tool session input is no longer writable'));
      return;
    }
    this.logger.debug({ message }, 'json-rpc send');
    this.output.write(JSON.stringify(message) + '\n');
  }

  private handleLine(line: string): void {
    if (!line.trim()) return;

    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      this.logger.warn({ line: line.slice(0, 200) }, 'Ignoring non-JSON line from tool session');
      return;
    }

    const response = JsonRpcResponseSchema.safeParse(parsed);
    if (!response.success) {
      this.logger.debug({ message: parsed }, 'Ignoring non-response message from tool session');
      return;
    }

    const message = response.data;
    const id = message.id;
    if (typeof id !== 'number') {
      this.logger.warn({ id }, 'Response with unknown id');
      return;
    }

    const pending = this.pendingRequests.get(id);
    if (!pending) {
      this.logger.warn({ id }, 'Response for a request that is no longer pending');
      return;
    }

    clearTimeout(pending.timeout);
    this.pendingRequests.delete(id);

    if ('error' in message) {
      pending.reject(new JsonRpcError(message.error.message, message.error.code, message.error.data));
    } else {
      pending.resolve(message.result);
    }
  }
}
