/**
 * Stdio tool server
 *
 * Serves a ToolRegistry over newline-delimited JSON-RPC: `initialize`,
 * `tools/list`, `tools/call` and `ping`. Notifications get no response.
 */

import * as readline from 'readline';
import type { Readable, Writable } from 'stream';
import type { Logger } from 'pino';
import {
  JsonRpcRequestSchema,
  MCP_PROTOCOL_VERSION,
  RPC_INVALID_PARAMS,
  RPC_INVALID_REQUEST,
  RPC_METHOD_NOT_FOUND,
  RPC_PARSE_ERROR,
  ToolCallParamsSchema,
} from './json-rpc.js';
import type { JsonRpcId } from './json-rpc.js';
import type { ToolRegistry } from './tool-registry.js';

export interface ToolServerInfo {
  name: string;
  version: string;
}

type JsonRpcReply =
  | { jsonrpc: '2.0'; id: JsonRpcId; result: unknown }
  | { jsonrpc: '2.0'; id: JsonRpcId | null; error: { code: number; message: string } };

function rpcError(id: JsonRpcId | null, code: number, message: string): JsonRpcReply {
  return { jsonrpc: '2.0', id, error: { code, message } };
}

export class ToolServer {
  constructor(
    private readonly registry: ToolRegistry,
    private readonly info: ToolServerInfo,
    private readonly logger: Logger,
  ) {}

  /**
   * Handle one raw line. Returns the reply to write, or null for notifications.
   */
  async handleLine(line: string): Promise<JsonRpcReply | null> {
    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch {
      return rpcError(null, RPC_PARSE_ERROR, 'Parse error');
    }

    const parsed = JsonRpcRequestSchema.safeParse(raw);
    if (!parsed.success) {
      return rpcError(null, RPC_INVALID_REQUEST, 'Invalid request');
    }

    const request = parsed.data;
    const id = request.id;
    if (id === undefined) {
      this.logger.debug({ method: request.method }, 'Notification received');
      return null;
    }

    switch (request.method) {
      case 'initialize':
        return {
          jsonrpc: '2.0',
          id,
          result: {
            protocolVersion: MCP_PROTOCOL_VERSION,
            serverInfo: this.info,
            capabilities: { tools: {} },
          },
        };

      case 'ping':
        return { jsonrpc: '2.0', id, result: {} };

      case 'tools/list':
        return { jsonrpc: '2.0', id, result: { tools: this.registry.getDefinitions() } };

      case 'tools/call': {
        const params = ToolCallParamsSchema.safeParse(request.params ?? {});
        if (!params.success) {
          return rpcError(id, RPC_INVALID_PARAMS, 'tools/call requires a tool name');
        }
        const start = performance.now();
        const result = await this.registry.execute(params.data.name, params.data.arguments);
        this.logger.info(
          { tool: params.data.name, durationMs: Math.round(performance.now() - start), isError: result.isError ?? false },
          'Tool call handled',
        );
        return { jsonrpc: '2.0', id, result };
      }

      default:
        return rpcError(id, RPC_METHOD_NOT_FOUND, `Method not found: ${request.method}`);
    }
  }

  /**
   * Read requests from `input` one line at a time and write replies to
   * `output`. Resolves when the input ends.
   */
  async serve(input: Readable, output: Writable): Promise<void> {
    const lines = readline.createInterface({ input, crlfDelay: Infinity });

    for await (const line of lines) {
      if (!line.trim()) continue;
      const reply = await this.handleLine(line);
      if (reply) {
        output.write(JSON.stringify(reply) + '\n');
      }
    }
  }
}
