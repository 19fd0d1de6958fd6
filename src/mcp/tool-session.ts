/**
 * Tool Session
 *
 * The channel through which tools are enumerated and invoked. The stdio
 * implementation launches a tool server script as a child process and talks
 * newline-delimited JSON-RPC to it.
 */

import { spawn } from 'child_process';
import type { ChildProcessWithoutNullStreams } from 'child_process';
import path from 'path';
import type { Logger } from 'pino';
import { ConfigError, ToolSessionClosedError } from '../agent/errors.js';
import { makeLogger } from '../logging/logger.js';
import type { ToolCallResult } from '../types/agent-types.js';
import {
  InitializeResultSchema,
  MCP_PROTOCOL_VERSION,
  ToolCallResultSchema,
  ToolListResultSchema,
} from './json-rpc.js';
import type { RawToolDefinition } from './json-rpc.js';
import { JsonRpcStdioClient } from './stdio-client.js';

export interface ToolSession {
  listTools(): Promise<RawToolDefinition[]>;
  callTool(name: string, args: Readonly<Record<string, unknown>>): Promise<ToolCallResult>;
  close(): Promise<void>;
}

export interface StdioToolSessionOptions {
  /** Per-request timeout in ms (default: 60000) */
  requestTimeoutMs?: number;
  /** Extra environment for the server process */
  env?: NodeJS.ProcessEnv;
  clientName?: string;
  clientVersion?: string;
  logger?: Logger;
}

export interface ServerInfo {
  name: string;
  version: string;
  protocolVersion: string;
}

/**
 * Resolve the command that runs a tool server script.
 */
export function resolveServerCommand(scriptPath: string): { command: string; args: string[] } {
  const ext = path.extname(scriptPath).toLowerCase();
  if (ext === '.js' || ext === '.mjs' || ext === '.cjs') {
    return { command: process.execPath, args: [scriptPath] };
  }
  throw new ConfigError('Server script must be a .js, .mjs or .cjs file');
}

/**
 * Tool session over a JSON-RPC stdio client.
 */
export class StdioToolSession implements ToolSession {
  private closed = false;
  private serverInfo: ServerInfo | null = null;

  constructor(
    private readonly client: JsonRpcStdioClient,
    private readonly onClose: () => void = () => {},
  ) {}

  /**
   * Launch the server script and complete the initialize handshake.
   * The process is terminated if the handshake fails.
   */
  static async launch(scriptPath: string, options: StdioToolSessionOptions = {}): Promise<StdioToolSession> {
    const { command, args } = resolveServerCommand(scriptPath);
    const logger = options.logger ?? makeLogger({ component: 'tool-session' });

    const child: ChildProcessWithoutNullStreams = spawn(command, args, {
      env: { ...process.env, ...options.env },
      stdio: ['pipe', 'pipe', 'pipe'],
    });

    child.stderr.setEncoding('utf8');
    child.stderr.on('data', (chunk: string) => {
      for (const line of chunk.split('\n')) {
        if (line.trim()) logger.debug({ server: scriptPath }, line);
      }
    });

    const client = new JsonRpcStdioClient(child.stdout, child.stdin, {
      requestTimeoutMs: options.requestTimeoutMs,
      logger,
    });

    child.on('error', (err) => {
      client.close(new ToolSessionClosedError(`Failed to start tool server: ${err.message}`, err));
    });
    child.on('exit', (code, signal) => {
      logger.info({ code, signal }, 'Tool server exited');
      client.close(new ToolSessionClosedError(`Tool server exited (code ${code ?? 'null'})`));
    });

    const session = new StdioToolSession(client, () => {
      if (child.exitCode === null && !child.killed) child.kill();
    });

    try {
      await session.initialize(options.clientName ?? 'roaming-agent', options.clientVersion ?? '0.1.0');
    } catch (err) {
      await session.close();
      throw err;
    }

    return session;
  }

  async initialize(clientName: string, clientVersion: string): Promise<ServerInfo> {
    const raw = await this.client.request('initialize', {
      protocolVersion: MCP_PROTOCOL_VERSION,
      capabilities: {},
      clientInfo: { name: clientName, version: clientVersion },
    });
    const result = InitializeResultSchema.parse(raw);
    this.client.notify('notifications/initialized');

    this.serverInfo = {
      name: result.serverInfo.name,
      version: result.serverInfo.version,
      protocolVersion: result.protocolVersion,
    };
    return this.serverInfo;
  }

  getServerInfo(): ServerInfo | null {
    return this.serverInfo;
  }

  async listTools(): Promise<RawToolDefinition[]> {
    const raw = await this.client.request('tools/list', {});
    return ToolListResultSchema.parse(raw).tools;
  }

  async callTool(name: string, args: Readonly<Record<string, unknown>>): Promise<ToolCallResult> {
    const raw = await this.client.request('tools/call', { name, arguments: args });
    return ToolCallResultSchema.parse(raw);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.client.close();
    this.onClose();
  }
}
