/**
 * Interactive chat REPL
 */

import * as readline from 'readline';
import type { Readable, Writable } from 'stream';
import type { Logger } from 'pino';
import type { AgentLoop } from '../../agent/agent-loop.js';
import { isQueryScopedError, ToolSessionClosedError } from '../../agent/errors.js';
import { formatTimingSummary } from '../../agent/query-metrics.js';
import { makeLogger } from '../../logging/logger.js';
import { Display } from './display.js';

export const QUERY_PROMPT = 'Query: ';

export interface ChatREPLConfig {
  agent: Pick<AgentLoop, 'run'>;
  /** Tool names shown in the banner */
  tools: string[];
  input?: Readable;
  output?: Writable;
  useColor?: boolean;
  logger?: Logger;
}

export function isQuitCommand(line: string): boolean {
  return line.trim().toLowerCase() === 'quit';
}

/**
 * Start interactive chat REPL. Resolves when the user types `quit` or the
 * input ends. Query failures are printed and the loop keeps prompting.
 */
export async function startChatREPL(config: ChatREPLConfig): Promise<void> {
  const input = config.input ?? process.stdin;
  const output = config.output ?? process.stdout;
  const display = new Display(output, config.useColor ?? false);
  const logger = config.logger ?? makeLogger({ component: 'repl' });

  const rl = readline.createInterface({ input, crlfDelay: Infinity, terminal: false });

  display.banner(config.tools);
  display.prompt(QUERY_PROMPT);

  try {
    for await (const line of rl) {
      if (isQuitCommand(line)) break;

      const query = line.trim();
      if (query) {
        await handleQuery(query, config.agent, display, logger);
      }

      display.prompt(QUERY_PROMPT);
    }
  } finally {
    rl.close();
  }

  display.line();
}

async function handleQuery(
  query: string,
  agent: Pick<AgentLoop, 'run'>,
  display: Display,
  logger: Logger,
): Promise<void> {
  const spinner = display.spinner('Thinking...');

  try {
    const result = await agent.run(query);
    spinner.stop();
    display.transcript(result.transcript);
    display.timing(formatTimingSummary(result.metrics));
  } catch (err) {
    spinner.stop();
    if (isQueryScopedError(err)) {
      logger.warn({ err }, 'Query failed');
    } else {
      logger.error({ err }, 'Query failed');
    }
    display.error(err);
    if (err instanceof ToolSessionClosedError) {
      display.warn('The tool server is no longer available. Type quit and restart roaming-agent.');
    }
  }
}
