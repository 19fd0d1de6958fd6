#!/usr/bin/env node

/**
 * Roaming Agent CLI
 *
 * Connects to a roaming tool server over stdio and answers queries with an
 * LLM that can call its tools.
 */

import 'dotenv/config';
import { Command, InvalidArgumentError, Option } from 'commander';
import { chatCommand } from './commands/chat.js';

function parseMaxTurns(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed < 1 || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

const program = new Command();

program
  .name('roaming-agent')
  .description('Roaming agent - answer roaming questions with an LLM and a tool server')
  .version('0.1.0')
  .argument('<server-script>', 'Path to the tool server script (.js, .mjs or .cjs)')
  .addOption(new Option('-p, --provider <type>', 'LLM provider').choices(['bedrock', 'anthropic'] as const))
  .option('-m, --model <id>', 'Model identifier')
  .option('-t, --max-turns <n>', 'Model round trips per query', parseMaxTurns)
  .showHelpAfterError()
  .action(chatCommand);

// Parse and execute
program.parseAsync().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
