/**
 * Chat command - launch the tool server and start a conversation
 */

import { AgentLoop } from '../../agent/agent-loop.js';
import { errorMessage } from '../../agent/errors.js';
import { createProvider } from '../../agent/providers/index.js';
import type { ProviderType, RoamingAgentConfig } from '../../config/index.js';
import { getConfig, validateConfig } from '../../config/index.js';
import { makeLogger } from '../../logging/logger.js';
import { StdioToolSession } from '../../mcp/tool-session.js';
import { Display } from '../repl/display.js';
import { startChatREPL } from '../repl/chat-repl.js';

export interface ChatOptions {
  provider?: ProviderType;
  model?: string;
  maxTurns?: number;
}

export function applyChatOptions(config: RoamingAgentConfig, options: ChatOptions): RoamingAgentConfig {
  return {
    ...config,
    provider: options.provider ?? config.provider,
    model: options.model ?? config.model,
    maxTurns: options.maxTurns ?? config.maxTurns,
  };
}

export async function chatCommand(serverScript: string, options: ChatOptions): Promise<void> {
  const display = new Display(process.stderr, Boolean(process.stderr.isTTY));
  const config = applyChatOptions(getConfig(), options);
  const logger = makeLogger({ component: 'cli' }, config.logLevel);

  const { valid, errors } = validateConfig(config);
  if (!valid) {
    for (const message of errors) display.error(message);
    process.exit(1);
  }

  let session: StdioToolSession | undefined;

  try {
    const provider = createProvider(config);

    session = await StdioToolSession.launch(serverScript, {
      requestTimeoutMs: config.toolTimeoutMs,
      logger: logger.child({ component: 'tool-session' }),
    });

    const tools = await session.listTools();

    const agent = new AgentLoop({
      provider,
      toolSession: session,
      systemPrompt: config.systemPrompt,
      inferenceConfig: {
        maxTokens: config.maxTokens,
        temperature: config.temperature,
        topP: config.topP,
      },
      maxTurns: config.maxTurns,
      logger: logger.child({ component: 'agent-loop' }),
    });

    await startChatREPL({
      agent,
      tools: tools.map((t) => t.name),
      useColor: Boolean(process.stdout.isTTY),
      logger: logger.child({ component: 'repl' }),
    });
  } catch (err) {
    logger.error({ err }, 'Chat session failed');
    display.error(errorMessage(err));
    process.exitCode = 1;
  } finally {
    await session?.close();
  }
}
