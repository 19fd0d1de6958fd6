/**
 * Pino logger factory.
 *
 * Logs go to stderr as JSON: stdout carries the chat transcript, and for the
 * tool server it carries the JSON-RPC stream.
 */

import pino from 'pino';
import type { Logger } from 'pino';

export type { Logger } from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export function makeLogger(bindings?: Record<string, unknown>, level?: LogLevel): Logger {
  const isVitest = process.env.VITEST === 'true';
  const nodeEnv = process.env.NODE_ENV ?? 'development';

  return pino(
    {
      level: level ?? process.env.LOG_LEVEL ?? 'info',
      // Silence logs in test tooling
      enabled: !(isVitest || nodeEnv === 'test'),
      base: { ...bindings, app: 'roaming-agent' },
      messageKey: 'msg',
      timestamp: pino.stdTimeFunctions.isoTime,
      redact: { paths: ['apiKey', '*.apiKey', 'authorization', '*.authorization'], censor: '[REDACTED]' },
    },
    pino.destination({ dest: 2, sync: true }),
  );
}

/**
 * For tests - pino with enabled:false (preserves type, silences output)
 */
export function makeNoopLogger(): Logger {
  return pino({ enabled: false });
}
