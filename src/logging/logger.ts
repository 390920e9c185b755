/**
 * Structured logger built on pino.
 *
 * Usage:
 * ```typescript
 * const log = createChildLogger({ component: 'Coordinator' });
 * log.info({ workflowId }, 'Workflow started');
 * ```
 */

import pino, { type Logger, type LevelWithSilent } from 'pino';

export type { Logger } from 'pino';

const LOG_LEVELS: readonly LevelWithSilent[] = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
];

/**
 * Narrow an arbitrary string to a pino level, falling back when unknown.
 */
export function parseLogLevel(value: string | undefined, fallback: LevelWithSilent = 'info'): LevelWithSilent {
  if (!value) {
    return fallback;
  }
  const normalized = value.toLowerCase();
  return LOG_LEVELS.find(level => level === normalized) ?? fallback;
}

export interface LoggerOptions {
  level?: LevelWithSilent;
  /** Extra bindings added to every line */
  base?: Record<string, unknown>;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    level: options.level ?? parseLogLevel(process.env.LOG_LEVEL),
    base: { service: 'agent-coordinator', ...options.base },
    timestamp: pino.stdTimeFunctions.isoTime,
    serializers: {
      err: pino.stdSerializers.err,
    },
  });
}

export const logger: Logger = createLogger();

export function createChildLogger(bindings: Record<string, unknown>, parent: Logger = logger): Logger {
  return parent.child(bindings);
}
