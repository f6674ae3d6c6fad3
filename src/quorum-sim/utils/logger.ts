/**
 * Quorum Sim - Logger
 *
 * pino-backed logger factory. Level comes from the caller or LOG_LEVEL.
 */

import pino, { Logger } from 'pino';

export type LogLevel =
  | 'fatal'
  | 'error'
  | 'warn'
  | 'info'
  | 'debug'
  | 'trace'
  | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

/**
 * Read LOG_LEVEL from the environment
 * @throws if it is set to something pino does not know
 */
export function getLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel | undefined {
  const level = env.LOG_LEVEL;
  if (!level) return undefined;

  if (!isLogLevel(level)) {
    throw new Error(
      `Unexpected LOG_LEVEL: ${level}. Expecting one of: ${JSON.stringify(LOG_LEVELS)}`
    );
  }
  return level;
}

export function logger(options?: { module?: string; level?: LogLevel }): Logger {
  let base: Logger = pino();

  if (options?.module) {
    base = base.child({ module: options.module });
  }

  const level = options?.level ?? getLogLevel();
  if (level) {
    base.level = level;
  }

  return base;
}
