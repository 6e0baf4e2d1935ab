import { pino, levels, type Logger } from 'pino';

export type { Logger } from 'pino';

/**
 * Level for the base logger: `LOG_LEVEL` when pino knows it, otherwise
 * `info` in production and `debug` everywhere else.
 */
export function resolveLogLevel (value: string | undefined, nodeEnv: string | undefined): string {
  if (value !== undefined && (value === 'silent' || Object.hasOwn(levels.values, value))) {
    return value;
  }
  return nodeEnv === 'production' ? 'info' : 'debug';
}

/**
 * Base logger for the view layer.
 */
export const logger: Logger = pino({
  name: 'viewkit',
  level: resolveLogLevel(process.env.LOG_LEVEL, process.env.NODE_ENV),
});

if (process.env.LOG_LEVEL !== undefined && logger.level !== process.env.LOG_LEVEL) {
  logger.warn({ level: process.env.LOG_LEVEL }, 'Unknown LOG_LEVEL, using the default level');
}

/**
 * Logger that drops everything. Handy for tests and embedding.
 */
export const silentLogger: Logger = pino({ level: 'silent' });
