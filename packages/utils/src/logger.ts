/**
 * Logger
 *
 * Pino-based structured logger for all packages.
 * Provides consistent logging across the monorepo.
 */

import { pino, type Logger as PinoLogger } from 'pino';

const NODE_ENV = process.env['NODE_ENV'] ?? 'development';
const LOG_LEVEL = process.env['LOG_LEVEL'] ?? (NODE_ENV === 'test' ? 'silent' : 'info');

export const logger: Logger = pino({
  level: LOG_LEVEL,
  formatters: {
    level: (label: string) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  base: {
    service: 'subburn',
    env: NODE_ENV,
  },
  transport: NODE_ENV === 'development' ? {
    target: 'pino-pretty',
    options: {
      colorize: true,
      ignore: 'pid,hostname,service,env',
      destination: 2,
    },
  } : undefined,
});

export type Logger = PinoLogger;

/**
 * Create a child logger with additional context
 */
export function createLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}
