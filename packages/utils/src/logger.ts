/**
 * Logger
 * 
 * Pino-based structured logger for all packages.
 * Provides consistent logging across the workspace.
 */

import { pino } from 'pino';

const LOG_LEVEL = process.env['LOG_LEVEL'] ?? 'info';
const NODE_ENV = process.env['NODE_ENV'] ?? 'development';

// Pretty output only for an interactive terminal; pipes and CI get JSON lines
const prettyPrint = NODE_ENV === 'development' && process.stdout.isTTY === true;

export const logger = pino({
  level: LOG_LEVEL,
  formatters: {
    level: (label: string) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  base: {
    service: 'flightlog',
    env: NODE_ENV,
  },
  transport: prettyPrint ? {
    target: 'pino-pretty',
    options: {
      colorize: true,
      ignore: 'pid,hostname',
    },
  } : undefined,
});

export type Logger = typeof logger;

/**
 * Create a child logger with additional context
 */
export function createLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}
