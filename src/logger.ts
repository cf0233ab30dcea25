/**
 * Structured logger using pino.
 *
 * Every component gets a child logger tagged with its name:
 *   const log = createLogger('ledger');
 *
 * Output goes to stderr so stdout stays free for CLI reports and the
 * MCP stdio transport. Level comes from LOG_LEVEL (default: info).
 */

import pino from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogData = Record<string, string | number | boolean | null | undefined | string[]>;

export interface Logger {
  debug: (message: string, data?: LogData) => void;
  info: (message: string, data?: LogData) => void;
  warn: (message: string, data?: LogData) => void;
  error: (message: string, data?: LogData) => void;
}

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

function resolveLevel(): LogLevel {
  const raw = process.env['LOG_LEVEL']?.toLowerCase();
  return LEVELS.find((level) => level === raw) ?? 'info';
}

const baseLogger = pino(
  {
    level: resolveLevel(),
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  pino.destination({ dest: 2, sync: true })
);

/**
 * Create a logger for a specific component.
 */
export function createLogger(component: string): Logger {
  const logger = baseLogger.child({ component });

  return {
    debug: (message, data) => logger.debug(data ?? {}, message),
    info: (message, data) => logger.info(data ?? {}, message),
    warn: (message, data) => logger.warn(data ?? {}, message),
    error: (message, data) => logger.error(data ?? {}, message),
  };
}
