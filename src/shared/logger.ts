import pino from 'pino';

/**
 * Structured Logger using Pino
 *
 * The assistant owns stdout for its prompt and replies, so every log line goes to stderr.
 *
 * **Configuration:**
 * - LOG_LEVEL: Set log level (error, warn, info, debug) - defaults to 'warn'
 * - NODE_ENV: 'development' uses pretty-printing, anything else uses JSON
 *
 * **Usage:**
 * ```typescript
 * import { logger } from '@shared/logger';
 *
 * logger.error({
 *   msg: 'Command failed',
 *   command: 'add',
 *   error: error.message,
 * });
 * ```
 */

const isDevelopment = process.env.NODE_ENV === 'development';
const logLevel = process.env.LOG_LEVEL || 'warn';
const STDERR = 2;

export const logger = pino(
  {
    level: logLevel,
    // Only use pino-pretty in local development (NOT in tests)
    transport: isDevelopment
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'HH:MM:ss Z',
            ignore: 'pid,hostname',
            destination: STDERR,
          },
        }
      : undefined,
    base: {
      env: process.env.NODE_ENV || 'production',
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  isDevelopment ? undefined : pino.destination(STDERR)
);

/**
 * Logger interface for dependency injection
 * Matches Pino logger structure
 */
export interface ILogger {
  info(msg: string): void;
  info(obj: Record<string, unknown>): void;
  warn(msg: string): void;
  warn(obj: Record<string, unknown>): void;
  error(msg: string): void;
  error(obj: Record<string, unknown>): void;
  debug(msg: string): void;
  debug(obj: Record<string, unknown>): void;
}
