import pino from 'pino';
import type { Logger } from 'pino';

/**
 * Builds the process logger.
 *
 * Level comes from the argument, then LOG_LEVEL, then `info`.
 */
export function createLogger(level: string = process.env['LOG_LEVEL'] ?? 'info'): Logger {
  return pino({ level, base: { service: 'node-diag' } });
}
