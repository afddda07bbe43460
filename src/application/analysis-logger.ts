import type { BaseLogger } from 'pino';
import { createLogger } from '../infrastructure/logger.js';

/**
 * The slice of a logger the analysis core writes to.
 * Satisfied by a pino logger and by Fastify's `request.log`.
 */
export type AnalysisLogger = Pick<BaseLogger, 'error' | 'warn' | 'info' | 'debug'>;

/** Fallback used when a caller does not inject its own logger. */
export const defaultAnalysisLogger: AnalysisLogger = createLogger().child({ module: 'regex-analysis' });
