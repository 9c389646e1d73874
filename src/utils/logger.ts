/**
 * Structured logging with Pino
 */

import pino from 'pino';
import * as dotenv from 'dotenv';

dotenv.config();

const LOG_LEVEL = process.env.LOG_LEVEL || 'info';
const LOG_PRETTY = process.env.LOG_PRETTY === 'true';

/**
 * Create Pino logger instance
 */
export const logger = pino({
  level: LOG_LEVEL,
  transport: LOG_PRETTY
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss',
          ignore: 'pid,hostname',
        },
      }
    : undefined,
});

/**
 * Log progress after each merged batch
 */
export function logBatchProgress(progress: {
  round: number;
  dispatched: number;
  budget: number;
  discovered: number;
  pending: number;
}) {
  logger.info(
    {
      ...progress,
      percentage: Math.round((progress.dispatched / progress.budget) * 100),
    },
    'Batch merged'
  );
}

/**
 * Log a per-URL failure that was absorbed at its boundary
 */
export function logAbsorbedFailure(url: string, kind: string, detail: string | number) {
  logger.warn({ url, kind, detail }, 'URL contributed no links');
}
