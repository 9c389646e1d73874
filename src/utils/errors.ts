/**
 * Error types that cross module boundaries
 *
 * Per-URL failures (fetch, robots, extraction) are values, not exceptions.
 * Only the errors below are ever thrown.
 */

export type CrawlerErrorCode = 'SEED_RESOLUTION_FAILED' | 'CONFIGURATION_INVALID';

export class CrawlerError extends Error {
  readonly code: CrawlerErrorCode;

  constructor(code: CrawlerErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CrawlerError';
    this.code = code;
  }
}

/**
 * No seeds means no crawl: the run aborts
 */
export class SeedResolutionError extends CrawlerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('SEED_RESOLUTION_FAILED', message, options);
    this.name = 'SeedResolutionError';
  }
}

/**
 * Startup misconfiguration (bad flags, missing credentials)
 */
export class ConfigurationError extends CrawlerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIGURATION_INVALID', message, options);
    this.name = 'ConfigurationError';
  }
}

/**
 * Message of an unknown thrown value
 *
 * Errors raised inside Node's own fetch and timers (DOMException, undici
 * errors) come from another realm under a VM context, so `instanceof Error`
 * cannot be relied on.
 */
export function errorMessage(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}

/**
 * Name of an unknown thrown value (TimeoutError, AbortError, ...)
 */
export function errorName(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'name' in error && typeof error.name === 'string') {
    return error.name;
  }
  return undefined;
}
