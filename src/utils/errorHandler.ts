import { logger } from './logger';

export class TailspotterError extends Error {
  constructor(
    message: string,
    public code: string,
    public statusCode: number = 500,
    public recoverable: boolean = false
  ) {
    super(message);
    this.name = 'TailspotterError';
  }
}

/**
 * A malformed import row. The row is skipped and reported; the batch continues.
 */
export class DataQualityError extends TailspotterError {
  constructor(message: string, public rowIndex?: number) {
    super(message, 'DATA_QUALITY', 422, false);
    this.name = 'DataQualityError';
  }
}

/**
 * Network failure, timeout or 5xx from a photo site. Retried with backoff.
 */
export class TransientScrapeError extends TailspotterError {
  constructor(message: string, public source?: string) {
    super(message, 'SCRAPE_TRANSIENT', 502, true);
    this.name = 'TransientScrapeError';
  }
}

/**
 * The site answered definitively: no photos, or it refuses us outright.
 * The job completes with zero candidates.
 */
export class PermanentScrapeError extends TailspotterError {
  constructor(message: string, public reason: 'no_results' | 'blocked', public source?: string) {
    super(message, 'SCRAPE_PERMANENT', 404, false);
    this.name = 'PermanentScrapeError';
  }
}

/**
 * The page no longer looks like what the adapter expects; the adapter needs updating.
 */
export class StructuralParseError extends TailspotterError {
  constructor(message: string, public source?: string) {
    super(message, 'SCRAPE_STRUCTURAL', 502, false);
    this.name = 'StructuralParseError';
  }
}

/**
 * The site itself asked us to slow down (HTTP 429). Handled as a wait, never
 * surfaced as a job failure.
 */
export class RateLimitedError extends TailspotterError {
  constructor(message: string, public retryAfterMs: number, public source?: string) {
    super(message, 'SCRAPE_RATE_LIMITED', 429, true);
    this.name = 'RateLimitedError';
  }
}

/**
 * A job that exhausted its attempts or hit a non-retryable failure.
 */
export class TerminalScrapeFailure extends TailspotterError {
  constructor(message: string, public jobId: string, public kind: string) {
    super(message, 'SCRAPE_TERMINAL', 502, false);
    this.name = 'TerminalScrapeFailure';
  }
}

export class ReviewTransitionError extends TailspotterError {
  constructor(message: string) {
    super(message, 'REVIEW_TRANSITION', 409, false);
    this.name = 'ReviewTransitionError';
  }
}

/**
 * Another process held a store document lock past the wait deadline.
 */
export class StoreLockTimeoutError extends TailspotterError {
  constructor(public lockPath: string, waitedMs: number) {
    super(`Timed out after ${waitedMs}ms waiting for ${lockPath}`, 'STORE_LOCK_TIMEOUT', 503, true);
    this.name = 'StoreLockTimeoutError';
  }
}

export class NotFoundError extends TailspotterError {
  constructor(message: string) {
    super(message, 'NOT_FOUND', 404, false);
    this.name = 'NotFoundError';
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Handles errors with appropriate logging
 */
export function handleError(error: unknown, context: string): void {
  if (error instanceof TailspotterError) {
    logger.error(`[${context}] ${error.code}: ${error.message}`);
    if (error.recoverable) {
      logger.info(`[${context}] Error is recoverable, it will be retried`);
    }
  } else if (error instanceof Error) {
    logger.error(`[${context}] Unexpected error: ${error.message}`);
    if (error.stack) {
      logger.debug(`[${context}] Stack trace: ${error.stack}`);
    }
  } else {
    logger.error(`[${context}] Unexpected error: ${String(error)}`);
  }
}
