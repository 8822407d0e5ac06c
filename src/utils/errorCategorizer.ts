/**
 * Centralized classification of scrape failures.
 *
 * Adapters throw taxonomy errors where they can tell what went wrong; anything
 * else (axios network errors, bare HTTP statuses, programming errors) is mapped
 * here so the orchestrator has a single place deciding retry vs. give up.
 */
import axios from 'axios';
import {
  PermanentScrapeError,
  RateLimitedError,
  StructuralParseError,
  TransientScrapeError,
  errorMessage,
} from './errorHandler';

export type ScrapeErrorKind = 'transient' | 'permanent' | 'blocked' | 'structural' | 'rate_limited';

export interface ScrapeErrorInfo {
  kind: ScrapeErrorKind;
  message: string;
  retryAfterMs?: number;
}

const DEFAULT_RETRY_AFTER_MS = 60_000;

const TRANSIENT_CODES = new Set([
  'ECONNABORTED',
  'ETIMEDOUT',
  'ECONNRESET',
  'ECONNREFUSED',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EPIPE',
  'ERR_NETWORK',
  'ERR_CANCELED',
]);

/**
 * Parses a Retry-After header (delta-seconds or HTTP date) into milliseconds.
 */
export function parseRetryAfter(header: unknown, now: number = Date.now()): number {
  if (typeof header !== 'string' || !header.trim()) {
    return DEFAULT_RETRY_AFTER_MS;
  }
  const seconds = Number(header.trim());
  if (Number.isFinite(seconds)) {
    return Math.max(0, seconds * 1000);
  }
  const at = Date.parse(header);
  if (Number.isFinite(at)) {
    return Math.max(0, at - now);
  }
  return DEFAULT_RETRY_AFTER_MS;
}

/**
 * Maps an HTTP status from a photo site to a taxonomy error, or null when the
 * status is a plain success.
 */
export function errorForStatus(
  status: number,
  source: string,
  url: string,
  retryAfterHeader?: unknown
): Error | null {
  if (status >= 200 && status < 300) return null;
  if (status === 429) {
    return new RateLimitedError(`${source} rate limited us (429) at ${url}`, parseRetryAfter(retryAfterHeader), source);
  }
  if (status === 403 || status === 401) {
    return new PermanentScrapeError(`${source} blocked the request (${status}) at ${url}`, 'blocked', source);
  }
  if (status === 404 || status === 410) {
    return new PermanentScrapeError(`${source} has no page for ${url} (${status})`, 'no_results', source);
  }
  if (status >= 500 || status === 408) {
    return new TransientScrapeError(`${source} returned ${status} for ${url}`, source);
  }
  return new PermanentScrapeError(`${source} returned unexpected status ${status} for ${url}`, 'no_results', source);
}

export function categorizeScrapeError(error: unknown): ScrapeErrorInfo {
  const message = errorMessage(error);

  if (error instanceof RateLimitedError) {
    return { kind: 'rate_limited', message, retryAfterMs: error.retryAfterMs };
  }
  if (error instanceof TransientScrapeError) {
    return { kind: 'transient', message };
  }
  if (error instanceof PermanentScrapeError) {
    // A site refusing us will keep refusing; that is a failure, not an empty result
    return { kind: error.reason === 'blocked' ? 'blocked' : 'permanent', message };
  }
  if (error instanceof StructuralParseError) {
    return { kind: 'structural', message };
  }

  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    if (status !== undefined) {
      const mapped = errorForStatus(status, 'source', error.config?.url || 'unknown url', error.response?.headers?.['retry-after']);
      if (mapped) return categorizeScrapeError(mapped);
    }
    if (error.code && TRANSIENT_CODES.has(error.code)) {
      return { kind: 'transient', message: `${error.code}: ${message}` };
    }
    return { kind: 'transient', message };
  }

  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    if (code && TRANSIENT_CODES.has(code)) {
      return { kind: 'transient', message: `${code}: ${message}` };
    }
    if (/timeout|timed? ?out|socket hang up|network/i.test(message)) {
      return { kind: 'transient', message };
    }
  }

  // Unknown failures are retried; a persistent bug still ends in `failed`
  return { kind: 'transient', message };
}
