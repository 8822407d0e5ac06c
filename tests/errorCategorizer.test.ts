import { describe, it, expect } from 'vitest';
import { AxiosError } from 'axios';
import { categorizeScrapeError, errorForStatus, parseRetryAfter } from '../src/utils/errorCategorizer';
import {
  PermanentScrapeError,
  RateLimitedError,
  StructuralParseError,
  TransientScrapeError,
} from '../src/utils/errorHandler';

describe('errorCategorizer', () => {
  describe('errorForStatus', () => {
    it('should return null for success statuses', () => {
      expect(errorForStatus(200, 'jetphotos', '/x')).toBeNull();
      expect(errorForStatus(204, 'jetphotos', '/x')).toBeNull();
    });

    it('should map 429 to a rate limit with the Retry-After delay', () => {
      const error = errorForStatus(429, 'jetphotos', '/x', '120');
      expect(error).toBeInstanceOf(RateLimitedError);
      expect(error instanceof RateLimitedError && error.retryAfterMs).toBe(120000);
    });

    it('should map refusals and missing pages to permanent errors', () => {
      const blocked = errorForStatus(403, 'planespotters', '/x');
      const missing = errorForStatus(404, 'planespotters', '/x');
      expect(blocked instanceof PermanentScrapeError && blocked.reason).toBe('blocked');
      expect(missing instanceof PermanentScrapeError && missing.reason).toBe('no_results');
    });

    it('should map server errors and timeouts to transient errors', () => {
      expect(errorForStatus(503, 'airlinersnet', '/x')).toBeInstanceOf(TransientScrapeError);
      expect(errorForStatus(408, 'airlinersnet', '/x')).toBeInstanceOf(TransientScrapeError);
    });
  });

  describe('parseRetryAfter', () => {
    it('should read delta-seconds and HTTP dates', () => {
      expect(parseRetryAfter('5')).toBe(5000);
      expect(parseRetryAfter('Wed, 21 Oct 2015 07:28:30 GMT', Date.parse('Wed, 21 Oct 2015 07:28:00 GMT'))).toBe(30000);
    });

    it('should default to a minute when the header is missing or unreadable', () => {
      expect(parseRetryAfter(undefined)).toBe(60000);
      expect(parseRetryAfter('soon')).toBe(60000);
    });
  });

  describe('categorizeScrapeError', () => {
    it('should keep the kind of taxonomy errors', () => {
      expect(categorizeScrapeError(new StructuralParseError('layout changed')).kind).toBe('structural');
      expect(categorizeScrapeError(new PermanentScrapeError('none', 'no_results')).kind).toBe('permanent');
      expect(categorizeScrapeError(new PermanentScrapeError('refused', 'blocked')).kind).toBe('blocked');
      expect(categorizeScrapeError(new TransientScrapeError('502')).kind).toBe('transient');
      expect(categorizeScrapeError(new RateLimitedError('slow down', 1500))).toEqual({
        kind: 'rate_limited',
        message: 'slow down',
        retryAfterMs: 1500,
      });
    });

    it('should treat network failures as transient', () => {
      expect(categorizeScrapeError(new AxiosError('timeout of 30000ms exceeded', 'ECONNABORTED'))).toEqual({
        kind: 'transient',
        message: 'ECONNABORTED: timeout of 30000ms exceeded',
      });
      const reset = Object.assign(new Error('read failed'), { code: 'ECONNRESET' });
      expect(categorizeScrapeError(reset).message).toBe('ECONNRESET: read failed');
    });

    it('should retry unknown failures', () => {
      expect(categorizeScrapeError('boom')).toEqual({ kind: 'transient', message: 'boom' });
    });
  });
});
