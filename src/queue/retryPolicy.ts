import { ScrapingConfig } from '../config/config';

export interface RetryPolicy {
  maxAttempts: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
  /** 429 waits that do not use up an attempt */
  maxRateLimitDeferrals: number;
}

export function retryPolicyFrom(scraping: ScrapingConfig): RetryPolicy {
  return {
    maxAttempts: Math.max(1, scraping.maxAttempts),
    backoffBaseMs: Math.max(0, scraping.backoffBaseMs),
    backoffMaxMs: Math.max(0, scraping.backoffMaxMs),
    maxRateLimitDeferrals: Math.max(0, scraping.maxRateLimitDeferrals),
  };
}

/**
 * Delay before the retry that follows failed attempt number `attempt` (1-based).
 */
export function backoffDelay(attempt: number, policy: RetryPolicy): number {
  const exponent = Math.max(0, attempt - 1);
  return Math.min(policy.backoffBaseMs * 2 ** exponent, policy.backoffMaxMs);
}
