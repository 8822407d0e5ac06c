import { SourceConfig, SourceName } from '../config/config';
import { logger } from '../utils/logger';

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Sliding-window limiter for one photo site. At most `maxRequests` slots are
 * handed out in any `windowMs` span; callers queue in FIFO order and
 * `acquire()` never rejects.
 */
export class SlidingWindowRateLimiter {
  private timestamps: number[] = [];
  private chain: Promise<void> = Promise.resolve();
  private blockedUntil = 0;

  constructor(
    readonly domain: string,
    readonly maxRequests: number,
    readonly windowMs: number
  ) {
    if (maxRequests < 1 || windowMs <= 0) {
      throw new Error(`Invalid rate limit for ${domain}: ${maxRequests} per ${windowMs}ms`);
    }
  }

  acquire(): Promise<void> {
    const turn = this.chain.then(() => this.waitForSlot());
    this.chain = turn.catch((error: unknown) => {
      logger.error(`Rate limiter for ${this.domain} failed while waiting: ${error}`);
    });
    return turn;
  }

  /**
   * Blocks the whole source for `ms` after the site itself asked us to back off.
   */
  penalize(ms: number): void {
    const until = Date.now() + Math.max(0, ms);
    if (until > this.blockedUntil) {
      this.blockedUntil = until;
      logger.warn(`Rate limiter for ${this.domain} paused for ${Math.round(ms / 1000)}s after a 429`);
    }
  }

  /** Slots used in the current window. */
  inWindow(now: number = Date.now()): number {
    this.prune(now);
    return this.timestamps.length;
  }

  private prune(now: number): void {
    const cutoff = now - this.windowMs;
    while (this.timestamps.length > 0 && this.timestamps[0] <= cutoff) {
      this.timestamps.shift();
    }
  }

  private async waitForSlot(): Promise<void> {
    for (;;) {
      const now = Date.now();
      if (now < this.blockedUntil) {
        await sleep(this.blockedUntil - now);
        continue;
      }
      this.prune(now);
      if (this.timestamps.length < this.maxRequests) {
        this.timestamps.push(now);
        return;
      }
      const waitMs = this.timestamps[0] + this.windowMs - now;
      logger.debug(`${this.domain}: window full, waiting ${waitMs}ms`);
      await sleep(Math.max(1, waitMs));
    }
  }
}

/**
 * One limiter per source, shared by every worker.
 */
export class RateLimiterRegistry {
  private limiters = new Map<SourceName, SlidingWindowRateLimiter>();

  constructor(private readonly sources: Record<SourceName, SourceConfig>) {}

  forSource(source: SourceName): SlidingWindowRateLimiter {
    let limiter = this.limiters.get(source);
    if (!limiter) {
      const settings = this.sources[source];
      limiter = new SlidingWindowRateLimiter(settings.domain, settings.maxRequests, settings.windowSeconds * 1000);
      this.limiters.set(source, limiter);
    }
    return limiter;
  }
}
