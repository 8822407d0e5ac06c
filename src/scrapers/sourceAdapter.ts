import { RawCandidate, SourceName } from '../models/contracts';

export interface AdapterContext {
  /** Airports (IATA or ICAO) the registration is known to have flown through. */
  airportCodes: string[];
  /** Must be awaited before every request after the first one. */
  acquireSlot: () => Promise<void>;
}

export interface SourceAdapter {
  readonly source: SourceName;
  /**
   * Searches the site for photos of a registration.
   * Throws a taxonomy error (transient, permanent, structural, rate limited) on failure.
   */
  search(registration: string, ctx: AdapterContext): Promise<RawCandidate[]>;
}

/**
 * Wraps `ctx.acquireSlot` so the first call is free: the orchestrator already
 * took the slot for the adapter's first request.
 */
export function requestGate(ctx: AdapterContext): () => Promise<void> {
  let first = true;
  return async () => {
    if (first) {
      first = false;
      return;
    }
    await ctx.acquireSlot();
  };
}
