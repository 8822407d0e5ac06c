import { ScrapingConfig, SourceName } from '../config/config';
import { AirlinersNetAdapter } from './airlinersNetAdapter';
import { AirplanePicturesAdapter } from './airplanePicturesAdapter';
import { JetPhotosAdapter } from './jetPhotosAdapter';
import { PlanespottersAdapter } from './planespottersAdapter';
import { SiteClient } from './siteClient';
import { SourceAdapter } from './sourceAdapter';

export type { AdapterContext, SourceAdapter } from './sourceAdapter';
export { RateLimiterRegistry, SlidingWindowRateLimiter } from './rateLimiter';

const BASE_URLS: Record<SourceName, string> = {
  jetphotos: 'https://www.jetphotos.com',
  airlinersnet: 'https://www.airliners.net',
  planespotters: 'https://www.planespotters.net',
  airplane_pictures: 'https://airplane-pictures.net',
};

/**
 * Builds one adapter per enabled source.
 */
export function createAdapters(scraping: ScrapingConfig): Map<SourceName, SourceAdapter> {
  const clientFor = (source: SourceName): SiteClient =>
    new SiteClient({
      source,
      baseUrl: BASE_URLS[source],
      timeoutMs: scraping.requestTimeoutMs,
      userAgent: scraping.userAgent,
    });

  const all: SourceAdapter[] = [
    new JetPhotosAdapter(clientFor('jetphotos')),
    new AirlinersNetAdapter(clientFor('airlinersnet')),
    new PlanespottersAdapter(clientFor('planespotters')),
    new AirplanePicturesAdapter(clientFor('airplane_pictures')),
  ];

  const adapters = new Map<SourceName, SourceAdapter>();
  for (const adapter of all) {
    if (scraping.sources[adapter.source].enabled) {
      adapters.set(adapter.source, adapter);
    }
  }
  return adapters;
}
