import * as path from 'path';
import { loadAirportData } from './airports/airportDataLoader';
import { airportDirectory } from './airports/airportDirectory';
import { Config, SourceName } from './config/config';
import { FlightImporter } from './itinerary/flightImporter';
import { JobMonitor } from './monitor/jobMonitor';
import { DispatchQueue } from './queue/dispatchQueue';
import { retryPolicyFrom } from './queue/retryPolicy';
import { ScrapeOrchestrator } from './queue/scrapeOrchestrator';
import { ReviewQueue } from './review/reviewQueue';
import { createAdapters } from './scrapers';
import { RateLimiterRegistry } from './scrapers/rateLimiter';
import { SourceAdapter } from './scrapers/sourceAdapter';
import { JsonPhotoStore } from './storage/jsonPhotoStore';
import { PhotoStore } from './storage/photoStore';

export interface AppContext {
  config: Config;
  store: PhotoStore;
  monitor: JobMonitor;
  limiters: RateLimiterRegistry;
  orchestrator: ScrapeOrchestrator;
  reviewQueue: ReviewQueue;
  importer: FlightImporter;
}

export interface ContextOverrides {
  store?: PhotoStore;
  adapters?: Map<SourceName, SourceAdapter>;
  queue?: DispatchQueue;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Wires the store, monitor, orchestrator and services together. Nothing is
 * started: call `orchestrator.recover()` and `orchestrator.start()` to run.
 */
export async function createAppContext(config: Config, overrides: ContextOverrides = {}): Promise<AppContext> {
  if (config.airports.dataFile) {
    await loadAirportData(path.resolve(config.airports.dataFile), airportDirectory);
  }

  const store = overrides.store ?? new JsonPhotoStore(path.resolve(config.storage.dataDir));
  await store.init();

  const monitor = new JobMonitor(store, config.queue);
  await monitor.init();

  const limiters = new RateLimiterRegistry(config.scraping.sources);
  const orchestrator = new ScrapeOrchestrator({
    store,
    adapters: overrides.adapters ?? createAdapters(config.scraping),
    limiters,
    monitor,
    retry: retryPolicyFrom(config.scraping),
    matching: config.matching,
    rescanTickMs: config.queue.rescanTickMs,
    stalledTaskMinutes: config.queue.stalledTaskMinutes,
    queue: overrides.queue,
    sleep: overrides.sleep,
  });

  return {
    config,
    store,
    monitor,
    limiters,
    orchestrator,
    reviewQueue: new ReviewQueue(store, config.matching),
    importer: new FlightImporter(store, orchestrator, config.matching),
  };
}
