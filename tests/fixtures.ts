import * as path from 'path';
import { Config, DEFAULT_CONFIG } from '../src/config/config';
import { RawCandidate, RawFlightRow, ScrapeJob, SourceName } from '../src/models/contracts';
import { AdapterContext, SourceAdapter } from '../src/scrapers/sourceAdapter';
import { CandidateFields } from '../src/storage/photoStore';

let dirCounter = 0;

export function tempDataDir(name: string): string {
  dirCounter++;
  return path.join(process.cwd(), 'tests', 'tmp', `${name}-${process.pid}-${Date.now()}-${dirCounter}`);
}

export function testConfig(dataDir: string): Config {
  return {
    ...DEFAULT_CONFIG,
    storage: { dataDir },
    queue: { ...DEFAULT_CONFIG.queue, concurrency: 2 },
  };
}

export function flightRow(overrides: Partial<RawFlightRow> = {}): RawFlightRow {
  return {
    registration: 'N123AB',
    originCode: 'LAX',
    destinationCode: 'JFK',
    departureLocal: '2024-03-01 23:10',
    arrivalLocal: '07:30',
    flightNumber: 'AA100',
    ...overrides,
  };
}

export function rawCandidate(overrides: Partial<RawCandidate> = {}): RawCandidate {
  const sourcePhotoId = overrides.sourcePhotoId ?? '1001';
  return {
    source: 'jetphotos',
    sourcePhotoId,
    registration: 'N123AB',
    sourceUrl: `https://www.jetphotos.com/photo/${sourcePhotoId}`,
    thumbnailUrl: null,
    fullImageUrl: null,
    photographer: null,
    airportCode: null,
    photoDate: null,
    ...overrides,
  };
}

export function candidateFields(overrides: Partial<CandidateFields> = {}): CandidateFields {
  return {
    source: 'jetphotos',
    sourcePhotoId: '1001',
    registration: 'N123AB',
    sourceUrl: 'https://www.jetphotos.com/photo/1001',
    thumbnailUrl: 'https://cdn.example.test/1001.jpg',
    fullImageUrl: null,
    photographer: 'A. Spotter',
    rawAirportCode: 'KLAX',
    rawDate: '2024-03-01',
    airportCode: 'LAX',
    photoDate: '2024-03-01',
    generation: 1,
    ...overrides,
  };
}

export function scrapeJob(overrides: Partial<ScrapeJob> = {}): ScrapeJob {
  return {
    id: 'N123AB:jetphotos',
    registration: 'N123AB',
    source: 'jetphotos',
    generation: 1,
    state: 'queued',
    attemptCount: 0,
    lastError: null,
    lastErrorKind: null,
    photosFound: 0,
    scheduledAt: '2024-04-01T00:00:00.000Z',
    startedAt: null,
    completedAt: null,
    nextScanAt: null,
    ...overrides,
  };
}

export type AdapterStep = RawCandidate[] | Error;

/**
 * Plays back a fixed list of results, then repeats `fallback` for every later call.
 */
export class ScriptedAdapter implements SourceAdapter {
  readonly calls: string[] = [];
  readonly contexts: AdapterContext[] = [];
  active = 0;
  maxActive = 0;

  constructor(
    readonly source: SourceName,
    private readonly steps: AdapterStep[] = [],
    private readonly fallback: AdapterStep = [],
    private readonly delayMs = 0
  ) {}

  async search(registration: string, ctx: AdapterContext): Promise<RawCandidate[]> {
    this.calls.push(registration);
    this.contexts.push(ctx);
    this.active++;
    this.maxActive = Math.max(this.maxActive, this.active);
    try {
      if (this.delayMs > 0) {
        await new Promise((resolve) => setTimeout(resolve, this.delayMs));
      }
      const step = this.steps.shift() ?? this.fallback;
      if (step instanceof Error) throw step;
      return step;
    } finally {
      this.active--;
    }
  }
}
