import { SourceName } from '../config/config';

export type { SourceName };

export interface AirportRef {
  raw: string;
  iata: string | null;
  icao: string | null;
  timezone: string;
  known: boolean;
}

/**
 * A flight row as produced by any import format, before normalization.
 */
export interface RawFlightRow {
  registration: string;
  originCode: string;
  destinationCode: string;
  departureLocal: string;       // "YYYY-MM-DD HH:mm[:ss]" or ISO local datetime
  arrivalLocal?: string;        // full local datetime, or time of day only ("HH:mm")
  durationMinutes?: number;     // used when no arrival is given
  flightNumber?: string;
  airline?: string;
  aircraftType?: string;
  importSource?: string;
}

export interface Flight {
  id: string;
  naturalKey: string;
  registration: string;
  flightNumber: string | null;
  airline: string | null;
  aircraftType: string | null;
  origin: AirportRef;
  destination: AirportRef;
  departureLocal: string;       // "YYYY-MM-DDTHH:mm:ss" in origin local time
  arrivalLocal: string;         // in destination local time
  originUtcOffsetMinutes: number;
  destinationUtcOffsetMinutes: number;
  departureUtc: string;
  arrivalUtc: string;
  departureDate: string;        // local calendar date at origin
  arrivalDate: string;          // local calendar date at destination
  degradedPrecision: boolean;
  importSource: string | null;
  importedAt: string;
}

export type ScrapeJobState = 'queued' | 'running' | 'retrying' | 'succeeded' | 'failed';

export const ACTIVE_JOB_STATES: readonly ScrapeJobState[] = ['queued', 'running', 'retrying'];
export const TERMINAL_JOB_STATES: readonly ScrapeJobState[] = ['succeeded', 'failed'];

export interface ScrapeJob {
  id: string;
  registration: string;
  source: SourceName;
  generation: number;
  state: ScrapeJobState;
  attemptCount: number;
  lastError: string | null;
  lastErrorKind: string | null;
  photosFound: number;
  scheduledAt: string;
  startedAt: string | null;
  completedAt: string | null;
  nextScanAt: string | null;
}

export type ScrapeRunOutcome = 'success' | 'no_results' | 'failed';

export interface ScrapeRun {
  jobId: string;
  generation: number;
  registration: string;
  source: SourceName;
  outcome: ScrapeRunOutcome;
  photosFound: number;
  attempts: number;
  durationMs: number;
  error: string | null;
  startedAt: string;
  finishedAt: string;
}

/**
 * A photo record exactly as an adapter scraped it.
 */
export interface RawCandidate {
  source: SourceName;
  sourcePhotoId: string;
  registration: string;
  sourceUrl: string;
  thumbnailUrl: string | null;
  fullImageUrl: string | null;
  photographer: string | null;
  airportCode: string | null;
  photoDate: string | null;     // as reported by the site, normalized to YYYY-MM-DD when parseable
}

export type ReviewState = 'pending' | 'approved' | 'rejected';

export interface MatchReasons {
  registration: boolean;
  airport: string | null;
  dateDistanceDays: number | null;
  degradedPrecision: boolean;
}

export interface CandidatePhoto {
  id: string;
  source: SourceName;
  sourcePhotoId: string;
  registration: string;
  sourceUrl: string;
  thumbnailUrl: string | null;
  fullImageUrl: string | null;
  photographer: string | null;
  rawAirportCode: string | null;
  rawDate: string | null;
  airportCode: string | null;
  photoDate: string | null;
  score: number;
  matchedFlightId: string | null;
  matchReasons: MatchReasons | null;
  reviewState: ReviewState;
  reviewComment: string | null;
  decidedAt: string | null;
  generation: number;
  firstSeenAt: string;
  lastSeenAt: string;
}

export interface QueueControls {
  paused: boolean;
  concurrency: number;
  rescanIntervalHours: number;
}

export interface DispatchMessage {
  jobId: string;
  generation: number;
}

export function candidateId(source: SourceName, sourcePhotoId: string): string {
  return `${source}:${sourcePhotoId}`;
}

export function jobId(registration: string, source: SourceName): string {
  return `${registration}:${source}`;
}
