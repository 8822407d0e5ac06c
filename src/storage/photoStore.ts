import {
  CandidatePhoto,
  Flight,
  MatchReasons,
  QueueControls,
  ReviewState,
  ScrapeJob,
  ScrapeJobState,
  ScrapeRun,
} from '../models/contracts';

export interface UpsertResult<T> {
  record: T;
  created: boolean;
}

/**
 * Raw, scrape-owned fields of a candidate. Everything else (score, match,
 * review state) is owned by the scorer and the reviewer.
 */
export type CandidateFields = Pick<
  CandidatePhoto,
  | 'source'
  | 'sourcePhotoId'
  | 'registration'
  | 'sourceUrl'
  | 'thumbnailUrl'
  | 'fullImageUrl'
  | 'photographer'
  | 'rawAirportCode'
  | 'rawDate'
  | 'airportCode'
  | 'photoDate'
  | 'generation'
>;

export interface CandidateMatch {
  score: number;
  matchedFlightId: string | null;
  matchReasons: MatchReasons | null;
}

export interface CandidateQuery {
  registration?: string;
  reviewStates?: ReviewState[];
}

export interface ReviewTransitionResult {
  candidate: CandidatePhoto | null;
  applied: boolean;
}

export type JobPatch = Partial<Omit<ScrapeJob, 'id' | 'registration' | 'source'>>;

/**
 * The system of record. Upserts are keyed by natural keys and every
 * read-modify-write is atomic, so concurrent workers commute.
 */
export interface PhotoStore {
  init(): Promise<void>;

  upsertFlight(flight: Flight): Promise<UpsertResult<Flight>>;
  getFlight(id: string): Promise<Flight | null>;
  listFlights(registration?: string): Promise<Flight[]>;
  deleteFlight(id: string): Promise<Flight | null>;

  upsertCandidate(fields: CandidateFields, seenAt: string): Promise<UpsertResult<CandidatePhoto>>;
  getCandidate(id: string): Promise<CandidatePhoto | null>;
  listCandidates(query?: CandidateQuery): Promise<CandidatePhoto[]>;
  updateCandidateMatches(updates: Map<string, CandidateMatch>): Promise<number>;
  /** Compare-and-set from pending; never moves a decided candidate. */
  transitionReview(id: string, to: Exclude<ReviewState, 'pending'>, comment: string | null, decidedAt: string): Promise<ReviewTransitionResult>;
  deleteCandidate(id: string): Promise<boolean>;

  getJob(id: string): Promise<ScrapeJob | null>;
  listJobs(): Promise<ScrapeJob[]>;
  createJobIfMissing(job: ScrapeJob): Promise<boolean>;
  /**
   * Applies the patch only if the job is in one of `from` (and at
   * `generation`, when given). Returns the updated job or null.
   */
  transitionJob(id: string, from: readonly ScrapeJobState[], patch: JobPatch, generation?: number): Promise<ScrapeJob | null>;
  /** Rewrites every job through `fn`; returning null leaves a job untouched. */
  updateJobs(fn: (job: ScrapeJob) => ScrapeJob | null): Promise<ScrapeJob[]>;

  appendRun(run: ScrapeRun): Promise<void>;
  listRuns(limit?: number): Promise<ScrapeRun[]>;

  getControls(defaults: QueueControls): Promise<QueueControls>;
  saveControls(controls: QueueControls): Promise<void>;

  /** Removes flights, jobs, runs and every candidate that is not approved. */
  reset(): Promise<void>;
}
