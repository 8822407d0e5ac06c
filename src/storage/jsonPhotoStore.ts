import * as fs from 'fs-extra';
import * as path from 'path';
import {
  CandidatePhoto,
  Flight,
  QueueControls,
  ScrapeJob,
  ScrapeJobState,
  ScrapeRun,
  candidateId,
} from '../models/contracts';
import { logger } from '../utils/logger';
import {
  DocumentGuard,
  keyedCollection,
  listOf,
  plainObject,
  readDocument,
  sweepStaleTempFiles,
  writeDocument,
} from './jsonStore';
import { KeyedMutex, withFileLock } from './locks';
import {
  CandidateFields,
  CandidateMatch,
  CandidateQuery,
  JobPatch,
  PhotoStore,
  ReviewTransitionResult,
  UpsertResult,
} from './photoStore';

const RUN_HISTORY_LIMIT = 500;

type Collection<T> = Record<string, T>;

interface StoredDocument<T> {
  path: string;
  empty: () => T;
  guard: DocumentGuard<T>;
}

function isScrapeRun(item: unknown): item is ScrapeRun {
  return typeof item === 'object' && item !== null && 'jobId' in item && typeof item.jobId === 'string';
}

/**
 * File-backed store: one JSON document per collection under `dataDir`.
 * Each mutation takes an in-process mutex and a lock file, re-reads the
 * document, applies the change and writes it back atomically.
 */
export class JsonPhotoStore implements PhotoStore {
  private mutex = new KeyedMutex();
  private flightsDoc: StoredDocument<Collection<Flight>>;
  private candidatesDoc: StoredDocument<Collection<CandidatePhoto>>;
  private jobsDoc: StoredDocument<Collection<ScrapeJob>>;
  private runsDoc: StoredDocument<ScrapeRun[]>;
  private controlsDoc: StoredDocument<Partial<QueueControls>>;

  constructor(private readonly dataDir: string) {
    const doc = <T>(file: string, empty: () => T, guard: DocumentGuard<T>): StoredDocument<T> => ({
      path: path.join(dataDir, file),
      empty,
      guard,
    });
    this.flightsDoc = doc('flights.json', () => ({}), keyedCollection<Flight>());
    this.candidatesDoc = doc('candidates.json', () => ({}), keyedCollection<CandidatePhoto>());
    this.jobsDoc = doc('jobs.json', () => ({}), keyedCollection<ScrapeJob>());
    this.runsDoc = doc('runs.json', () => [], listOf(isScrapeRun));
    this.controlsDoc = doc('controls.json', () => ({}), plainObject<QueueControls>());
  }

  async init(): Promise<void> {
    await fs.ensureDir(this.dataDir);
    const removed = await sweepStaleTempFiles(this.dataDir);
    if (removed > 0) {
      logger.info(`Removed ${removed} stale temp file(s) from ${this.dataDir}`);
    }
  }

  private read<T>(doc: StoredDocument<T>): Promise<T> {
    return readDocument(doc.path, doc.empty(), doc.guard);
  }

  private mutate<T, R>(doc: StoredDocument<T>, fn: (data: T) => R): Promise<R> {
    return this.mutex.run(doc.path, () =>
      withFileLock(`${doc.path}.lock`, async () => {
        const data = await this.read(doc);
        const result = fn(data);
        await writeDocument(doc.path, data);
        return result;
      })
    );
  }

  // Flights

  async upsertFlight(flight: Flight): Promise<UpsertResult<Flight>> {
    return this.mutate(this.flightsDoc, (flights) => {
      const existing = flights[flight.id];
      if (existing) {
        return { record: existing, created: false };
      }
      flights[flight.id] = flight;
      return { record: flight, created: true };
    });
  }

  async getFlight(id: string): Promise<Flight | null> {
    const flights = await this.read(this.flightsDoc);
    return flights[id] ?? null;
  }

  async listFlights(registration?: string): Promise<Flight[]> {
    const flights = Object.values(await this.read(this.flightsDoc));
    const filtered = registration ? flights.filter(f => f.registration === registration) : flights;
    return filtered.sort((a, b) => a.departureUtc.localeCompare(b.departureUtc) || a.id.localeCompare(b.id));
  }

  async deleteFlight(id: string): Promise<Flight | null> {
    return this.mutate(this.flightsDoc, (flights) => {
      const existing = flights[id] ?? null;
      delete flights[id];
      return existing;
    });
  }

  // Candidates

  async upsertCandidate(fields: CandidateFields, seenAt: string): Promise<UpsertResult<CandidatePhoto>> {
    const id = candidateId(fields.source, fields.sourcePhotoId);
    return this.mutate(this.candidatesDoc, (candidates) => {
      const existing = candidates[id];
      if (existing) {
        // Raw fields are last-write-wins; score, match and review state are kept
        const refreshed: CandidatePhoto = {
          ...existing,
          ...fields,
          id,
          generation: Math.max(existing.generation, fields.generation),
          lastSeenAt: seenAt,
        };
        candidates[id] = refreshed;
        return { record: refreshed, created: false };
      }
      const created: CandidatePhoto = {
        ...fields,
        id,
        score: 0,
        matchedFlightId: null,
        matchReasons: null,
        reviewState: 'pending',
        reviewComment: null,
        decidedAt: null,
        firstSeenAt: seenAt,
        lastSeenAt: seenAt,
      };
      candidates[id] = created;
      return { record: created, created: true };
    });
  }

  async getCandidate(id: string): Promise<CandidatePhoto | null> {
    const candidates = await this.read(this.candidatesDoc);
    return candidates[id] ?? null;
  }

  async listCandidates(query: CandidateQuery = {}): Promise<CandidatePhoto[]> {
    const candidates = Object.values(await this.read(this.candidatesDoc));
    return candidates.filter(c =>
      (!query.registration || c.registration === query.registration) &&
      (!query.reviewStates || query.reviewStates.includes(c.reviewState))
    );
  }

  async updateCandidateMatches(updates: Map<string, CandidateMatch>): Promise<number> {
    if (updates.size === 0) return 0;
    return this.mutate(this.candidatesDoc, (candidates) => {
      let changed = 0;
      for (const [id, match] of updates) {
        const existing = candidates[id];
        if (!existing) continue;
        candidates[id] = { ...existing, ...match };
        changed++;
      }
      return changed;
    });
  }

  async transitionReview(
    id: string,
    to: 'approved' | 'rejected',
    comment: string | null,
    decidedAt: string
  ): Promise<ReviewTransitionResult> {
    return this.mutate(this.candidatesDoc, (candidates) => {
      const existing = candidates[id];
      if (!existing) return { candidate: null, applied: false };
      if (existing.reviewState !== 'pending') return { candidate: existing, applied: false };
      const updated: CandidatePhoto = { ...existing, reviewState: to, reviewComment: comment, decidedAt };
      candidates[id] = updated;
      return { candidate: updated, applied: true };
    });
  }

  async deleteCandidate(id: string): Promise<boolean> {
    return this.mutate(this.candidatesDoc, (candidates) => {
      const existed = id in candidates;
      delete candidates[id];
      return existed;
    });
  }

  // Jobs

  async getJob(id: string): Promise<ScrapeJob | null> {
    const jobs = await this.read(this.jobsDoc);
    return jobs[id] ?? null;
  }

  async listJobs(): Promise<ScrapeJob[]> {
    const jobs = Object.values(await this.read(this.jobsDoc));
    return jobs.sort((a, b) => a.id.localeCompare(b.id));
  }

  async createJobIfMissing(job: ScrapeJob): Promise<boolean> {
    return this.mutate(this.jobsDoc, (jobs) => {
      if (jobs[job.id]) return false;
      jobs[job.id] = job;
      return true;
    });
  }

  async transitionJob(
    id: string,
    from: readonly ScrapeJobState[],
    patch: JobPatch,
    generation?: number
  ): Promise<ScrapeJob | null> {
    return this.mutate(this.jobsDoc, (jobs) => {
      const existing = jobs[id];
      if (!existing || !from.includes(existing.state)) return null;
      if (generation !== undefined && existing.generation !== generation) return null;
      const updated: ScrapeJob = { ...existing, ...patch };
      jobs[id] = updated;
      return updated;
    });
  }

  async updateJobs(fn: (job: ScrapeJob) => ScrapeJob | null): Promise<ScrapeJob[]> {
    return this.mutate(this.jobsDoc, (jobs) => {
      const changed: ScrapeJob[] = [];
      for (const job of Object.values(jobs)) {
        const next = fn(job);
        if (next) {
          jobs[job.id] = next;
          changed.push(next);
        }
      }
      return changed;
    });
  }

  // Runs

  async appendRun(run: ScrapeRun): Promise<void> {
    await this.mutate(this.runsDoc, (runs) => {
      runs.push(run);
      if (runs.length > RUN_HISTORY_LIMIT) {
        runs.splice(0, runs.length - RUN_HISTORY_LIMIT);
      }
    });
  }

  async listRuns(limit: number = RUN_HISTORY_LIMIT): Promise<ScrapeRun[]> {
    const runs = await this.read(this.runsDoc);
    return runs.slice(-limit);
  }

  // Controls

  async getControls(defaults: QueueControls): Promise<QueueControls> {
    const stored = await this.read(this.controlsDoc);
    return { ...defaults, ...stored };
  }

  async saveControls(controls: QueueControls): Promise<void> {
    await this.mutate(this.controlsDoc, (stored) => {
      Object.assign(stored, controls);
    });
  }

  async reset(): Promise<void> {
    await this.mutate(this.flightsDoc, (flights) => {
      for (const id of Object.keys(flights)) delete flights[id];
    });
    await this.mutate(this.jobsDoc, (jobs) => {
      for (const id of Object.keys(jobs)) delete jobs[id];
    });
    await this.mutate(this.runsDoc, (runs) => {
      runs.length = 0;
    });
    await this.mutate(this.candidatesDoc, (candidates) => {
      for (const [id, candidate] of Object.entries(candidates)) {
        if (candidate.reviewState !== 'approved') {
          delete candidates[id];
        } else {
          candidates[id] = { ...candidate, matchedFlightId: null, matchReasons: null, score: 0 };
        }
      }
    });
    logger.info('Store reset: flights, jobs, runs and undecided candidates removed; library kept');
  }
}
