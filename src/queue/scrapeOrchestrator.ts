import { AirportDirectory, airportDirectory } from '../airports/airportDirectory';
import { MatchingConfig, SourceName } from '../config/config';
import {
  ACTIVE_JOB_STATES,
  DispatchMessage,
  RawCandidate,
  ScrapeJob,
  ScrapeJobState,
  ScrapeRunOutcome,
  TERMINAL_JOB_STATES,
  jobId,
} from '../models/contracts';
import { rescoreRegistration } from '../matching/matchScorer';
import { JobMonitor } from '../monitor/jobMonitor';
import { RateLimiterRegistry } from '../scrapers/rateLimiter';
import { SourceAdapter } from '../scrapers/sourceAdapter';
import { CandidateFields, JobPatch, PhotoStore } from '../storage/photoStore';
import { addHoursIso, nowIso, parseCalendarDate } from '../time/timeUtils';
import { categorizeScrapeError } from '../utils/errorCategorizer';
import { TerminalScrapeFailure, errorMessage, handleError } from '../utils/errorHandler';
import { LogLevel, logger } from '../utils/logger';
import { DispatchQueue, MemoryDispatchQueue } from './dispatchQueue';
import { RetryPolicy, backoffDelay } from './retryPolicy';

const RUNNING_STATES: readonly ScrapeJobState[] = ['running', 'retrying'];

export interface OrchestratorOptions {
  store: PhotoStore;
  adapters: Map<SourceName, SourceAdapter>;
  limiters: RateLimiterRegistry;
  monitor: JobMonitor;
  retry: RetryPolicy;
  matching: MatchingConfig;
  rescanTickMs: number;
  /** Jobs left `running` this long by a task that is no longer alive are failed. */
  stalledTaskMinutes: number;
  queue?: DispatchQueue;
  directory?: AirportDirectory;
  /** Backoff sleep; replaceable so tests do not wait in real time */
  sleep?: (ms: number) => Promise<void>;
}

interface TaskResult {
  state: 'succeeded' | 'failed';
  outcome: ScrapeRunOutcome;
  photosFound: number;
  error: string | null;
  errorKind: string | null;
}

interface TaskProgress {
  attempts: number;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Dispatches one task per (registration, source) pair through a bounded
 * worker pool. Jobs carry a generation so stale or redelivered dispatch
 * messages are recognised and dropped.
 */
export class ScrapeOrchestrator {
  private readonly queue: DispatchQueue;
  private readonly directory: AirportDirectory;
  private readonly sleep: (ms: number) => Promise<void>;
  private active = 0;
  private draining = false;
  private liveJobs = new Set<string>();
  private idleWaiters: Array<() => void> = [];
  private interval: NodeJS.Timeout | null = null;
  private isRescanning = false;

  constructor(private readonly options: OrchestratorOptions) {
    this.queue = options.queue ?? new MemoryDispatchQueue();
    this.directory = options.directory ?? airportDirectory;
    this.sleep = options.sleep ?? defaultSleep;
    options.monitor.onControlsChange(() => {
      this.pump();
      this.notifyIfIdle();
    });
  }

  get inFlight(): number {
    return this.active;
  }

  get sources(): SourceName[] {
    return Array.from(this.options.adapters.keys());
  }

  start(): void {
    if (this.interval) return;
    this.interval = setInterval(() => {
      this.tick().catch((error: unknown) => handleError(error, 'rescan'));
    }, this.options.rescanTickMs);
    logger.info(`Scrape orchestrator started (rescan check every ${Math.round(this.options.rescanTickMs / 1000)}s)`);
  }

  stop(): void {
    if (this.interval) {
      clearInterval(this.interval);
      this.interval = null;
    }
  }

  /**
   * Stops admitting tasks and waits up to `timeoutMs` for the running ones to
   * finish. Resolves false when some were still running at the deadline;
   * those are re-queued by `recover()` on the next start.
   */
  async drain(timeoutMs: number): Promise<boolean> {
    this.draining = true;
    this.stop();
    if (this.active === 0) return true;

    let timer: NodeJS.Timeout | undefined;
    const finished = new Promise<boolean>((resolve) => {
      this.idleWaiters.push(() => resolve(true));
    });
    const deadline = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });
    try {
      return await Promise.race([finished, deadline]);
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Creates generation-1 jobs for every (registration, source) pair that has
   * none yet. Returns the number of jobs created.
   */
  async scheduleRegistrations(registrations: string[]): Promise<number> {
    let created = 0;
    const scheduledAt = nowIso();
    for (const registration of Array.from(new Set(registrations))) {
      for (const source of this.sources) {
        const job: ScrapeJob = {
          id: jobId(registration, source),
          registration,
          source,
          generation: 1,
          state: 'queued',
          attemptCount: 0,
          lastError: null,
          lastErrorKind: null,
          photosFound: 0,
          scheduledAt,
          startedAt: null,
          completedAt: null,
          nextScanAt: null,
        };
        if (await this.options.store.createJobIfMissing(job)) {
          created++;
          logger.lifecycle(LogLevel.INFO, job.id, 'queued (generation 1)');
          this.queue.publish({ jobId: job.id, generation: 1 });
        }
      }
    }
    this.pump();
    return created;
  }

  /** Re-queues terminal jobs whose rescan time has come. */
  async rescanDue(now: Date = new Date()): Promise<number> {
    if (this.options.monitor.getRescanIntervalHours() <= 0) return 0;
    const jobs = await this.options.store.listJobs();
    const due = jobs.filter(
      job => TERMINAL_JOB_STATES.includes(job.state) && job.nextScanAt !== null && Date.parse(job.nextScanAt) <= now.getTime()
    );
    return this.requeue(due, 'rescan');
  }

  async retryFailed(): Promise<number> {
    const jobs = await this.options.store.listJobs();
    return this.requeue(jobs.filter(job => job.state === 'failed'), 'manual retry');
  }

  async rescanRegistration(registration: string): Promise<number> {
    const jobs = await this.options.store.listJobs();
    const terminal = jobs.filter(job => job.registration === registration && TERMINAL_JOB_STATES.includes(job.state));
    const requeued = await this.requeue(terminal, 'manual rescan');
    // Sources added since the registration was first scheduled
    const created = await this.scheduleRegistrations([registration]);
    return requeued + created;
  }

  /**
   * Fails jobs left `running` or `retrying` by a task that died without
   * recording an outcome, once they have been started for longer than the
   * stall limit. Tasks still alive in this process are never touched.
   */
  async reapStalled(now: Date = new Date()): Promise<number> {
    const { store, stalledTaskMinutes } = this.options;
    const cutoff = now.getTime() - stalledTaskMinutes * 60_000;
    const finishedAt = now.toISOString();
    const error = `Task stopped reporting progress for over ${stalledTaskMinutes} minute(s)`;

    const reaped = await store.updateJobs((job) => {
      if (!RUNNING_STATES.includes(job.state) || this.liveJobs.has(job.id)) return null;
      if (job.startedAt === null || Date.parse(job.startedAt) > cutoff) return null;
      return { ...job, state: 'failed', lastError: error, lastErrorKind: 'stalled', completedAt: finishedAt, nextScanAt: null };
    });

    for (const job of reaped) {
      logger.lifecycle(LogLevel.ERROR, job.id, `failed: ${error}`);
      await store.appendRun({
        jobId: job.id,
        generation: job.generation,
        registration: job.registration,
        source: job.source,
        outcome: 'failed',
        photosFound: 0,
        attempts: job.attemptCount,
        durationMs: job.startedAt === null ? 0 : now.getTime() - Date.parse(job.startedAt),
        error,
        startedAt: job.startedAt ?? finishedAt,
        finishedAt,
      });
    }
    return reaped.length;
  }

  /**
   * Puts jobs interrupted by a restart back in the queue and republishes
   * everything that is queued.
   */
  async recover(): Promise<number> {
    const interrupted = await this.options.store.updateJobs((job) =>
      RUNNING_STATES.includes(job.state) ? { ...job, state: 'queued', startedAt: null } : null
    );
    for (const job of interrupted) {
      logger.lifecycle(LogLevel.WARN, job.id, 'was interrupted by a restart; re-queued');
    }

    const queued = (await this.options.store.listJobs()).filter(job => job.state === 'queued');
    for (const job of queued) {
      this.queue.publish({ jobId: job.id, generation: job.generation });
    }
    if (queued.length > 0) {
      logger.info(`Recovered ${queued.length} queued scrape job(s)`);
    }
    this.pump();
    return queued.length;
  }

  /**
   * Resolves once no task is running and the queue is drained or paused.
   */
  waitForIdle(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  /** Starts as many tasks as the concurrency limit and pause flag allow. */
  pump(): void {
    const { monitor } = this.options;
    while (!this.draining && !monitor.isPaused() && this.active < monitor.getConcurrency()) {
      const message = this.queue.take();
      if (!message) break;
      this.active++;
      void this.runTask(message)
        .catch((error: unknown) => handleError(error, `task ${message.jobId}`))
        .finally(() => {
          this.active--;
          this.pump();
          this.notifyIfIdle();
        });
    }
  }

  private isIdle(): boolean {
    return this.active === 0 && (this.draining || this.queue.size() === 0 || this.options.monitor.isPaused());
  }

  private notifyIfIdle(): void {
    if (!this.isIdle()) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }

  private async tick(): Promise<void> {
    if (this.isRescanning) return;
    this.isRescanning = true;
    try {
      await this.reapStalled();
      await this.rescanDue();
    } finally {
      this.isRescanning = false;
    }
  }

  private async requeue(jobs: ScrapeJob[], reason: string): Promise<number> {
    let count = 0;
    for (const job of jobs) {
      const generation = job.generation + 1;
      const updated = await this.options.store.transitionJob(
        job.id,
        TERMINAL_JOB_STATES,
        {
          state: 'queued',
          generation,
          attemptCount: 0,
          lastError: null,
          lastErrorKind: null,
          scheduledAt: nowIso(),
          startedAt: null,
          completedAt: null,
          nextScanAt: null,
        },
        job.generation
      );
      if (!updated) continue;
      count++;
      logger.lifecycle(LogLevel.INFO, job.id, `queued (generation ${generation}, ${reason})`);
      this.queue.publish({ jobId: job.id, generation });
    }
    this.pump();
    return count;
  }

  private async runTask(message: DispatchMessage): Promise<void> {
    const { store, adapters, limiters } = this.options;

    const job = await store.getJob(message.jobId);
    if (!job || job.generation !== message.generation || job.state !== 'queued') {
      logger.debug(`Skipping stale dispatch ${message.jobId}@${message.generation}`);
      return;
    }

    const startedAt = nowIso();
    const claimed = await store.transitionJob(job.id, ['queued'], { state: 'running', startedAt, attemptCount: 0 }, job.generation);
    if (!claimed) {
      logger.debug(`Dispatch ${message.jobId}@${message.generation} already claimed`);
      return;
    }
    logger.lifecycle(LogLevel.INFO, job.id, `running (generation ${job.generation})`);

    const started = Date.now();
    const progress: TaskProgress = { attempts: 0 };
    let result: TaskResult;
    this.liveJobs.add(job.id);

    try {
      const adapter = adapters.get(job.source);
      if (!adapter) {
        result = { state: 'failed', outcome: 'failed', photosFound: 0, error: `Source ${job.source} is disabled`, errorKind: 'disabled' };
      } else {
        const limiter = limiters.forSource(job.source);
        const airportCodes = await this.airportCodesFor(job.registration);
        result = await this.attemptWithRetries(claimed, adapter, () => limiter.acquire(), (ms) => limiter.penalize(ms), airportCodes, progress);
      }
    } catch (error) {
      // Store or bookkeeping failure outside the adapter call: the claimed job still has to end
      logger.error(`${job.id}: task aborted before an outcome was recorded:`, error);
      result = { state: 'failed', outcome: 'failed', photosFound: 0, error: errorMessage(error), errorKind: 'internal' };
    }

    try {
      await this.finish(claimed, result, progress.attempts, startedAt, Date.now() - started);
    } finally {
      // If finish itself failed the job stays running until reapStalled() fails it
      this.liveJobs.delete(job.id);
    }
  }

  private async attemptWithRetries(
    job: ScrapeJob,
    adapter: SourceAdapter,
    acquireSlot: () => Promise<void>,
    penalize: (ms: number) => void,
    airportCodes: string[],
    progress: TaskProgress
  ): Promise<TaskResult> {
    const { retry, store } = this.options;
    let deferrals = 0;

    for (;;) {
      const attempts = ++progress.attempts;
      const current = await store.transitionJob(job.id, RUNNING_STATES, { state: 'running', attemptCount: attempts }, job.generation);
      if (!current) {
        return { state: 'failed', outcome: 'failed', photosFound: 0, error: 'Job was superseded while running', errorKind: 'superseded' };
      }

      try {
        await acquireSlot();
        const raw = await adapter.search(job.registration, { airportCodes, acquireSlot });
        const photosFound = await this.storeCandidates(job, raw);
        return { state: 'succeeded', outcome: photosFound > 0 ? 'success' : 'no_results', photosFound, error: null, errorKind: null };
      } catch (error) {
        const info = categorizeScrapeError(error);

        if (info.kind === 'rate_limited' && deferrals < retry.maxRateLimitDeferrals) {
          deferrals++;
          progress.attempts--;
          penalize(info.retryAfterMs ?? 0);
          logger.warn(`${job.id}: rate limited by ${job.source}, waiting (${deferrals}/${retry.maxRateLimitDeferrals})`);
          continue;
        }

        if (info.kind === 'permanent') {
          logger.info(`${job.id}: ${info.message}; completing with no candidates`);
          return { state: 'succeeded', outcome: 'no_results', photosFound: 0, error: info.message, errorKind: 'permanent' };
        }

        if (info.kind === 'blocked') {
          // Surfaced as a failure and left out of automatic rescans
          logger.warn(`${job.id}: ${info.message}; ${job.source} is refusing requests`);
          return { state: 'failed', outcome: 'failed', photosFound: 0, error: info.message, errorKind: 'blocked' };
        }

        if (info.kind === 'structural') {
          logger.adapterBroken(job.source, `could not parse results for ${job.registration}: ${info.message}`);
          return { state: 'failed', outcome: 'failed', photosFound: 0, error: info.message, errorKind: 'structural' };
        }

        // Transient, or rate limited past the deferral budget
        if (attempts >= retry.maxAttempts) {
          return { state: 'failed', outcome: 'failed', photosFound: 0, error: info.message, errorKind: info.kind };
        }

        const delay = backoffDelay(attempts, retry);
        const retrying = await store.transitionJob(
          job.id,
          RUNNING_STATES,
          { state: 'retrying', lastError: info.message, lastErrorKind: info.kind },
          job.generation
        );
        if (!retrying) {
          return { state: 'failed', outcome: 'failed', photosFound: 0, error: 'Job was superseded while running', errorKind: 'superseded' };
        }
        logger.lifecycle(LogLevel.WARN, job.id, `retrying in ${delay}ms after attempt ${attempts}/${retry.maxAttempts}: ${info.message}`);
        await this.sleep(delay);
      }
    }
  }

  private async storeCandidates(job: ScrapeJob, raw: RawCandidate[]): Promise<number> {
    const { store, matching } = this.options;
    const seenAt = nowIso();
    const unique = new Map<string, RawCandidate>();
    for (const candidate of raw) {
      unique.set(candidate.sourcePhotoId, candidate);
    }
    for (const candidate of unique.values()) {
      await store.upsertCandidate(this.toFields(job, candidate), seenAt);
    }
    await rescoreRegistration(store, job.registration, matching);
    return unique.size;
  }

  private toFields(job: ScrapeJob, raw: RawCandidate): CandidateFields {
    const rawAirport = raw.airportCode?.trim() || null;
    const rawDate = raw.photoDate?.trim() || null;
    return {
      source: job.source,
      sourcePhotoId: raw.sourcePhotoId,
      registration: job.registration,
      sourceUrl: raw.sourceUrl,
      thumbnailUrl: raw.thumbnailUrl,
      fullImageUrl: raw.fullImageUrl,
      photographer: raw.photographer,
      rawAirportCode: rawAirport,
      rawDate,
      airportCode: rawAirport ? this.directory.toIata(rawAirport) : null,
      photoDate: rawDate ? parseCalendarDate(rawDate) : null,
      generation: job.generation,
    };
  }

  private async airportCodesFor(registration: string): Promise<string[]> {
    const flights = await this.options.store.listFlights(registration);
    const codes = new Set<string>();
    for (const flight of flights) {
      for (const airport of [flight.origin, flight.destination]) {
        codes.add(airport.iata ?? airport.icao ?? airport.raw);
      }
    }
    return Array.from(codes).sort();
  }

  private async finish(job: ScrapeJob, result: TaskResult, attempts: number, startedAt: string, durationMs: number): Promise<void> {
    const { store, monitor } = this.options;
    const completedAt = nowIso();
    const rescanHours = monitor.getRescanIntervalHours();

    const patch: JobPatch = {
      state: result.state,
      attemptCount: attempts,
      photosFound: result.photosFound,
      lastError: result.error,
      lastErrorKind: result.errorKind,
      completedAt,
      nextScanAt: result.state === 'succeeded' && rescanHours > 0 ? addHoursIso(completedAt, rescanHours) : null,
    };
    const finished = await store.transitionJob(job.id, ACTIVE_JOB_STATES, patch, job.generation);

    await store.appendRun({
      jobId: job.id,
      generation: job.generation,
      registration: job.registration,
      source: job.source,
      outcome: result.outcome,
      photosFound: result.photosFound,
      attempts,
      durationMs,
      error: result.error,
      startedAt,
      finishedAt: completedAt,
    });
    monitor.recordDuration(durationMs);

    if (!finished) {
      logger.lifecycle(LogLevel.WARN, `${job.id}@${job.generation}`, 'finished after being superseded; result discarded');
      return;
    }
    if (result.state === 'failed') {
      const failure = new TerminalScrapeFailure(result.error ?? 'Scrape failed', job.id, result.errorKind ?? 'unknown');
      logger.lifecycle(LogLevel.ERROR, job.id, `failed after ${attempts} attempt(s) [${failure.kind}]: ${failure.message}`);
    } else {
      logger.lifecycle(LogLevel.INFO, job.id, `succeeded with ${result.photosFound} photo(s) in ${durationMs}ms`);
    }
  }
}
