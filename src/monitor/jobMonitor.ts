import { QueueConfig } from '../config/config';
import { QueueControls, ScrapeJob, ScrapeJobState, SourceName } from '../models/contracts';
import { PhotoStore } from '../storage/photoStore';
import { addHoursIso, relativeTime } from '../time/timeUtils';
import { logger } from '../utils/logger';

/** Smoothing factor of the task-duration moving average. */
export const DURATION_EMA_ALPHA = 0.2;

export interface FailedJobSummary {
  id: string;
  registration: string;
  source: SourceName;
  error: string | null;
  errorKind: string | null;
  attempts: number;
  completedAt: string | null;
}

export interface MonitorSnapshot {
  counts: Record<ScrapeJobState, number>;
  total: number;
  inFlight: number;
  paused: boolean;
  concurrency: number;
  rescanIntervalHours: number;
  averageTaskMs: number | null;
  etaMs: number | null;
  estimatedCompletionAt: string | null;
  failedJobs: FailedJobSummary[];
  nextRescanAt: string | null;
  nextRescanIn: string | null;
  generatedAt: string;
}

export type ControlsListener = (controls: QueueControls) => void;

function emptyCounts(): Record<ScrapeJobState, number> {
  return { queued: 0, running: 0, retrying: 0, succeeded: 0, failed: 0 };
}

/**
 * remaining x average / effective concurrency, where effective concurrency
 * is the configured limit capped by the remaining work (at least 1).
 */
export function estimateEtaMs(remaining: number, averageMs: number | null, concurrency: number): number | null {
  if (remaining <= 0) return 0;
  if (averageMs === null) return null;
  const effective = Math.max(1, Math.min(concurrency, remaining));
  return Math.ceil((remaining * averageMs) / effective);
}

/**
 * Aggregates ScrapeJob state for the queue panel and owns the persisted
 * queue controls the orchestrator reads before admitting work.
 */
export class JobMonitor {
  private controls: QueueControls;
  private averageMs: number | null = null;
  private listeners = new Set<ControlsListener>();

  constructor(private readonly store: PhotoStore, private readonly queueConfig: QueueConfig) {
    this.controls = {
      paused: false,
      concurrency: this.clampConcurrency(queueConfig.concurrency),
      rescanIntervalHours: Math.max(0, queueConfig.rescanIntervalHours),
    };
  }

  /** Loads persisted controls, falling back to configured defaults. */
  async init(): Promise<QueueControls> {
    const stored = await this.store.getControls(this.controls);
    this.controls = {
      paused: stored.paused,
      concurrency: this.clampConcurrency(stored.concurrency),
      rescanIntervalHours: Math.max(0, stored.rescanIntervalHours),
    };
    return this.getControls();
  }

  getControls(): QueueControls {
    return { ...this.controls };
  }

  isPaused(): boolean {
    return this.controls.paused;
  }

  getConcurrency(): number {
    return this.controls.concurrency;
  }

  getRescanIntervalHours(): number {
    return this.controls.rescanIntervalHours;
  }

  get averageTaskMs(): number | null {
    return this.averageMs;
  }

  recordDuration(ms: number): void {
    if (!Number.isFinite(ms) || ms < 0) return;
    this.averageMs = this.averageMs === null ? ms : DURATION_EMA_ALPHA * ms + (1 - DURATION_EMA_ALPHA) * this.averageMs;
  }

  onControlsChange(listener: ControlsListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  async pause(): Promise<QueueControls> {
    logger.info('Queue paused: no new scrape tasks will start');
    return this.update({ paused: true });
  }

  async resume(): Promise<QueueControls> {
    logger.info('Queue resumed');
    return this.update({ paused: false });
  }

  async setConcurrency(value: number): Promise<QueueControls> {
    const concurrency = this.clampConcurrency(value);
    logger.info(`Queue concurrency set to ${concurrency}`);
    return this.update({ concurrency });
  }

  /**
   * Changes the rescan cadence and reschedules every succeeded job from its
   * completion time. 0 disables automatic rescans.
   */
  async setRescanInterval(hours: number): Promise<QueueControls> {
    const rescanIntervalHours = Number.isFinite(hours) ? Math.max(0, hours) : this.controls.rescanIntervalHours;
    await this.store.updateJobs((job) => {
      if (job.state !== 'succeeded') return null;
      const nextScanAt = rescanIntervalHours > 0 && job.completedAt ? addHoursIso(job.completedAt, rescanIntervalHours) : null;
      return nextScanAt === job.nextScanAt ? null : { ...job, nextScanAt };
    });
    logger.info(`Rescan interval set to ${rescanIntervalHours}h`);
    return this.update({ rescanIntervalHours });
  }

  async snapshot(now: Date = new Date()): Promise<MonitorSnapshot> {
    const jobs = await this.store.listJobs();
    const counts = emptyCounts();
    for (const job of jobs) {
      counts[job.state]++;
    }

    const remaining = counts.queued + counts.retrying;
    const etaMs = estimateEtaMs(remaining, this.averageMs, this.controls.concurrency);
    const nextRescanAt = this.controls.rescanIntervalHours > 0 ? earliestRescan(jobs) : null;

    return {
      counts,
      total: jobs.length,
      inFlight: counts.running,
      paused: this.controls.paused,
      concurrency: this.controls.concurrency,
      rescanIntervalHours: this.controls.rescanIntervalHours,
      averageTaskMs: this.averageMs === null ? null : Math.round(this.averageMs),
      etaMs,
      estimatedCompletionAt: etaMs === null ? null : new Date(now.getTime() + etaMs).toISOString(),
      failedJobs: jobs
        .filter(job => job.state === 'failed')
        .map(job => ({
          id: job.id,
          registration: job.registration,
          source: job.source,
          error: job.lastError,
          errorKind: job.lastErrorKind,
          attempts: job.attemptCount,
          completedAt: job.completedAt,
        })),
      nextRescanAt,
      nextRescanIn: nextRescanAt ? relativeTime(nextRescanAt, now) : null,
      generatedAt: now.toISOString(),
    };
  }

  private clampConcurrency(value: number): number {
    const { minConcurrency, maxConcurrency } = this.queueConfig;
    if (!Number.isFinite(value)) return minConcurrency;
    return Math.min(maxConcurrency, Math.max(minConcurrency, Math.floor(value)));
  }

  private async update(patch: Partial<QueueControls>): Promise<QueueControls> {
    this.controls = { ...this.controls, ...patch };
    await this.store.saveControls(this.controls);
    const controls = this.getControls();
    for (const listener of this.listeners) {
      try {
        listener(controls);
      } catch (error) {
        logger.error(`Queue controls listener failed: ${error}`);
      }
    }
    return controls;
  }
}

function earliestRescan(jobs: ScrapeJob[]): string | null {
  let earliest: string | null = null;
  for (const job of jobs) {
    if (job.state !== 'succeeded' || !job.nextScanAt) continue;
    if (earliest === null || Date.parse(job.nextScanAt) < Date.parse(earliest)) {
      earliest = job.nextScanAt;
    }
  }
  return earliest;
}
