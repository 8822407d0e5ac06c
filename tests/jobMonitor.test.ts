import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs-extra';
import { DEFAULT_CONFIG } from '../src/config/config';
import { JobMonitor, estimateEtaMs } from '../src/monitor/jobMonitor';
import { JsonPhotoStore } from '../src/storage/jsonPhotoStore';
import { scrapeJob, tempDataDir } from './fixtures';

describe('estimateEtaMs', () => {
  it('should divide remaining work by the effective concurrency', () => {
    expect(estimateEtaMs(6, 1000, 3)).toBe(2000);
    expect(estimateEtaMs(2, 1000, 5)).toBe(1000);
  });

  it('should be 0 with nothing left and unknown without a duration sample', () => {
    expect(estimateEtaMs(0, null, 3)).toBe(0);
    expect(estimateEtaMs(4, null, 3)).toBeNull();
  });
});

describe('JobMonitor', () => {
  let dataDir: string;
  let store: JsonPhotoStore;
  let monitor: JobMonitor;

  beforeEach(async () => {
    dataDir = tempDataDir('monitor');
    store = new JsonPhotoStore(dataDir);
    await store.init();
    monitor = new JobMonitor(store, DEFAULT_CONFIG.queue);
    await monitor.init();
  });

  afterEach(async () => {
    await fs.remove(dataDir);
  });

  it('should smooth task durations', () => {
    expect(monitor.averageTaskMs).toBeNull();
    monitor.recordDuration(1000);
    expect(monitor.averageTaskMs).toBe(1000);
    monitor.recordDuration(2000);
    expect(monitor.averageTaskMs).toBeCloseTo(1200);
  });

  it('should clamp concurrency to the configured bounds', async () => {
    expect((await monitor.setConcurrency(50)).concurrency).toBe(10);
    expect((await monitor.setConcurrency(0)).concurrency).toBe(1);
    expect((await monitor.setConcurrency(2.7)).concurrency).toBe(2);
  });

  it('should persist controls across restarts', async () => {
    await monitor.pause();
    await monitor.setConcurrency(4);

    const restarted = new JobMonitor(store, DEFAULT_CONFIG.queue);
    expect(await restarted.init()).toEqual({ paused: true, concurrency: 4, rescanIntervalHours: 168 });
  });

  it('should notify listeners until they unsubscribe', async () => {
    const listener = vi.fn();
    const unsubscribe = monitor.onControlsChange(listener);

    await monitor.pause();
    unsubscribe();
    await monitor.resume();

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith({ paused: true, concurrency: 3, rescanIntervalHours: 168 });
  });

  it('should reschedule succeeded jobs when the interval changes', async () => {
    await store.createJobIfMissing(scrapeJob({ state: 'succeeded', completedAt: '2024-04-01T00:00:00.000Z' }));
    await store.createJobIfMissing(
      scrapeJob({ id: 'N123AB:planespotters', source: 'planespotters', state: 'failed', completedAt: '2024-04-01T00:00:00.000Z' })
    );

    await monitor.setRescanInterval(24);

    expect((await store.getJob('N123AB:jetphotos'))?.nextScanAt).toBe('2024-04-02T00:00:00.000Z');
    expect((await store.getJob('N123AB:planespotters'))?.nextScanAt).toBeNull();
    expect(monitor.getRescanIntervalHours()).toBe(24);
  });

  it('should keep a fractional rescan interval instead of rounding it away', async () => {
    await store.createJobIfMissing(scrapeJob({ state: 'succeeded', completedAt: '2024-04-01T00:00:00.000Z' }));

    const controls = await monitor.setRescanInterval(0.5);

    expect(controls.rescanIntervalHours).toBe(0.5);
    expect((await store.getJob('N123AB:jetphotos'))?.nextScanAt).toBe('2024-04-01T00:30:00.000Z');
  });

  it('should summarize job states with an ETA', async () => {
    const jobs = [
      scrapeJob({ id: 'A:jetphotos', registration: 'A' }),
      scrapeJob({ id: 'B:jetphotos', registration: 'B' }),
      scrapeJob({ id: 'C:jetphotos', registration: 'C', state: 'retrying', attemptCount: 1 }),
      scrapeJob({ id: 'D:jetphotos', registration: 'D', state: 'running' }),
      scrapeJob({
        id: 'E:jetphotos',
        registration: 'E',
        state: 'succeeded',
        completedAt: '2024-04-01T00:00:00.000Z',
        nextScanAt: '2024-04-02T00:00:00.000Z',
      }),
    ];
    for (const job of jobs) {
      await store.createJobIfMissing(job);
    }
    monitor.recordDuration(3000);

    const snapshot = await monitor.snapshot(new Date('2024-04-01T12:00:00.000Z'));

    expect(snapshot.counts).toEqual({ queued: 2, running: 1, retrying: 1, succeeded: 1, failed: 0 });
    expect(snapshot.total).toBe(5);
    expect(snapshot.inFlight).toBe(1);
    expect(snapshot.etaMs).toBe(3000);
    expect(snapshot.estimatedCompletionAt).toBe('2024-04-01T12:00:03.000Z');
    expect(snapshot.nextRescanAt).toBe('2024-04-02T00:00:00.000Z');
    expect(snapshot.nextRescanIn).toBe('12h 0m');
    expect(snapshot.failedJobs).toEqual([]);
  });
});
