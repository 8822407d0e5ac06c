import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs-extra';
import { computeItinerary } from '../src/itinerary/itineraryCalculator';
import { JsonPhotoStore } from '../src/storage/jsonPhotoStore';
import { candidateFields, flightRow, scrapeJob, tempDataDir } from './fixtures';

describe('JsonPhotoStore', () => {
  let dataDir: string;
  let store: JsonPhotoStore;

  beforeEach(async () => {
    dataDir = tempDataDir('store');
    store = new JsonPhotoStore(dataDir);
    await store.init();
  });

  afterEach(async () => {
    await fs.remove(dataDir);
  });

  describe('flights', () => {
    it('should upsert a flight only once', async () => {
      const flight = computeItinerary(flightRow());

      expect((await store.upsertFlight(flight)).created).toBe(true);
      expect((await store.upsertFlight({ ...flight, airline: 'Other' })).created).toBe(false);

      const flights = await store.listFlights();
      expect(flights).toHaveLength(1);
      expect(flights[0].airline).toBeNull();
    });

    it('should list flights of a registration in departure order', async () => {
      const later = computeItinerary(flightRow({ departureLocal: '2024-05-01 08:00', arrivalLocal: '16:30' }));
      const earlier = computeItinerary(flightRow());
      const other = computeItinerary(flightRow({ registration: 'G-ABCD' }));
      for (const flight of [later, earlier, other]) {
        await store.upsertFlight(flight);
      }

      const ids = (await store.listFlights('N123AB')).map((f) => f.id);
      expect(ids).toEqual([earlier.id, later.id]);
    });

    it('should return the deleted flight or null', async () => {
      const flight = computeItinerary(flightRow());
      await store.upsertFlight(flight);

      expect((await store.deleteFlight(flight.id))?.id).toBe(flight.id);
      expect(await store.deleteFlight(flight.id)).toBeNull();
      expect(await store.getFlight(flight.id)).toBeNull();
    });
  });

  describe('candidates', () => {
    it('should start new candidates pending with no match', async () => {
      const { record, created } = await store.upsertCandidate(candidateFields(), '2024-04-01T00:00:00.000Z');

      expect(created).toBe(true);
      expect(record.id).toBe('jetphotos:1001');
      expect(record.reviewState).toBe('pending');
      expect(record.score).toBe(0);
      expect(record.matchedFlightId).toBeNull();
      expect(record.firstSeenAt).toBe('2024-04-01T00:00:00.000Z');
    });

    it('should refresh raw fields but keep the review decision', async () => {
      await store.upsertCandidate(candidateFields(), '2024-04-01T00:00:00.000Z');
      await store.transitionReview('jetphotos:1001', 'rejected', 'wrong livery', '2024-04-02T00:00:00.000Z');

      const { record, created } = await store.upsertCandidate(
        candidateFields({ thumbnailUrl: 'https://cdn.example.test/1001-new.jpg', generation: 2 }),
        '2024-04-09T00:00:00.000Z'
      );

      expect(created).toBe(false);
      expect(record.reviewState).toBe('rejected');
      expect(record.reviewComment).toBe('wrong livery');
      expect(record.thumbnailUrl).toBe('https://cdn.example.test/1001-new.jpg');
      expect(record.generation).toBe(2);
      expect(record.firstSeenAt).toBe('2024-04-01T00:00:00.000Z');
      expect(record.lastSeenAt).toBe('2024-04-09T00:00:00.000Z');
    });

    it('should keep one record and the decision under concurrent writes', async () => {
      await store.upsertCandidate(candidateFields(), '2024-04-01T00:00:00.000Z');

      await Promise.all([
        store.upsertCandidate(candidateFields({ generation: 2 }), '2024-04-02T00:00:00.000Z'),
        store.transitionReview('jetphotos:1001', 'approved', null, '2024-04-02T00:00:00.000Z'),
        store.upsertCandidate(candidateFields({ generation: 3 }), '2024-04-03T00:00:00.000Z'),
        store.upsertCandidate(candidateFields({ sourcePhotoId: '1002' }), '2024-04-03T00:00:00.000Z'),
      ]);

      const candidates = await store.listCandidates();
      expect(candidates).toHaveLength(2);
      const approved = await store.getCandidate('jetphotos:1001');
      expect(approved?.reviewState).toBe('approved');
      expect(approved?.generation).toBe(3);
    });

    it('should move a candidate out of pending only once', async () => {
      await store.upsertCandidate(candidateFields(), '2024-04-01T00:00:00.000Z');

      const first = await store.transitionReview('jetphotos:1001', 'approved', null, '2024-04-02T00:00:00.000Z');
      const second = await store.transitionReview('jetphotos:1001', 'rejected', null, '2024-04-03T00:00:00.000Z');

      expect(first.applied).toBe(true);
      expect(second.applied).toBe(false);
      expect(second.candidate?.reviewState).toBe('approved');
      expect(await store.transitionReview('jetphotos:missing', 'approved', null, '2024-04-03T00:00:00.000Z')).toEqual({
        candidate: null,
        applied: false,
      });
    });

    it('should filter by registration and review state', async () => {
      await store.upsertCandidate(candidateFields(), '2024-04-01T00:00:00.000Z');
      await store.upsertCandidate(candidateFields({ sourcePhotoId: '2002', registration: 'G-ABCD' }), '2024-04-01T00:00:00.000Z');
      await store.transitionReview('jetphotos:2002', 'approved', null, '2024-04-02T00:00:00.000Z');

      expect((await store.listCandidates({ registration: 'N123AB' })).map((c) => c.id)).toEqual(['jetphotos:1001']);
      expect((await store.listCandidates({ reviewStates: ['approved'] })).map((c) => c.id)).toEqual(['jetphotos:2002']);
    });
  });

  describe('jobs', () => {
    it('should create a job only if it is missing', async () => {
      expect(await store.createJobIfMissing(scrapeJob())).toBe(true);
      expect(await store.createJobIfMissing(scrapeJob({ state: 'failed' }))).toBe(false);
      expect((await store.getJob('N123AB:jetphotos'))?.state).toBe('queued');
    });

    it('should apply a transition only from the expected state and generation', async () => {
      await store.createJobIfMissing(scrapeJob());

      expect(await store.transitionJob('N123AB:jetphotos', ['running'], { state: 'succeeded' })).toBeNull();
      expect(await store.transitionJob('N123AB:jetphotos', ['queued'], { state: 'running' }, 2)).toBeNull();

      const claimed = await store.transitionJob('N123AB:jetphotos', ['queued'], { state: 'running' }, 1);
      expect(claimed?.state).toBe('running');

      const racing = await Promise.all([
        store.transitionJob('N123AB:jetphotos', ['running'], { state: 'succeeded' }, 1),
        store.transitionJob('N123AB:jetphotos', ['running'], { state: 'failed' }, 1),
      ]);
      expect(racing.filter((job) => job !== null)).toHaveLength(1);
    });

    it('should report only the jobs the update function changed', async () => {
      await store.createJobIfMissing(scrapeJob());
      await store.createJobIfMissing(scrapeJob({ id: 'N123AB:planespotters', source: 'planespotters', state: 'running' }));

      const changed = await store.updateJobs((job) => (job.state === 'running' ? { ...job, state: 'queued' } : null));

      expect(changed.map((job) => job.id)).toEqual(['N123AB:planespotters']);
      expect((await store.listJobs()).every((job) => job.state === 'queued')).toBe(true);
    });
  });

  describe('runs and controls', () => {
    it('should return the most recent runs', async () => {
      for (const generation of [1, 2, 3]) {
        await store.appendRun({
          jobId: 'N123AB:jetphotos',
          generation,
          registration: 'N123AB',
          source: 'jetphotos',
          outcome: 'success',
          photosFound: generation,
          attempts: 1,
          durationMs: 10,
          error: null,
          startedAt: '2024-04-01T00:00:00.000Z',
          finishedAt: '2024-04-01T00:00:01.000Z',
        });
      }

      expect((await store.listRuns(2)).map((run) => run.generation)).toEqual([2, 3]);
    });

    it('should merge saved controls over the defaults', async () => {
      const defaults = { paused: false, concurrency: 3, rescanIntervalHours: 168 };
      expect(await store.getControls(defaults)).toEqual(defaults);

      await store.saveControls({ paused: true, concurrency: 5, rescanIntervalHours: 24 });
      expect(await store.getControls(defaults)).toEqual({ paused: true, concurrency: 5, rescanIntervalHours: 24 });
    });
  });

  describe('reset', () => {
    it('should keep approved photos and drop everything else', async () => {
      const flight = computeItinerary(flightRow());
      await store.upsertFlight(flight);
      await store.createJobIfMissing(scrapeJob());
      await store.upsertCandidate(candidateFields(), '2024-04-01T00:00:00.000Z');
      await store.upsertCandidate(candidateFields({ sourcePhotoId: '1002' }), '2024-04-01T00:00:00.000Z');
      await store.updateCandidateMatches(
        new Map([['jetphotos:1001', { score: 100, matchedFlightId: flight.id, matchReasons: null }]])
      );
      await store.transitionReview('jetphotos:1001', 'approved', null, '2024-04-02T00:00:00.000Z');

      await store.reset();

      expect(await store.listFlights()).toEqual([]);
      expect(await store.listJobs()).toEqual([]);
      const remaining = await store.listCandidates();
      expect(remaining.map((c) => c.id)).toEqual(['jetphotos:1001']);
      expect(remaining[0].matchedFlightId).toBeNull();
      expect(remaining[0].score).toBe(0);
    });
  });
});
