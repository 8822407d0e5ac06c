import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import axios, { AxiosInstance } from 'axios';
import * as fs from 'fs-extra';
import { Server } from 'http';
import { AppContext, createAppContext } from '../src/appContext';
import { createApp } from '../src/server';
import { ScriptedAdapter, flightRow, rawCandidate, tempDataDir, testConfig } from './fixtures';

describe('HTTP API', () => {
  let dataDir: string;
  let ctx: AppContext;
  let server: Server;
  let http: AxiosInstance;

  beforeEach(async () => {
    dataDir = tempDataDir('routes');
    const adapter = new ScriptedAdapter('jetphotos', [], [rawCandidate({ airportCode: 'LAX', photoDate: '2024-03-01' })]);
    ctx = await createAppContext(testConfig(dataDir), {
      adapters: new Map([[adapter.source, adapter]]),
      sleep: async () => undefined,
    });
    server = await new Promise<Server>((resolve) => {
      const listening = createApp(ctx).listen(0, '127.0.0.1', () => resolve(listening));
    });
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Test server has no TCP address');
    }
    http = axios.create({ baseURL: `http://127.0.0.1:${address.port}`, validateStatus: () => true });
  });

  afterEach(async () => {
    ctx.orchestrator.stop();
    await new Promise<void>((resolve) => server.close(() => resolve()));
    await fs.remove(dataDir);
  });

  async function importOneFlight(): Promise<void> {
    const res = await http.post('/api/flights/import', { rows: [flightRow()], importSource: 'api' });
    expect(res.status).toBe(200);
    await ctx.orchestrator.waitForIdle();
  }

  it('should answer the health check', async () => {
    const res = await http.get('/health');
    expect(res.status).toBe(200);
    expect(res.data.status).toBe('ok');
  });

  describe('flights', () => {
    it('should import rows and report the bad ones', async () => {
      const res = await http.post('/api/flights/import', [flightRow(), { registration: '' }]);

      expect(res.status).toBe(200);
      expect(res.data.imported).toBe(1);
      expect(res.data.errors).toEqual([{ rowIndex: 1, message: 'Missing registration' }]);
      await ctx.orchestrator.waitForIdle();

      const list = await http.get('/api/flights', { params: { registration: 'n123ab' } });
      expect(list.data.total).toBe(1);
      expect(list.data.flights[0].registration).toBe('N123AB');
    });

    it('should reject a body that is not a list of rows', async () => {
      const res = await http.post('/api/flights/import', { foo: 1 });
      expect(res.status).toBe(400);
      expect(res.data).toEqual({ error: 'Expected an array of flight rows' });
    });

    it('should reject malformed JSON', async () => {
      const res = await http.post('/api/flights/import', '{"rows": [', {
        headers: { 'Content-Type': 'application/json' },
        transformRequest: [(data: string) => data],
      });
      expect(res.status).toBe(400);
      expect(res.data).toEqual({ error: 'Malformed JSON body' });
    });

    it('should delete one flight and 404 on an unknown one', async () => {
      await importOneFlight();
      const [flight] = await ctx.store.listFlights();

      expect((await http.delete(`/api/flights/${flight.id}`)).data).toEqual({ deleted: flight.id });
      const missing = await http.delete(`/api/flights/${flight.id}`);
      expect(missing.status).toBe(404);
      expect(missing.data.code).toBe('NOT_FOUND');
    });

    it('should reset everything but the library', async () => {
      await importOneFlight();
      await http.post('/api/review/jetphotos:1001/approve');

      expect((await http.delete('/api/flights')).data).toEqual({ reset: true });

      expect((await http.get('/api/flights')).data.total).toBe(0);
      expect((await http.get('/api/review/library')).data.total).toBe(1);
    });
  });

  describe('review', () => {
    it('should show the best candidate first', async () => {
      await importOneFlight();

      const res = await http.get('/api/review');
      expect(res.status).toBe(200);
      expect(res.data.total).toBe(1);
      expect(res.data.item.candidate.id).toBe('jetphotos:1001');
      expect(res.data.item.candidate.score).toBe(100);
      expect(res.data.item.flight.registration).toBe('N123AB');
      expect((await http.get('/api/review/pending-count')).data).toEqual({ count: 1 });
    });

    it('should validate the filter and index', async () => {
      expect((await http.get('/api/review', { params: { filter: 'everything' } })).status).toBe(400);
      expect((await http.get('/api/review', { params: { filter: 'library' } })).status).toBe(400);
      expect((await http.get('/api/review', { params: { index: 'abc' } })).status).toBe(400);
    });

    it('should approve once and refuse a second decision', async () => {
      await importOneFlight();

      const approved = await http.post('/api/review/jetphotos:1001/approve', { comment: 'great shot' });
      expect(approved.status).toBe(200);
      expect(approved.data.reviewState).toBe('approved');
      expect(approved.data.reviewComment).toBe('great shot');

      const again = await http.post('/api/review/jetphotos:1001/reject');
      expect(again.status).toBe(409);
      expect(again.data).toEqual({ error: 'Candidate jetphotos:1001 is already approved', code: 'REVIEW_TRANSITION' });
      expect((await http.get('/api/review/pending-count')).data).toEqual({ count: 0 });
    });

    it('should 404 when deleting an unknown candidate', async () => {
      const res = await http.delete('/api/review/jetphotos:missing');
      expect(res.status).toBe(404);
      expect(res.data.error).toBe('Candidate jetphotos:missing not found');
    });
  });

  describe('queue', () => {
    it('should report job counts and recent runs', async () => {
      await importOneFlight();

      const stats = await http.get('/api/queue/stats');
      expect(stats.data.counts.succeeded).toBe(1);
      expect(stats.data.paused).toBe(false);

      const runs = await http.get('/api/queue/runs', { params: { limit: 5 } });
      expect(runs.data.runs).toHaveLength(1);
      expect(runs.data.runs[0].jobId).toBe('N123AB:jetphotos');
      expect((await http.get('/api/queue/runs', { params: { limit: 0 } })).status).toBe(400);
    });

    it('should pause and resume', async () => {
      expect((await http.post('/api/queue/pause')).data.paused).toBe(true);
      expect(ctx.monitor.isPaused()).toBe(true);
      expect((await http.post('/api/queue/resume')).data.paused).toBe(false);
    });

    it('should clamp concurrency and validate settings', async () => {
      const clamped = await http.post('/api/queue/settings', { concurrency: 50, rescanIntervalHours: 24 });
      expect(clamped.data).toEqual({ paused: false, concurrency: 10, rescanIntervalHours: 24 });

      expect((await http.post('/api/queue/settings', { rescanIntervalHours: -1 })).status).toBe(400);
      expect((await http.post('/api/queue/settings', { concurrency: 'many' })).status).toBe(400);
    });

    it('should rescan a known registration', async () => {
      await importOneFlight();

      const res = await http.post('/api/queue/rescan/n123ab');
      expect(res.data).toEqual({ registration: 'N123AB', requeued: 1 });
      await ctx.orchestrator.waitForIdle();
      expect((await ctx.store.getJob('N123AB:jetphotos'))?.generation).toBe(2);

      expect((await http.post('/api/queue/rescan/ZZ999')).status).toBe(404);
    });

    it('should retry failed jobs', async () => {
      expect((await http.post('/api/queue/retry-failed')).data).toEqual({ requeued: 0 });
    });
  });
});
