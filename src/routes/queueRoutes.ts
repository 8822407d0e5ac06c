import { Router, Request, Response } from 'express';
import { AppContext } from '../appContext';
import { normalizeRegistration } from '../itinerary/itineraryCalculator';
import { optionalNumber, queryString, sendError } from './httpErrors';

export function createQueueRoutes(ctx: AppContext): Router {
  const router = Router();

  /**
   * GET /api/queue/stats
   * Live monitor snapshot for the queue panel.
   */
  router.get('/api/queue/stats', async (_req: Request, res: Response) => {
    try {
      res.json(await ctx.monitor.snapshot());
    } catch (error) {
      sendError(res, error, 'Error building queue stats');
    }
  });

  /**
   * GET /api/queue/runs?limit=N
   * Most recent task executions, newest first.
   */
  router.get('/api/queue/runs', async (req: Request, res: Response) => {
    try {
      const limit = optionalNumber(queryString(req.query.limit));
      if (limit === null || (limit !== undefined && limit < 1)) {
        return res.status(400).json({ error: 'limit must be a positive number' });
      }
      const runs = await ctx.store.listRuns(limit === undefined ? 50 : Math.floor(limit));
      res.json({ runs: runs.reverse() });
    } catch (error) {
      sendError(res, error, 'Error listing scrape runs');
    }
  });

  router.post('/api/queue/pause', async (_req: Request, res: Response) => {
    try {
      res.json(await ctx.monitor.pause());
    } catch (error) {
      sendError(res, error, 'Error pausing queue');
    }
  });

  router.post('/api/queue/resume', async (_req: Request, res: Response) => {
    try {
      res.json(await ctx.monitor.resume());
    } catch (error) {
      sendError(res, error, 'Error resuming queue');
    }
  });

  /**
   * POST /api/queue/settings
   * Body: { concurrency?, rescanIntervalHours? }
   */
  router.post('/api/queue/settings', async (req: Request, res: Response) => {
    try {
      const body: unknown = req.body;
      const fields: object = body !== null && typeof body === 'object' ? body : {};
      const concurrency = optionalNumber('concurrency' in fields ? fields.concurrency : undefined);
      const rescanIntervalHours = optionalNumber('rescanIntervalHours' in fields ? fields.rescanIntervalHours : undefined);

      if (concurrency === null || rescanIntervalHours === null) {
        return res.status(400).json({ error: 'concurrency and rescanIntervalHours must be numbers' });
      }
      if (rescanIntervalHours !== undefined && rescanIntervalHours < 0) {
        return res.status(400).json({ error: 'rescanIntervalHours must be 0 or more' });
      }

      if (concurrency !== undefined) {
        await ctx.monitor.setConcurrency(concurrency);
      }
      if (rescanIntervalHours !== undefined) {
        await ctx.monitor.setRescanInterval(rescanIntervalHours);
      }
      res.json(ctx.monitor.getControls());
    } catch (error) {
      sendError(res, error, 'Error updating queue settings');
    }
  });

  router.post('/api/queue/retry-failed', async (_req: Request, res: Response) => {
    try {
      res.json({ requeued: await ctx.orchestrator.retryFailed() });
    } catch (error) {
      sendError(res, error, 'Error retrying failed jobs');
    }
  });

  router.post('/api/queue/rescan/:registration', async (req: Request, res: Response) => {
    try {
      const registration = normalizeRegistration(req.params.registration);
      const flights = await ctx.store.listFlights(registration);
      if (flights.length === 0) {
        return res.status(404).json({ error: `No flights for ${registration}` });
      }
      res.json({ registration, requeued: await ctx.orchestrator.rescanRegistration(registration) });
    } catch (error) {
      sendError(res, error, 'Error rescanning registration');
    }
  });

  return router;
}
