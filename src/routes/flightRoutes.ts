import { Router, Request, Response } from 'express';
import { AppContext } from '../appContext';
import { normalizeRegistration } from '../itinerary/itineraryCalculator';
import { logger } from '../utils/logger';
import { queryString, sendError } from './httpErrors';

export function createFlightRoutes(ctx: AppContext): Router {
  const router = Router();

  /**
   * POST /api/flights/import
   * Body: an array of raw rows, or { rows, importSource }.
   */
  router.post('/api/flights/import', async (req: Request, res: Response) => {
    try {
      const body: unknown = req.body;
      let rows: unknown[] | null = null;
      let importSource: string | undefined;
      if (Array.isArray(body)) {
        rows = body;
      } else if (body && typeof body === 'object' && 'rows' in body && Array.isArray(body.rows)) {
        rows = body.rows;
        if ('importSource' in body && typeof body.importSource === 'string') {
          importSource = body.importSource;
        }
      }
      if (!rows) {
        return res.status(400).json({ error: 'Expected an array of flight rows' });
      }

      const result = await ctx.importer.importFlights(rows, importSource);
      logger.info(`Import via API: ${result.imported} new flight(s)`);
      res.json(result);
    } catch (error) {
      sendError(res, error, 'Error importing flights');
    }
  });

  /**
   * GET /api/flights?registration=
   */
  router.get('/api/flights', async (req: Request, res: Response) => {
    try {
      const registration = queryString(req.query.registration);
      const flights = await ctx.store.listFlights(registration ? normalizeRegistration(registration) : undefined);
      res.json({ flights, total: flights.length });
    } catch (error) {
      sendError(res, error, 'Error listing flights');
    }
  });

  /**
   * DELETE /api/flights/:id
   */
  router.delete('/api/flights/:id', async (req: Request, res: Response) => {
    try {
      const flight = await ctx.importer.deleteFlight(req.params.id);
      res.json({ deleted: flight.id });
    } catch (error) {
      sendError(res, error, 'Error deleting flight');
    }
  });

  /**
   * DELETE /api/flights
   * Full reset. Approved library photos are kept.
   */
  router.delete('/api/flights', async (_req: Request, res: Response) => {
    try {
      await ctx.importer.resetAll();
      res.json({ reset: true });
    } catch (error) {
      sendError(res, error, 'Error resetting data');
    }
  });

  return router;
}
