import { Router, Request, Response } from 'express';
import { AppContext } from '../appContext';
import { isReviewFilter } from '../review/reviewQueue';
import { optionalNumber, queryString, sendError } from './httpErrors';

function commentFrom(body: unknown): string | null {
  if (body && typeof body === 'object' && 'comment' in body && typeof body.comment === 'string') {
    return body.comment;
  }
  return null;
}

export function createReviewRoutes(ctx: AppContext): Router {
  const router = Router();

  /**
   * GET /api/review?filter=default|low&index=N&candidateId=ID
   */
  router.get('/api/review', async (req: Request, res: Response) => {
    try {
      const filter = queryString(req.query.filter) ?? 'default';
      if (!isReviewFilter(filter) || filter === 'library') {
        return res.status(400).json({ error: 'filter must be "default" or "low"' });
      }
      const index = optionalNumber(queryString(req.query.index));
      if (index === null) {
        return res.status(400).json({ error: 'index must be a number' });
      }
      const view = await ctx.reviewQueue.view(filter, {
        index,
        candidateId: queryString(req.query.candidateId),
      });
      res.json(view);
    } catch (error) {
      sendError(res, error, 'Error loading review queue');
    }
  });

  router.get('/api/review/pending-count', async (_req: Request, res: Response) => {
    try {
      res.json({ count: await ctx.reviewQueue.pendingCount() });
    } catch (error) {
      sendError(res, error, 'Error counting pending photos');
    }
  });

  /**
   * GET /api/review/library
   * Approved photos, best matches first.
   */
  router.get('/api/review/library', async (_req: Request, res: Response) => {
    try {
      const items = await ctx.reviewQueue.list('library');
      res.json({ items, total: items.length });
    } catch (error) {
      sendError(res, error, 'Error loading library');
    }
  });

  router.post('/api/review/:id/approve', async (req: Request, res: Response) => {
    try {
      const candidate = await ctx.reviewQueue.approve(req.params.id, commentFrom(req.body));
      res.json(candidate);
    } catch (error) {
      sendError(res, error, 'Error approving photo');
    }
  });

  router.post('/api/review/:id/reject', async (req: Request, res: Response) => {
    try {
      const candidate = await ctx.reviewQueue.reject(req.params.id, commentFrom(req.body));
      res.json(candidate);
    } catch (error) {
      sendError(res, error, 'Error rejecting photo');
    }
  });

  router.delete('/api/review/:id', async (req: Request, res: Response) => {
    try {
      await ctx.reviewQueue.delete(req.params.id);
      res.json({ deleted: req.params.id });
    } catch (error) {
      sendError(res, error, 'Error deleting photo');
    }
  });

  return router;
}
