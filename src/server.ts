import express, { NextFunction, Request, Response } from 'express';
import { Server } from 'http';
import { AppContext, ContextOverrides, createAppContext } from './appContext';
import { Config, config as defaultConfig } from './config/config';
import { createFlightRoutes } from './routes/flightRoutes';
import { sendError } from './routes/httpErrors';
import { createQueueRoutes } from './routes/queueRoutes';
import { createReviewRoutes } from './routes/reviewRoutes';
import { logger } from './utils/logger';

export function createApp(ctx: AppContext): express.Express {
  const app = express();

  // Middleware
  app.use(express.json({ limit: '10mb' }));

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.use(createFlightRoutes(ctx));
  app.use(createReviewRoutes(ctx));
  app.use(createQueueRoutes(ctx));

  // Malformed JSON bodies and anything a route let through
  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof SyntaxError) {
      res.status(400).json({ error: 'Malformed JSON body' });
      return;
    }
    sendError(res, error, 'Unhandled request error');
  });

  return app;
}

export interface RunningServer {
  ctx: AppContext;
  server: Server;
  shutdown: (signal: string) => Promise<void>;
}

/**
 * Builds the context, re-queues work left over from the last run, starts the
 * rescan timer and listens.
 */
export async function startServer(cfg: Config = defaultConfig, overrides: ContextOverrides = {}): Promise<RunningServer> {
  const ctx = await createAppContext(cfg, overrides);
  const recovered = await ctx.orchestrator.recover();
  ctx.orchestrator.start();

  const app = createApp(ctx);
  const server = await new Promise<Server>((resolve) => {
    const listening = app.listen(cfg.server.port, '0.0.0.0', () => resolve(listening));
  });

  logger.info(`Server started on port ${cfg.server.port}`);
  logger.info(`Data directory: ${cfg.storage.dataDir}; ${recovered} job(s) recovered; sources: ${ctx.orchestrator.sources.join(', ')}`);

  let isShuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (isShuttingDown) {
      logger.debug(`Shutdown already in progress, ignoring ${signal}`);
      return;
    }
    isShuttingDown = true;
    logger.info(`${signal} received, shutting down gracefully...`);
    const closed = new Promise<void>((resolve) => server.close(() => resolve()));

    const running = ctx.orchestrator.inFlight;
    if (running > 0) {
      logger.info(`Waiting up to ${cfg.queue.shutdownTimeoutMs}ms for ${running} running scrape task(s)`);
    }
    const drained = await ctx.orchestrator.drain(cfg.queue.shutdownTimeoutMs);
    if (!drained) {
      logger.warn(`${ctx.orchestrator.inFlight} scrape task(s) still running; they will be re-queued on the next start`);
    }

    await closed;
    logger.info('Server stopped');
  };

  return { ctx, server, shutdown };
}

if (require.main === module) {
  startServer()
    .then(({ shutdown }) => {
      const onSignal = (signal: string) => {
        shutdown(signal)
          .then(() => process.exit(0))
          .catch((error: unknown) => {
            logger.error('Shutdown failed:', error);
            process.exit(1);
          });
      };
      process.on('SIGTERM', () => onSignal('SIGTERM'));
      process.on('SIGINT', () => onSignal('SIGINT'));
    })
    .catch((error: unknown) => {
      logger.error('Failed to start server:', error);
      process.exit(1);
    });
}
