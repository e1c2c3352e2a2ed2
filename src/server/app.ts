import cors from 'cors';
import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import type { Logger } from '../logging/logger';
import type { CycleStats } from '../watcher/stats';

export interface StatusServerOptions {
  serviceName: string;
  stats: CycleStats;
  logger: Logger;
}

/**
 * Read-only HTTP view of the watcher: liveness plus the in-memory cycle counters.
 */
export function createStatusApp(options: StatusServerOptions): Express {
  const { serviceName, stats, logger } = options;
  const app = express();

  app.use(
    cors({
      origin: '*',
      methods: ['GET', 'OPTIONS'],
    }),
  );

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', service: serviceName, timestamp: new Date().toISOString() });
  });

  app.get('/status', (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json({ data: stats.snapshot() });
    } catch (error) {
      next(error);
    }
  });

  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    logger.error('server.error', err);
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}
