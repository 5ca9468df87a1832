/**
 * Express server for the channel audio service
 *
 * - Health check (/health)
 * - Run summaries and manual trigger (/api/runs)
 * - Delivery history (/api/history)
 * - Bull Board dashboard (/admin/queues)
 */

import express, { Request, Response } from 'express';
import { runsRouter } from './routes/runs.js';
import { createHistoryRouter } from './routes/history.js';
import { serverAdapter } from './monitoring.js';
import { env } from '../config/env.js';
import type { HistoryStore } from '../history/types.js';

export function createApp(store: HistoryStore): express.Express {
  const app = express();

  app.use(express.json());

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', channels: env.CHANNELS.length });
  });

  app.use('/api/runs', runsRouter);
  app.use('/api/history', createHistoryRouter(store));
  app.use('/admin/queues', serverAdapter.getRouter());

  return app;
}

export function startServer(store: HistoryStore): void {
  const port = env.PORT;

  createApp(store).listen(port, () => {
    console.log(`Server listening on port ${port}`);
    console.log(`Bull Board available at http://localhost:${port}/admin/queues`);
  });
}
