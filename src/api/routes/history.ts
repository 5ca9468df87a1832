/**
 * REST API route for delivery history
 *
 * GET /api/history - Delivered ids and counts per channel
 */

import { Router, Request, Response } from 'express';
import { countDelivered } from '../../history/history.js';
import type { HistoryStore } from '../../history/types.js';

export function createHistoryRouter(store: HistoryStore): Router {
  const router = Router();

  router.get('/', async (_req: Request, res: Response): Promise<void> => {
    try {
      const history = await store.load();
      res.json({
        store: store.describe(),
        counts: countDelivered(history),
        history,
      });
    } catch (error) {
      console.error('Failed to load history:', error instanceof Error ? error.message : error);
      res.status(503).json({ error: 'History unavailable', store: store.describe() });
    }
  });

  return router;
}
