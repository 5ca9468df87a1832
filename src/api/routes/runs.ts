/**
 * REST API routes for runs
 *
 * GET /api/runs - Recent run summaries (newest first)
 * POST /api/runs - Queue a manual run
 * GET /api/runs/jobs/:jobId - State of a queued run
 */

import { Router, Request, Response } from 'express';
import { runQueue, enqueueManualRun } from '../../runs/run.queue.js';
import { getRunSummaries } from '../../runs/summaries.js';

export const runsRouter = Router();

/**
 * ?limit= between 1 and 100, default 20
 */
export function parseLimit(raw: unknown): number {
  const parsed = typeof raw === 'string' ? parseInt(raw, 10) : NaN;
  if (!Number.isFinite(parsed)) return 20;
  return Math.min(100, Math.max(1, parsed));
}

runsRouter.get('/', async (req: Request, res: Response): Promise<void> => {
  try {
    const summaries = await getRunSummaries(parseLimit(req.query.limit));
    res.json({ runs: summaries });
  } catch (error) {
    console.error('Failed to read run summaries:', error instanceof Error ? error.message : error);
    res.status(500).json({ error: 'Failed to read run summaries' });
  }
});

/**
 * Returns 202 with the job id; the run itself starts when the worker is free
 */
runsRouter.post('/', async (_req: Request, res: Response): Promise<void> => {
  try {
    const jobId = await enqueueManualRun();
    res.status(202).json({ jobId, status: 'queued' });
  } catch (error) {
    console.error('Failed to queue manual run:', {
      error: error instanceof Error ? error.message : String(error),
      timestamp: new Date().toISOString(),
    });
    res.status(500).json({ error: 'Failed to queue run' });
  }
});

runsRouter.get('/jobs/:jobId', async (req: Request, res: Response): Promise<void> => {
  const { jobId } = req.params;

  try {
    const job = await runQueue.getJob(jobId);
    if (!job) {
      res.status(404).json({ error: 'Job not found' });
      return;
    }

    const state = await job.getState();
    res.json({
      jobId: job.id,
      state,
      trigger: job.data.trigger,
      summary: state === 'completed' ? job.returnvalue : undefined,
      error: state === 'failed' ? job.failedReason : undefined,
    });
  } catch (error) {
    console.error('Failed to get run job:', {
      jobId,
      error: error instanceof Error ? error.message : String(error),
    });
    res.status(500).json({ error: 'Failed to retrieve job' });
  }
});
