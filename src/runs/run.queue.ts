/**
 * Run queue and scheduler
 *
 * A BullMQ Job Scheduler enqueues one run every RUN_INTERVAL_HOURS. Manual
 * triggers from the API land in the same queue; the worker runs with
 * concurrency 1, so runs never overlap.
 */

import { Queue } from 'bullmq';
import { queueConnection } from '../config/redis.js';
import { env } from '../config/env.js';
import type { RunSummary, RunTrigger } from './types.js';

export const RUN_QUEUE_NAME = 'channel-run';

export interface RunJobData {
  trigger: RunTrigger;
  requestedAt: string;
}

export const runQueue = new Queue<RunJobData, RunSummary>(RUN_QUEUE_NAME, {
  connection: queueConnection,
  defaultJobOptions: {
    // A retried run would re-probe and re-download; the next schedule covers it
    attempts: 1,
    removeOnComplete: { count: 50, age: 30 * 24 * 3600 },
    removeOnFail: { count: 100 },
  },
});

export async function initializeRunScheduler(): Promise<void> {
  const intervalMs = env.RUN_INTERVAL_HOURS * 60 * 60 * 1000;

  await runQueue.upsertJobScheduler(
    'channel-run-scheduler',
    { every: intervalMs },
    {
      name: 'scheduled-run',
      data: { trigger: 'scheduled', requestedAt: new Date().toISOString() },
    }
  );

  console.log(`Channel run scheduled: every ${env.RUN_INTERVAL_HOURS} hour(s) for ${env.CHANNELS.length} channel(s)`);
}

export async function enqueueManualRun(): Promise<string | undefined> {
  const job = await runQueue.add('manual-run', {
    trigger: 'manual',
    requestedAt: new Date().toISOString(),
  });
  return job.id;
}
