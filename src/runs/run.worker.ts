/**
 * Run worker
 *
 * Executes queued runs one at a time, stores the summary for the API and
 * posts it to Discord.
 */

import { Worker, Job } from 'bullmq';
import { workerConnection } from '../config/redis.js';
import { env } from '../config/env.js';
import { RUN_QUEUE_NAME } from './run.queue.js';
import { saveRunSummary } from './summaries.js';
import { notifyRunComplete } from '../notifications/discord.js';
import type { RunJobData } from './run.queue.js';
import type { RunOrchestrator } from './orchestrator.js';
import type { RunSummary } from './types.js';

let worker: Worker<RunJobData, RunSummary> | null = null;

export async function startRunWorker(orchestrator: RunOrchestrator): Promise<void> {
  worker = new Worker<RunJobData, RunSummary>(
    RUN_QUEUE_NAME,
    async (job: Job<RunJobData, RunSummary>) => {
      const summary = await orchestrator.run({
        channels: env.CHANNELS,
        trigger: job.data.trigger,
        runId: job.id,
      });

      await job.log(`Committed ${summary.committed}/${summary.attempted} channels`);

      try {
        await saveRunSummary(summary);
      } catch (error) {
        console.error('Failed to store run summary:', error instanceof Error ? error.message : error);
      }
      await notifyRunComplete(summary);

      return summary;
    },
    {
      connection: workerConnection,
      concurrency: 1,
      // Runs take minutes per channel; keep the lock alive well past that
      lockDuration: 10 * 60 * 1000,
    }
  );

  worker.on('failed', (job, err) => {
    console.error(JSON.stringify({
      event: 'run_failed',
      jobId: job?.id,
      error: err.message,
      timestamp: new Date().toISOString(),
    }));
  });

  console.log(`Run worker started for queue '${RUN_QUEUE_NAME}'`);
}

export async function stopRunWorker(): Promise<void> {
  if (worker) {
    await worker.close();
    worker = null;
    console.log('Run worker stopped');
  }
}
