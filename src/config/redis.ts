/**
 * Redis connections for the run scheduler
 *
 * BullMQ wants different settings for Queue and Worker connections:
 * - Workers need maxRetriesPerRequest: null so a Redis blip does not kill a run
 * - Queues fail fast (enableOfflineQueue: false) so API triggers get an answer
 *
 * Only the long-running service imports this module; the one-shot CLI never
 * touches Redis.
 *
 * @see https://docs.bullmq.io/guide/going-to-production
 */

import { Redis } from 'ioredis';
import { env } from './env.js';

const baseOptions = {
  host: env.REDIS_HOST,
  port: env.REDIS_PORT,
};

/**
 * Linear backoff, capped at 20 seconds
 */
function retryStrategy(times: number): number {
  return Math.min(times * 1000, 20000);
}

export const workerConnection = new Redis({
  ...baseOptions,
  maxRetriesPerRequest: null,
  enableReadyCheck: false,
  retryStrategy,
});

export const queueConnection = new Redis({
  ...baseOptions,
  enableOfflineQueue: false,
  retryStrategy,
});

console.log(`Redis configured for ${env.REDIS_HOST}:${env.REDIS_PORT}`);
