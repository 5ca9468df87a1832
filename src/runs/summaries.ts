/**
 * Redis storage for recent run summaries
 *
 * Newest first, trimmed to the last 100 runs. Read by the API.
 */

import { queueConnection } from '../config/redis.js';
import type { RunSummary } from './types.js';

const KEYS = {
  /** List of serialized RunSummary, newest first */
  HISTORY: 'channel-run:summaries',
};

const MAX_SUMMARIES = 100;

function isRunSummary(value: unknown): value is RunSummary {
  return (
    typeof value === 'object' &&
    value !== null &&
    'runId' in value &&
    typeof value.runId === 'string' &&
    'outcomes' in value &&
    Array.isArray(value.outcomes)
  );
}

export async function saveRunSummary(summary: RunSummary): Promise<void> {
  await queueConnection.lpush(KEYS.HISTORY, JSON.stringify(summary));
  await queueConnection.ltrim(KEYS.HISTORY, 0, MAX_SUMMARIES - 1);
}

export async function getRunSummaries(limit: number = 20): Promise<RunSummary[]> {
  const items = await queueConnection.lrange(KEYS.HISTORY, 0, limit - 1);
  const summaries: RunSummary[] = [];
  for (const item of items) {
    try {
      const parsed: unknown = JSON.parse(item);
      if (isRunSummary(parsed)) summaries.push(parsed);
    } catch (error) {
      console.warn('Skipping unreadable run summary:', error instanceof Error ? error.message : error);
    }
  }
  return summaries;
}
