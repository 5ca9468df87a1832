/**
 * History store selection
 *
 * The backend is picked here from configuration; everything downstream only
 * sees the HistoryStore interface.
 */

import { ConfigError } from '../errors.js';
import { FileHistoryStore } from './file-store.js';
import { BucketHistoryStore } from './bucket-store.js';
import type { BlobBucket } from '../storage/bucket.js';
import type { EnvConfig } from '../config/env.js';
import type { HistoryStore } from './types.js';

export type HistoryStoreConfig = Pick<
  EnvConfig,
  'HISTORY_BACKEND' | 'HISTORY_FILE' | 'HISTORY_BUCKET' | 'HISTORY_OBJECT_KEY'
>;

export function createHistoryStore(
  config: HistoryStoreConfig,
  openBucket: (name: string) => BlobBucket
): HistoryStore {
  switch (config.HISTORY_BACKEND) {
    case 'file':
      return new FileHistoryStore(config.HISTORY_FILE);
    case 'bucket':
      if (!config.HISTORY_BUCKET) {
        throw new ConfigError('HISTORY_BACKEND=bucket requires HISTORY_BUCKET');
      }
      return new BucketHistoryStore(openBucket(config.HISTORY_BUCKET), config.HISTORY_OBJECT_KEY);
  }
}

export { FileHistoryStore, BucketHistoryStore };
export * from './history.js';
export type { History, HistoryStore } from './types.js';
