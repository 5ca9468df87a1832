/**
 * Remote history backend: one JSON object in a bucket
 *
 * A single PUT replaces the object whole, which is the only atomicity we need
 * with one run at a time. Two processes sharing the object would race.
 */

import { PersistenceError, describeError } from '../errors.js';
import { parseHistory, serializeHistory } from './history.js';
import type { BlobBucket } from '../storage/bucket.js';
import type { History, HistoryStore } from './types.js';

export class BucketHistoryStore implements HistoryStore {
  constructor(
    private readonly bucket: BlobBucket,
    private readonly key: string
  ) {}

  describe(): string {
    return `bucket:${this.bucket.name}/${this.key}`;
  }

  async load(): Promise<History> {
    let text: string | null;
    try {
      text = await this.bucket.getText(this.key);
    } catch (error) {
      throw new PersistenceError(`Cannot read history ${this.describe()}: ${describeError(error)}`, { cause: error });
    }
    return text === null ? {} : parseHistory(text);
  }

  async save(history: History): Promise<void> {
    try {
      await this.bucket.putText(this.key, serializeHistory(history), 'application/json');
    } catch (error) {
      throw new PersistenceError(`Cannot write history ${this.describe()}: ${describeError(error)}`, { cause: error });
    }
  }
}
