import { describe, it, expect } from 'vitest';
import { ConfigError, PersistenceError } from '../errors.js';
import { MemoryBucket } from '../test-support/fakes.js';
import { BucketHistoryStore } from './bucket-store.js';
import { FileHistoryStore, createHistoryStore } from './index.js';

describe('BucketHistoryStore', () => {
  it('loads an empty history when the object is missing', async () => {
    const store = new BucketHistoryStore(new MemoryBucket(), 'history.json');
    await expect(store.load()).resolves.toEqual({});
  });

  it('stores the serialized history as JSON', async () => {
    const bucket = new MemoryBucket();
    const store = new BucketHistoryStore(bucket, 'state/history.json');
    await store.save({ chanX: ['id1'] });

    expect(bucket.objects.get('state/history.json')).toEqual({
      body: '{\n  "chanX": [\n    "id1"\n  ]\n}\n',
      contentType: 'application/json',
    });
    await expect(store.load()).resolves.toEqual({ chanX: ['id1'] });
  });

  it('wraps read failures in PersistenceError', async () => {
    const bucket = new MemoryBucket();
    bucket.failReads = true;
    const store = new BucketHistoryStore(bucket, 'history.json');
    await expect(store.load()).rejects.toThrow(
      'Cannot read history bucket:test-bucket/history.json: simulated bucket read failure'
    );
  });

  it('wraps write failures in PersistenceError', async () => {
    const bucket = new MemoryBucket();
    bucket.failWrites = true;
    const store = new BucketHistoryStore(bucket, 'history.json');
    await expect(store.save({})).rejects.toBeInstanceOf(PersistenceError);
  });
});

describe('createHistoryStore', () => {
  const base = {
    HISTORY_FILE: './data/history.json',
    HISTORY_BUCKET: undefined,
    HISTORY_OBJECT_KEY: 'history.json',
  };

  it('builds a file store by default', () => {
    const store = createHistoryStore({ ...base, HISTORY_BACKEND: 'file' }, () => new MemoryBucket());
    expect(store).toBeInstanceOf(FileHistoryStore);
    expect(store.describe()).toBe('file:./data/history.json');
  });

  it('builds a bucket store on the named bucket', () => {
    const opened: string[] = [];
    const store = createHistoryStore(
      { ...base, HISTORY_BACKEND: 'bucket', HISTORY_BUCKET: 'audio-state' },
      (name) => {
        opened.push(name);
        return new MemoryBucket(name);
      }
    );
    expect(opened).toEqual(['audio-state']);
    expect(store.describe()).toBe('bucket:audio-state/history.json');
  });

  it('refuses a bucket backend without a bucket', () => {
    expect(() => createHistoryStore({ ...base, HISTORY_BACKEND: 'bucket' }, () => new MemoryBucket())).toThrow(
      ConfigError
    );
  });
});
