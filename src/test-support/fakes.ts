/**
 * In-process stand-ins for the run collaborators
 */

import { PersistenceError } from '../errors.js';
import type { AccessibilityProbe, Channel, Item, ItemLister } from '../channels/types.js';
import type { History, HistoryStore } from '../history/types.js';
import type { AudioDownloader, AudioDownloadResult } from '../media/types.js';
import type { DeliveryMode, DeliveryReceipt, DeliverySink } from '../delivery/sink.js';
import type { AudioArtifact } from '../media/types.js';
import type { BlobBucket } from '../storage/bucket.js';

export function makeItem(id: string, overrides: Partial<Item> = {}): Item {
  return {
    id,
    title: `Episode ${id}`,
    url: `https://www.youtube.com/watch?v=${id}`,
    ...overrides,
  };
}

export function makeItems(...ids: string[]): Item[] {
  return ids.map(id => makeItem(id));
}

/**
 * Random source that leaves the Fisher-Yates shuffle in original order
 */
export const keepOrder = (): number => 0.9999999;

export class FakeLister implements ItemLister {
  readonly calls: Channel[] = [];

  constructor(private readonly listings: Record<Channel, Item[] | Error>) {}

  async list(channel: Channel): Promise<Item[]> {
    this.calls.push(channel);
    const listing = this.listings[channel];
    if (listing === undefined) return [];
    if (listing instanceof Error) throw listing;
    return listing;
  }
}

export class FakeProbe implements AccessibilityProbe {
  readonly probed: string[] = [];

  /** Omit to treat every item as accessible */
  constructor(private readonly accessibleIds?: ReadonlySet<string>) {}

  async isAccessible(item: Item): Promise<boolean> {
    this.probed.push(item.id);
    return this.accessibleIds === undefined || this.accessibleIds.has(item.id);
  }
}

export class FakeDownloader implements AudioDownloader {
  readonly downloaded: string[] = [];

  constructor(
    private readonly sizes: Record<string, number> = {},
    private readonly failingIds: ReadonlySet<string> = new Set()
  ) {}

  async download(item: Item, channel: Channel): Promise<AudioDownloadResult> {
    this.downloaded.push(item.id);
    if (this.failingIds.has(item.id)) {
      return { success: false, item, error: 'simulated extraction failure', reason: 'download_failed' };
    }
    return {
      success: true,
      item,
      channel,
      filePath: `/tmp/fake-audio/${item.id}.mp3`,
      fileSize: this.sizes[item.id] ?? 1024,
      downloadDuration: 5,
    };
  }
}

export class FakeSink implements DeliverySink {
  readonly deliveries: { channel: Channel; itemId: string; mode: DeliveryMode; fileSize: number }[] = [];

  constructor(private readonly failingIds: ReadonlySet<string> = new Set()) {}

  async deliver(artifact: AudioArtifact, mode: DeliveryMode): Promise<DeliveryReceipt> {
    if (this.failingIds.has(artifact.item.id)) {
      throw new Error('simulated SMTP outage');
    }
    this.deliveries.push({ channel: artifact.channel, itemId: artifact.item.id, mode, fileSize: artifact.fileSize });
    return { mode, messageId: `<${artifact.item.id}@test.invalid>` };
  }
}

export class MemoryHistoryStore implements HistoryStore {
  readonly saves: History[] = [];
  /** Number of upcoming load() calls that fail */
  failLoads = 0;
  failSaves = false;

  constructor(public history: History = {}) {}

  describe(): string {
    return 'memory';
  }

  async load(): Promise<History> {
    if (this.failLoads > 0) {
      this.failLoads--;
      throw new PersistenceError('simulated read failure');
    }
    return this.history;
  }

  async save(history: History): Promise<void> {
    if (this.failSaves) {
      throw new PersistenceError('simulated write failure');
    }
    this.history = history;
    this.saves.push(history);
  }
}

export class MemoryBucket implements BlobBucket {
  readonly objects = new Map<string, { body: string; contentType: string }>();
  readonly files = new Map<string, { filePath: string; contentType: string }>();
  failReads = false;
  failWrites = false;

  constructor(public readonly name: string = 'test-bucket') {}

  async getText(key: string): Promise<string | null> {
    if (this.failReads) throw new Error('simulated bucket read failure');
    return this.objects.get(key)?.body ?? null;
  }

  async putText(key: string, body: string, contentType: string): Promise<void> {
    if (this.failWrites) throw new Error('simulated bucket write failure');
    this.objects.set(key, { body, contentType });
  }

  async putFile(key: string, filePath: string, contentType: string): Promise<void> {
    if (this.failWrites) throw new Error('simulated bucket write failure');
    this.files.set(key, { filePath, contentType });
  }

  async presignGet(key: string, expiresInSeconds: number): Promise<string> {
    return `https://${this.name}.test.invalid/${key}?expires=${expiresInSeconds}`;
  }
}
