/**
 * Delivery history types
 */

import type { Channel } from '../channels/types.js';

/**
 * Channel -> ids delivered for that channel
 * Arrays behave as sets: an id appears at most once per channel
 */
export type History = Readonly<Record<Channel, readonly string[]>>;

/**
 * Persistence backend for the history
 *
 * load() resolves to an empty history when nothing was saved yet and rejects
 * with PersistenceError only on real I/O or parse failures. save() replaces the
 * whole document; readers never observe a half-written one.
 */
export interface HistoryStore {
  /** Where the history lives, for logs */
  describe(): string;
  load(): Promise<History>;
  save(history: History): Promise<void>;
}
