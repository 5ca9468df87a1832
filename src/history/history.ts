/**
 * Pure operations on delivery history
 *
 * Callers pass the current snapshot explicitly and get a new one back;
 * nothing here mutates its input or touches storage.
 */

import { PersistenceError } from '../errors.js';
import type { Channel } from '../channels/types.js';
import type { History } from './types.js';

export function emptyHistory(): History {
  return {};
}

/**
 * Ids recorded for a channel (own keys only, so a channel called
 * "constructor" does not pick up Object.prototype)
 */
function idsFor(history: History, channel: Channel): readonly string[] {
  return Object.hasOwn(history, channel) ? history[channel] : [];
}

/**
 * Snapshot of the ids already delivered for a channel
 */
export function deliveredIds(history: History, channel: Channel): Set<string> {
  return new Set(idsFor(history, channel));
}

/**
 * Add an id to a channel's delivered set
 * Recording an id that is already present returns the history unchanged
 */
export function record(history: History, channel: Channel, itemId: string): History {
  const existing = idsFor(history, channel);
  if (existing.includes(itemId)) {
    return history;
  }
  return { ...history, [channel]: [...existing, itemId] };
}

/**
 * Delivered count per channel, for the API
 */
export function countDelivered(history: History): Record<Channel, number> {
  return Object.fromEntries(Object.entries(history).map(([channel, ids]) => [channel, ids.length]));
}

/**
 * Encode history as JSON with sorted channel keys
 * Equal histories always produce identical text
 */
export function serializeHistory(history: History): string {
  const sorted = Object.fromEntries(
    Object.keys(history)
      .sort()
      .map(channel => [channel, [...new Set(idsFor(history, channel))]])
  );
  return `${JSON.stringify(sorted, null, 2)}\n`;
}

/**
 * Decode history text
 * Blank input is an empty history; anything else must be a channel -> string[] object
 */
export function parseHistory(text: string): History {
  if (text.trim() === '') {
    return emptyHistory();
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new PersistenceError('History is not valid JSON', { cause: error });
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new PersistenceError('History must be a JSON object of channel -> id list');
  }

  const entries: [Channel, string[]][] = [];
  for (const [channel, ids] of Object.entries(parsed)) {
    if (!Array.isArray(ids) || !ids.every((id): id is string => typeof id === 'string')) {
      throw new PersistenceError(`History entry for '${channel}' must be a list of ids`);
    }
    entries.push([channel, [...new Set(ids)]]);
  }

  return Object.fromEntries(entries);
}

/**
 * Union of two histories, channel by channel
 */
export function mergeHistories(base: History, extra: History): History {
  let merged = base;
  for (const [channel, ids] of Object.entries(extra)) {
    for (const id of ids) {
      merged = record(merged, channel, id);
    }
  }
  return merged;
}
