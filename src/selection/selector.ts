/**
 * Per-channel item selection
 *
 * Picks one undelivered, accessible item uniformly at random:
 * 1. drop candidates without an id
 * 2. keep the ones not yet delivered; if none remain, fall back to all of them
 *    so small channels keep producing (reset-on-exhaustion)
 * 3. shuffle, then probe at most maxAttempts items in shuffled order
 *
 * The probe is the only side effect and is injected, so the loop runs
 * without network access in tests.
 */

import type { AccessibilityProbe, Channel, Item } from '../channels/types.js';

export const DEFAULT_MAX_ATTEMPTS = 10;

export type SelectionPool = 'fresh' | 'exhausted';

export interface SelectionResult {
  channel: Channel;
  item: Item;
  accessible: boolean;
  pool: SelectionPool;
  probes: number;
}

export interface SelectionRequest {
  channel: Channel;
  candidates: readonly Item[];
  deliveredIds: ReadonlySet<string>;
  probe: AccessibilityProbe;
  maxAttempts?: number;
  /** Uniform source in [0, 1); defaults to Math.random */
  random?: () => number;
}

/**
 * Fisher-Yates shuffle into a new array
 */
export function shuffle<T>(items: readonly T[], random: () => number = Math.random): T[] {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [result[i], result[j]] = [result[j], result[i]];
  }
  return result;
}

/**
 * Split candidates into the pool the selector will draw from
 */
export function candidatePool(
  candidates: readonly Item[],
  deliveredIds: ReadonlySet<string>
): { pool: SelectionPool; items: Item[] } {
  const identified = candidates.filter(item => item.id.trim() !== '');
  const fresh = identified.filter(item => !deliveredIds.has(item.id));

  if (fresh.length > 0) {
    return { pool: 'fresh', items: fresh };
  }
  return { pool: 'exhausted', items: identified };
}

async function probeSafely(probe: AccessibilityProbe, item: Item): Promise<boolean> {
  try {
    return await probe.isAccessible(item);
  } catch (error) {
    console.warn(JSON.stringify({
      event: 'probe_error',
      itemId: item.id,
      error: error instanceof Error ? error.message : String(error),
      timestamp: new Date().toISOString(),
    }));
    return false;
  }
}

/**
 * Select one item for a channel, or null when nothing accessible turned up
 * within the attempt budget
 */
export async function selectItem(request: SelectionRequest): Promise<SelectionResult | null> {
  const maxAttempts = Math.max(1, Math.floor(request.maxAttempts ?? DEFAULT_MAX_ATTEMPTS));
  const { pool, items } = candidatePool(request.candidates, request.deliveredIds);

  const order = shuffle(items, request.random).slice(0, maxAttempts);

  let probes = 0;
  for (const item of order) {
    probes++;
    if (await probeSafely(request.probe, item)) {
      return { channel: request.channel, item, accessible: true, pool, probes };
    }
  }

  return null;
}
