import { describe, it, expect } from 'vitest';
import { FakeProbe, keepOrder, makeItem, makeItems } from '../test-support/fakes.js';
import { candidatePool, selectItem, shuffle } from './selector.js';
import type { AccessibilityProbe } from '../channels/types.js';

function ids(count: number, prefix = 'v'): string[] {
  return Array.from({ length: count }, (_, i) => `${prefix}${i + 1}`);
}

describe('shuffle', () => {
  it('returns a permutation without touching the input', () => {
    const input = ['a', 'b', 'c', 'd'];
    const result = shuffle(input);
    expect([...result].sort()).toEqual(['a', 'b', 'c', 'd']);
    expect(input).toEqual(['a', 'b', 'c', 'd']);
  });

  it('follows the random source', () => {
    expect(shuffle(['a', 'b', 'c'], () => 0)).toEqual(['b', 'c', 'a']);
    expect(shuffle(['a', 'b', 'c'], keepOrder)).toEqual(['a', 'b', 'c']);
  });
});

describe('candidatePool', () => {
  it('keeps only undelivered items', () => {
    const { pool, items } = candidatePool(makeItems('id1', 'id2', 'id3'), new Set(['id1']));
    expect(pool).toBe('fresh');
    expect(items.map(item => item.id)).toEqual(['id2', 'id3']);
  });

  it('falls back to every candidate once all were delivered', () => {
    const { pool, items } = candidatePool(makeItems('id1', 'id2'), new Set(['id1', 'id2']));
    expect(pool).toBe('exhausted');
    expect(items.map(item => item.id)).toEqual(['id1', 'id2']);
  });

  it('drops candidates without an id', () => {
    const { items } = candidatePool([makeItem(''), makeItem('  '), makeItem('id1')], new Set());
    expect(items.map(item => item.id)).toEqual(['id1']);
  });
});

describe('selectItem', () => {
  it('returns the only undelivered item', async () => {
    const result = await selectItem({
      channel: 'chanX',
      candidates: makeItems('id1', 'id2', 'id3'),
      deliveredIds: new Set(['id1', 'id2']),
      probe: new FakeProbe(),
    });

    expect(result?.item.id).toBe('id3');
    expect(result?.accessible).toBe(true);
    expect(result?.pool).toBe('fresh');
  });

  it('never returns a delivered item while fresh ones remain', async () => {
    for (let run = 0; run < 25; run++) {
      const result = await selectItem({
        channel: 'chanX',
        candidates: makeItems('id1', 'id2', 'id3', 'id4'),
        deliveredIds: new Set(['id1', 'id3']),
        probe: new FakeProbe(),
      });
      expect(['id2', 'id4']).toContain(result?.item.id);
    }
  });

  it('returns one of the candidates when all were delivered', async () => {
    const result = await selectItem({
      channel: 'chanX',
      candidates: makeItems('id1', 'id2', 'id3'),
      deliveredIds: new Set(['id1', 'id2', 'id3']),
      probe: new FakeProbe(),
    });

    expect(['id1', 'id2', 'id3']).toContain(result?.item.id);
    expect(result?.pool).toBe('exhausted');
  });

  it('gives up after ten inaccessible candidates', async () => {
    const probe = new FakeProbe(new Set());
    const result = await selectItem({
      channel: 'chanX',
      candidates: makeItems(...ids(10)),
      deliveredIds: new Set(),
      probe,
      maxAttempts: 10,
    });

    expect(result).toBeNull();
    expect(probe.probed).toHaveLength(10);
  });

  it('does not reach an accessible eleventh candidate', async () => {
    const candidates = makeItems(...ids(11));
    const probe = new FakeProbe(new Set(['v11']));
    const result = await selectItem({
      channel: 'chanX',
      candidates,
      deliveredIds: new Set(),
      probe,
      maxAttempts: 10,
      random: keepOrder,
    });

    expect(result).toBeNull();
    expect(probe.probed).toEqual(ids(10));
  });

  it('tries every candidate when there are fewer than the budget', async () => {
    const probe = new FakeProbe(new Set(['v3']));
    const result = await selectItem({
      channel: 'chanX',
      candidates: makeItems(...ids(3)),
      deliveredIds: new Set(),
      probe,
      random: keepOrder,
    });

    expect(result?.item.id).toBe('v3');
    expect(result?.probes).toBe(3);
    expect(probe.probed).toEqual(['v1', 'v2', 'v3']);
  });

  it('skips inaccessible items and returns the first accessible one', async () => {
    const result = await selectItem({
      channel: 'chanX',
      candidates: makeItems('gated', 'private', 'open', 'also-open'),
      deliveredIds: new Set(),
      probe: new FakeProbe(new Set(['open', 'also-open'])),
      random: keepOrder,
    });

    expect(result?.item.id).toBe('open');
    expect(result?.probes).toBe(3);
  });

  it('treats a throwing probe as inaccessible', async () => {
    const probe: AccessibilityProbe = {
      async isAccessible(item) {
        if (item.id === 'v1') throw new Error('network down');
        return true;
      },
    };
    const result = await selectItem({
      channel: 'chanX',
      candidates: makeItems('v1', 'v2'),
      deliveredIds: new Set(),
      probe,
      random: keepOrder,
    });

    expect(result?.item.id).toBe('v2');
  });

  it('returns null for an empty listing', async () => {
    const probe = new FakeProbe();
    const result = await selectItem({ channel: 'chanX', candidates: [], deliveredIds: new Set(), probe });
    expect(result).toBeNull();
    expect(probe.probed).toEqual([]);
  });

  it('probes at least once when the budget is below one', async () => {
    const probe = new FakeProbe(new Set());
    await selectItem({
      channel: 'chanX',
      candidates: makeItems('v1', 'v2'),
      deliveredIds: new Set(),
      probe,
      maxAttempts: 0,
    });
    expect(probe.probed).toHaveLength(1);
  });
});
