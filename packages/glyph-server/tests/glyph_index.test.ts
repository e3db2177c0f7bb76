import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { GlyphRecord } from '@glyphdeck/shared';
import { GlyphIndex } from '../src/glyph_index';

const rows: GlyphRecord[] = [
  { id: 1, name: 'nf-cod-account', symbol: 'A' },
  { id: 2, name: 'nf-md-account_box', symbol: 'B' },
  { id: 3, name: 'nf-fa-car', symbol: 'C' },
];

function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  let reject: (err: Error) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

describe('GlyphIndex', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  it('starts empty and not ready', async () => {
    const index = new GlyphIndex();
    expect(index.state).toBe('empty');
    expect(index.isReady()).toBe(false);
    expect(index.all()).toEqual([]);
    expect(index.searchIndexed('acc')).toEqual([]);
    expect(await index.whenReady(0)).toBe(false);
  });

  it('builds a frozen snapshot with derived categories and drops duplicates', async () => {
    const index = new GlyphIndex();
    const total = await index.load(() => [...rows, { id: 9, name: 'nf-fa-car', symbol: 'dup' }, { id: 3, name: 'other', symbol: 'x' }]);
    expect(total).toBe(3);
    expect(index.state).toBe('ready');
    const record = index.get(2);
    expect(record).toEqual({ id: 2, name: 'nf-md-account_box', symbol: 'B', category: 'md', tags: ['account_box'] });
    expect(Object.isFrozen(record)).toBe(true);
    expect(index.get(3)?.symbol).toBe('C');
    expect(index.categories()).toEqual({ cod: 1, md: 1, fa: 1 });
    expect(index.categoryCount).toBe(3);
    expect(index.byCategory('fa').map(r => r.id)).toEqual([3]);
    expect(index.byCategory('nope')).toEqual([]);
  });

  it('wakes waiters once the first load publishes', async () => {
    const index = new GlyphIndex();
    const gate = deferred<GlyphRecord[]>();
    const loading = index.load(() => gate.promise);
    expect(index.state).toBe('loading');
    const waiting = index.whenReady(5000);
    gate.resolve(rows);
    expect(await waiting).toBe(true);
    expect(await loading).toBe(3);
  });

  it('reports failed when the first load throws', async () => {
    const index = new GlyphIndex();
    await expect(index.load(() => Promise.reject(new Error('disk gone')))).rejects.toThrow('disk gone');
    expect(index.state).toBe('failed');
    expect(await index.whenReady(1000)).toBe(false);
  });

  it('keeps the last good snapshot when a reload fails', async () => {
    const index = new GlyphIndex();
    await index.load(() => rows);
    await expect(index.reload(() => { throw new Error('locked'); })).rejects.toThrow('locked');
    expect(index.state).toBe('ready');
    expect(index.size).toBe(3);
  });

  it('replaces the snapshot on reload', async () => {
    const index = new GlyphIndex();
    await index.load(() => rows);
    await index.reload(() => [{ id: 10, name: 'nf-oct-star', symbol: 'S' }]);
    expect(index.all().map(r => r.id)).toEqual([10]);
    expect(index.get(1)).toBeUndefined();
    expect(index.categories()).toEqual({ oct: 1 });
  });

  it('ignores an older load that finishes after a newer one', async () => {
    const index = new GlyphIndex();
    const slow = deferred<GlyphRecord[]>();
    const first = index.load(() => slow.promise);
    await index.load(() => [rows[0]]);
    slow.resolve(rows);
    expect(await first).toBe(1);
    expect(index.all().map(r => r.id)).toEqual([1]);
  });

  it('settles quietly when a superseded load fails', async () => {
    const errors = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const index = new GlyphIndex();
    const slow = deferred<GlyphRecord[]>();
    const first = index.load(() => slow.promise);
    await index.load(() => rows);
    errors.mockClear();
    slow.reject(new Error('stale read'));
    await expect(first).resolves.toBe(3);
    expect(errors).not.toHaveBeenCalled();
    expect(index.state).toBe('ready');
  });

  describe('searchIndexed', () => {
    it('scores word prefixes and prefers shorter names', async () => {
      const index = new GlyphIndex();
      await index.load(() => rows);
      const hits = index.searchIndexed('acc');
      expect(hits.map(h => h.record.id)).toEqual([1, 2]);
      expect(hits.map(h => h.score)).toEqual([336, 333]);
    });

    it('normalizes the query before an exact lookup', async () => {
      const index = new GlyphIndex();
      await index.load(() => rows);
      expect(index.searchIndexed('NF-COD-ACCOUNT').map(h => [h.record.id, h.score])).toEqual([[1, 1036]]);
    });

    it('ranks whole-name prefixes by length', async () => {
      const index = new GlyphIndex();
      await index.load(() => rows);
      const hits = index.searchIndexed('nf');
      expect(hits.map(h => h.record.id)).toEqual([3, 1, 2]);
      expect(hits.map(h => h.score)).toEqual([541, 536, 533]);
    });

    it('falls back to a substring scan', async () => {
      const index = new GlyphIndex();
      await index.load(() => rows);
      expect(index.searchIndexed('ar').map(h => [h.record.id, h.score])).toEqual([[3, 141]]);
      expect(index.searchIndexed('c').map(h => h.record.id)).toEqual([3, 1, 2]);
    });

    it('skips the scan once prefix hits reach the threshold', async () => {
      const index = new GlyphIndex({ fallbackThreshold: 1 });
      await index.load(() => rows);
      expect(index.searchIndexed('c').map(h => h.record.id)).toEqual([3, 1]);
    });
  });
});
