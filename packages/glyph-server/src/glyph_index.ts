import type { GlyphRecord, IndexState, MatchResult } from '@glyphdeck/shared';
import { deriveCategory, deriveTags, normalizeName, splitWords } from './normalize';
import { PrefixTrie } from './trie';

export type RecordSource = () => Promise<readonly GlyphRecord[]> | readonly GlyphRecord[];

export interface GlyphIndexOptions {
  /** Below this many exact+prefix hits, indexed search also scans substrings. */
  fallbackThreshold?: number;
}

interface IndexSnapshot {
  records: readonly GlyphRecord[];
  byId: Map<number, GlyphRecord>;
  order: Map<number, number>;
  normalized: Map<number, string>;
  exact: Map<string, number[]>;
  trie: PrefixTrie;
  categories: Map<string, number[]>;
}

const INDEXED_EXACT = 1000;
const INDEXED_PREFIX = 500;
const INDEXED_WORD_PREFIX = 300;
const INDEXED_SUBSTRING = 100;
const SHORT_NAME_BONUS = 50;

function freezeRecord(row: GlyphRecord): GlyphRecord {
  const category = row.category || deriveCategory(row.name);
  const tags = row.tags ?? deriveTags(row.name);
  const record: GlyphRecord = { id: row.id, name: row.name, symbol: row.symbol, tags: Object.freeze([...tags]) };
  if (category) record.category = category;
  return Object.freeze(record);
}

function buildSnapshot(rows: readonly GlyphRecord[]): IndexSnapshot {
  const seenNames = new Set<string>();
  const records: GlyphRecord[] = [];
  const byId = new Map<number, GlyphRecord>();
  const order = new Map<number, number>();
  const normalized = new Map<number, string>();
  const exact = new Map<string, number[]>();
  const trie = new PrefixTrie();
  const categories = new Map<string, number[]>();

  for (const row of rows) {
    // names are unique in the working set; first occurrence wins
    if (seenNames.has(row.name) || byId.has(row.id)) continue;
    seenNames.add(row.name);
    const record = freezeRecord(row);
    order.set(record.id, records.length);
    records.push(record);
    byId.set(record.id, record);

    const norm = normalizeName(record.name);
    normalized.set(record.id, norm);
    const sameName = exact.get(norm) ?? [];
    sameName.push(record.id);
    exact.set(norm, sameName);
    trie.insert(norm, record.id);
    for (const word of splitWords(norm)) trie.insert(word, record.id);

    if (record.category) {
      const ids = categories.get(record.category) ?? [];
      ids.push(record.id);
      categories.set(record.category, ids);
    }
  }

  return { records: Object.freeze(records), byId, order, normalized, exact, trie, categories };
}

function scoreNormalized(query: string, name: string): number {
  let score = 0;
  if (name === query) score = INDEXED_EXACT;
  else if (name.startsWith(query)) score = INDEXED_PREFIX;
  else if ((' ' + name).includes(' ' + query)) score = INDEXED_WORD_PREFIX;
  else if (name.includes(query)) score = INDEXED_SUBSTRING;
  return score + Math.max(0, SHORT_NAME_BONUS - name.length);
}

/**
 * In-memory candidate set with explicit readiness. Loads build a complete
 * snapshot aside and publish it in one assignment, so queries only ever see
 * the previous snapshot or the new one.
 */
export class GlyphIndex {
  private snapshot?: IndexSnapshot;
  private current: IndexState = 'empty';
  private generation = 0;
  private waiters: Array<(ready: boolean) => void> = [];
  private fallbackThreshold: number;

  constructor(options: GlyphIndexOptions = {}) {
    this.fallbackThreshold = options.fallbackThreshold ?? 10;
  }

  get state(): IndexState {
    return this.current;
  }

  isReady(): boolean {
    return this.snapshot !== undefined;
  }

  async load(source: RecordSource): Promise<number> {
    const gen = ++this.generation;
    this.current = 'loading';
    try {
      const rows = await source();
      const next = buildSnapshot(rows);
      // a newer load started meanwhile; it owns publication
      if (gen !== this.generation) return this.size;
      this.snapshot = next;
      this.current = 'ready';
      this.settleWaiters(true);
      console.error(`[glyphdeck] index loaded: ${next.records.length} glyphs`);
      return next.records.length;
    } catch (err) {
      // superseded; the newer load reports its own outcome
      if (gen !== this.generation) return this.size;
      this.current = this.snapshot ? 'ready' : 'failed';
      if (!this.snapshot) this.settleWaiters(false);
      console.error(`[glyphdeck] index load failed: ${err instanceof Error ? err.message : String(err)}`);
      throw err;
    }
  }

  reload(source: RecordSource): Promise<number> {
    return this.load(source);
  }

  /** Resolves true once a snapshot exists, false on timeout or failed first load. */
  whenReady(timeoutMs: number): Promise<boolean> {
    if (this.snapshot) return Promise.resolve(true);
    if (this.current === 'failed' || timeoutMs <= 0) return Promise.resolve(false);
    return new Promise(resolve => {
      const timer = setTimeout(() => {
        this.waiters = this.waiters.filter(w => w !== settle);
        resolve(false);
      }, timeoutMs);
      const settle = (ready: boolean) => {
        clearTimeout(timer);
        resolve(ready);
      };
      this.waiters.push(settle);
    });
  }

  private settleWaiters(ready: boolean) {
    const pending = this.waiters;
    this.waiters = [];
    for (const w of pending) w(ready);
  }

  all(): readonly GlyphRecord[] {
    return this.snapshot?.records ?? [];
  }

  get size(): number {
    return this.snapshot?.records.length ?? 0;
  }

  get(id: number): GlyphRecord | undefined {
    return this.snapshot?.byId.get(id);
  }

  byCategory(category: string): GlyphRecord[] {
    const snap = this.snapshot;
    if (!snap) return [];
    const ids = snap.categories.get(category) ?? [];
    const out: GlyphRecord[] = [];
    for (const id of ids) {
      const record = snap.byId.get(id);
      if (record) out.push(record);
    }
    return out;
  }

  categories(): Record<string, number> {
    const result: Record<string, number> = {};
    if (!this.snapshot) return result;
    for (const [category, ids] of this.snapshot.categories) result[category] = ids.length;
    return result;
  }

  get categoryCount(): number {
    return this.snapshot?.categories.size ?? 0;
  }

  /**
   * Exact lookup, then trie prefix lookup, then a substring scan when the
   * first two found fewer than `fallbackThreshold` glyphs.
   */
  searchIndexed(query: string): MatchResult[] {
    const snap = this.snapshot;
    const nq = normalizeName(query);
    if (!snap || !nq) return [];

    const ids = new Set<number>(snap.exact.get(nq) ?? []);
    for (const id of snap.trie.lookup(nq)) ids.add(id);
    if (ids.size < this.fallbackThreshold) {
      for (const [id, name] of snap.normalized) {
        if (name.includes(nq)) ids.add(id);
      }
    }

    const results: Array<MatchResult & { order: number }> = [];
    for (const id of ids) {
      const record = snap.byId.get(id);
      const name = snap.normalized.get(id);
      if (!record || name === undefined) continue;
      results.push({ record, score: scoreNormalized(nq, name), order: snap.order.get(id) ?? 0 });
    }
    results.sort((a, b) => (b.score - a.score) || (a.order - b.order));
    return results.map(({ record, score }) => ({ record, score }));
  }
}
