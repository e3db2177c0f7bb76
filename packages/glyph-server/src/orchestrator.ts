import type { GlyphMatch, GlyphPage, GlyphRecord, MatchResult, ServiceStats } from '@glyphdeck/shared';
import { GlyphIndex } from './glyph_index';
import { Favorites, FavoriteStore } from './favorites';
import { SearchHistory } from './history';
import { ClipboardSink } from './clipboard';
import { AppConfig, SearchStrategy, defaultConfig } from './config';
import { rankGlyphs, scoreGlyphs } from './ranker';

export interface GlyphRepository extends FavoriteStore {
  listGlyphs(): GlyphRecord[];
  /** Called before each reload so a replaced database file is picked up. */
  reopen?(): void;
}

export interface GlyphServiceDeps {
  store: GlyphRepository;
  clipboard: ClipboardSink;
  config?: AppConfig;
  index?: GlyphIndex;
}

/**
 * The object the desktop shell talks to. Owns the index, favorites and
 * history; the store is only read here.
 */
export class GlyphService {
  readonly index: GlyphIndex;
  private store: GlyphRepository;
  private clipboard: ClipboardSink;
  private config: AppConfig;
  private favorites: Favorites;
  private history: SearchHistory;

  constructor(deps: GlyphServiceDeps) {
    this.store = deps.store;
    this.clipboard = deps.clipboard;
    this.config = deps.config ?? defaultConfig;
    this.index = deps.index ?? new GlyphIndex({ fallbackThreshold: this.config.search.fallbackThreshold });
    this.favorites = new Favorites(this.store);
    this.history = new SearchHistory(this.config.history.maxSize);
  }

  get strategy(): SearchStrategy {
    return this.config.search.strategy;
  }

  /** Loads favorites, then the index. Callers may keep querying meanwhile. */
  async start(): Promise<void> {
    try {
      const n = this.favorites.load();
      console.error(`[glyphdeck] loaded ${n} favorites`);
    } catch (err) {
      console.error(`[glyphdeck] failed to load favorites: ${err instanceof Error ? err.message : String(err)}`);
    }
    await this.reload();
  }

  reload(): Promise<number> {
    return this.index.reload(() => {
      this.store.reopen?.();
      return this.store.listGlyphs();
    });
  }

  private toMatch(result: MatchResult): GlyphMatch {
    return { record: result.record, score: result.score, isFavorite: this.favorites.has(result.record.name) };
  }

  private rank(term: string, candidates: readonly GlyphRecord[]): GlyphMatch[] {
    if (this.config.search.strategy === 'indexed') {
      const allowed = new Set(candidates.map(r => r.id));
      return this.index
        .searchIndexed(term)
        .filter(r => allowed.has(r.record.id))
        .map(r => this.toMatch(r))
        .sort((a, b) => Number(b.isFavorite) - Number(a.isFavorite));
    }
    return scoreGlyphs(term, candidates, { isFavorite: r => this.favorites.has(r.name) }).map(r => this.toMatch(r));
  }

  async getGlyphs(searchTerm = '', category = '', limit = 0, offset = 0): Promise<GlyphPage> {
    const started = Date.now();
    await this.index.whenReady(this.config.search.readyWaitMs);

    const all = this.index.all();
    if (all.length === 0) return { glyphs: [], total: 0, searchTime: (Date.now() - started) / 1000, hasMore: false };

    const candidates = category ? this.index.byCategory(category) : all;
    const term = searchTerm.trim();
    let matches: GlyphMatch[];
    if (!term) {
      matches = candidates.map(record => this.toMatch({ record, score: 0 }));
    } else {
      matches = this.rank(term, candidates);
      this.history.add(term);
    }

    const total = matches.length;
    const size = limit > 0 ? limit : this.config.search.defaultLimit;
    const start = Math.min(Math.max(0, offset), total);
    const end = Math.min(start + size, total);
    return {
      glyphs: matches.slice(start, end),
      total,
      searchTime: (Date.now() - started) / 1000,
      hasMore: end < total,
    };
  }

  search(query: string): GlyphRecord[] {
    return rankGlyphs(query.trim(), this.index.all());
  }

  searchIndexed(query: string): MatchResult[] {
    return this.index.searchIndexed(query);
  }

  getCategories(): Record<string, number> {
    return this.index.categories();
  }

  toggleFavorite(id: number): boolean {
    const record = this.index.get(id);
    if (!record) throw new Error(`unknown glyph id: ${id}`);
    return this.favorites.toggle(record.name);
  }

  getFavorites(): GlyphMatch[] {
    return this.index
      .all()
      .filter(r => this.favorites.has(r.name))
      .map(record => ({ record, score: 0, isFavorite: true }));
  }

  getSearchHistory(): string[] {
    return this.history.list();
  }

  clearSearchHistory() {
    this.history.clear();
  }

  copyToClipboard(text: string) {
    this.clipboard.write(text);
  }

  getStats(): ServiceStats {
    return {
      totalGlyphs: this.index.size,
      totalFavorites: this.favorites.size,
      totalCategories: this.index.categoryCount,
      cacheLoaded: this.index.isReady(),
      indexState: this.index.state,
    };
  }
}
