export interface GlyphRecord {
  id: number;
  name: string;
  symbol: string;
  /**
   * Second dash-separated segment of the name (`nf-cod-account` -> `cod`).
   * Derived at load time; absent for names with a single segment.
   */
  category?: string;
  /**
   * Name segments after the category. Derived, never authoritative.
   */
  tags?: readonly string[];
}

export interface MatchResult {
  record: GlyphRecord;
  score: number;
}

export interface GlyphMatch extends MatchResult {
  isFavorite: boolean;
}

export interface GlyphPage {
  glyphs: GlyphMatch[];
  total: number;
  /** Seconds spent serving the request. */
  searchTime: number;
  hasMore: boolean;
}

export type IndexState = 'empty' | 'loading' | 'ready' | 'failed';

export interface ServiceStats {
  totalGlyphs: number;
  totalFavorites: number;
  totalCategories: number;
  cacheLoaded: boolean;
  indexState: IndexState;
}

export interface GlyphFixtureEntry {
  name: string;
  glyph: string;
}
