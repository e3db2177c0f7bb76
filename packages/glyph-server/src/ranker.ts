import type { GlyphRecord, MatchResult } from '@glyphdeck/shared';
import { fuzzyMatch } from './matcher';

export interface RankOptions {
  /** When given, favorites sort ahead of everything else regardless of score. */
  isFavorite?: (record: GlyphRecord) => boolean;
}

interface Ranked extends MatchResult {
  favorite: boolean;
  order: number;
}

function compareRanked(a: Ranked, b: Ranked): number {
  if (a.favorite !== b.favorite) return a.favorite ? -1 : 1;
  if (a.score !== b.score) return b.score - a.score;
  return a.order - b.order;
}

export function scoreGlyphs(
  query: string,
  candidates: readonly GlyphRecord[] | undefined,
  options: RankOptions = {},
): MatchResult[] {
  if (!candidates || candidates.length === 0) return [];
  if (query === '') return candidates.map(record => ({ record, score: 0 }));

  const ranked: Ranked[] = [];
  candidates.forEach((record, order) => {
    const { score, isMatch } = fuzzyMatch(query, record.name);
    if (!isMatch) return;
    ranked.push({ record, score, order, favorite: options.isFavorite ? options.isFavorite(record) : false });
  });
  ranked.sort(compareRanked);
  return ranked.map(({ record, score }) => ({ record, score }));
}

/**
 * Filters and orders candidates for a query. An empty query is a pass-through
 * that keeps the caller's order.
 */
export function rankGlyphs(
  query: string,
  candidates: readonly GlyphRecord[] | undefined,
  options: RankOptions = {},
): GlyphRecord[] {
  return scoreGlyphs(query, candidates, options).map(r => r.record);
}
