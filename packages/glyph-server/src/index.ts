export { fuzzyMatch, EXACT_SCORE, FUZZY_CEILING, MAX_MATCH_LENGTH } from './matcher';
export type { MatchScore } from './matcher';
export { rankGlyphs, scoreGlyphs } from './ranker';
export type { RankOptions } from './ranker';
export { normalizeName, extractMetadata, SEPARATORS } from './normalize';
export { PrefixTrie } from './trie';
export { GlyphIndex } from './glyph_index';
export type { GlyphIndexOptions, RecordSource } from './glyph_index';
export { GlyphStore } from './glyph_store';
export { importGlyphs, loadFixture, parseFixture } from './importer';
export type { ImportSummary } from './importer';
export { GlyphService } from './orchestrator';
export type { GlyphRepository, GlyphServiceDeps } from './orchestrator';
export { SystemClipboard, ClipboardError } from './clipboard';
export type { ClipboardSink } from './clipboard';
export { loadConfig, defaultConfig } from './config';
export type { AppConfig } from './config';
export { createDispatcher, serveStdio, RpcError } from './rpc';
export type { Dispatcher } from './rpc';
export { createHttpBridge, startHttpBridge } from './http_bridge';
