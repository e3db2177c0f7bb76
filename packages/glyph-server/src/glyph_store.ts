import Database from 'better-sqlite3';
import path from 'path';
import type { GlyphRecord } from '@glyphdeck/shared';

export const GLYPH_SCHEMA = `
  CREATE TABLE IF NOT EXISTS glyphs (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL UNIQUE,
    symbol TEXT NOT NULL,
    category TEXT,
    prefix TEXT,
    normalized_name TEXT,
    created_at DATETIME DEFAULT CURRENT_TIMESTAMP
  );
  CREATE INDEX IF NOT EXISTS idx_name ON glyphs(name);
  CREATE INDEX IF NOT EXISTS idx_category ON glyphs(category);
  CREATE INDEX IF NOT EXISTS idx_prefix ON glyphs(prefix);
  CREATE INDEX IF NOT EXISTS idx_normalized ON glyphs(normalized_name);
  CREATE TABLE IF NOT EXISTS metadata (
    key TEXT PRIMARY KEY,
    value TEXT,
    updated_at DATETIME DEFAULT CURRENT_TIMESTAMP
  );
  CREATE TABLE IF NOT EXISTS favorites (
    name TEXT PRIMARY KEY,
    created_at DATETIME DEFAULT CURRENT_TIMESTAMP
  );
  CREATE INDEX IF NOT EXISTS idx_favorites_created ON favorites(created_at);
`;

interface GlyphRow {
  id: number;
  name: string;
  symbol: string;
  category: string | null;
}

function toRecord(row: GlyphRow): GlyphRecord {
  const record: GlyphRecord = { id: row.id, name: row.name, symbol: row.symbol };
  if (row.category) record.category = row.category;
  return record;
}

function escapeLike(term: string): string {
  return term.replace(/[\\%_]/g, ch => `\\${ch}`);
}

export class GlyphStore {
  private db: Database.Database;
  readonly file: string;

  constructor(dbPath: string) {
    this.file = path.resolve(dbPath);
    this.db = new Database(this.file);
    this.bootstrap();
  }

  private bootstrap() {
    this.db.exec(GLYPH_SCHEMA);
  }

  /** Picks up a database file that was replaced on disk (e.g. by a re-import). */
  reopen() {
    this.close();
    this.db = new Database(this.file);
    this.bootstrap();
  }

  listGlyphs(): GlyphRecord[] {
    return this.db
      .prepare<[], GlyphRow>('SELECT id, name, symbol, category FROM glyphs ORDER BY name')
      .all()
      .map(toRecord);
  }

  /** Case-insensitive substring filter done by SQLite. */
  filterGlyphs(term: string): GlyphRecord[] {
    if (!term) return this.listGlyphs();
    return this.db
      .prepare<[string], GlyphRow>(
        "SELECT id, name, symbol, category FROM glyphs WHERE name LIKE ? ESCAPE '\\' ORDER BY name",
      )
      .all(`%${escapeLike(term)}%`)
      .map(toRecord);
  }

  count(): number {
    const row = this.db.prepare<[], { c: number }>('SELECT COUNT(*) AS c FROM glyphs').get();
    return row?.c ?? 0;
  }

  getMetadata(key: string): string | undefined {
    const row = this.db.prepare<[string], { value: string | null }>('SELECT value FROM metadata WHERE key=?').get(key);
    return row?.value ?? undefined;
  }

  listFavorites(): string[] {
    return this.db
      .prepare<[], { name: string }>('SELECT name FROM favorites ORDER BY created_at, name')
      .all()
      .map(r => r.name);
  }

  addFavorite(name: string) {
    this.db.prepare('INSERT OR IGNORE INTO favorites(name) VALUES (?)').run(name);
  }

  removeFavorite(name: string) {
    this.db.prepare('DELETE FROM favorites WHERE name=?').run(name);
  }

  close() {
    if (this.db.open) this.db.close();
  }
}
