import fs from 'fs';
import path from 'path';
import Database from 'better-sqlite3';
import type { GlyphFixtureEntry } from '@glyphdeck/shared';
import { GLYPH_SCHEMA } from './glyph_store';
import { extractMetadata } from './normalize';

export const SCHEMA_VERSION = '1.0';

export interface CategoryCount {
  name: string;
  count: number;
}

export interface ImportSummary {
  total: number;
  categories: number;
  prefixes: number;
  duplicates: number;
  keptFavorites: number;
  topCategories: CategoryCount[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseFixture(raw: string): GlyphFixtureEntry[] {
  const parsed: unknown = JSON.parse(raw);
  if (!Array.isArray(parsed)) throw new Error('glyph fixture must be a JSON array');
  return parsed.map((entry: unknown, i) => {
    if (!isRecord(entry) || typeof entry.name !== 'string' || typeof entry.glyph !== 'string') {
      throw new Error(`invalid glyph entry at index ${i}`);
    }
    return { name: entry.name, glyph: entry.glyph };
  });
}

export function loadFixture(file: string): GlyphFixtureEntry[] {
  let raw: string;
  try {
    raw = fs.readFileSync(file, 'utf8');
  } catch (err) {
    throw new Error(`reading ${file}: ${err instanceof Error ? err.message : String(err)}`);
  }
  return parseFixture(raw);
}

// Favorites are keyed by name, so they survive a re-import.
function readExistingFavorites(dbPath: string): string[] {
  if (!fs.existsSync(dbPath)) return [];
  let db: Database.Database | undefined;
  try {
    db = new Database(dbPath, { readonly: true, fileMustExist: true });
    return db.prepare<[], { name: string }>('SELECT name FROM favorites').all().map(r => r.name);
  } catch {
    // older databases have no favorites table
    return [];
  } finally {
    db?.close();
  }
}

function removeDatabase(dbPath: string) {
  for (const suffix of ['', '-wal', '-shm']) fs.rmSync(dbPath + suffix, { force: true });
}

export function initDatabase(dbPath: string): Database.Database {
  removeDatabase(dbPath);
  fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  const db = new Database(dbPath);
  try {
    db.pragma('journal_mode = WAL');
    db.pragma('synchronous = NORMAL');
    db.exec(GLYPH_SCHEMA);
  } catch (err) {
    db.close();
    throw new Error(`creating schema: ${err instanceof Error ? err.message : String(err)}`);
  }
  return db;
}

export function populateDatabase(db: Database.Database, glyphs: GlyphFixtureEntry[], favorites: string[] = []): number {
  const insert = db.prepare(
    'INSERT OR IGNORE INTO glyphs(name, symbol, category, prefix, normalized_name) VALUES (?, ?, ?, ?, ?)',
  );
  const insertMeta = db.prepare("INSERT OR REPLACE INTO metadata(key, value, updated_at) VALUES (?, ?, datetime('now'))");
  const insertFavorite = db.prepare(
    'INSERT OR IGNORE INTO favorites(name) SELECT name FROM glyphs WHERE name = ?',
  );

  let duplicates = 0;
  db.exec('BEGIN');
  try {
    glyphs.forEach((glyph, i) => {
      const { category, prefix, normalized } = extractMetadata(glyph.name);
      const info = insert.run(glyph.name, glyph.glyph, category, prefix, normalized);
      if (info.changes === 0) duplicates++;
      if ((i + 1) % 1000 === 0) console.log(`[glyphdeck-import] processed ${i + 1}/${glyphs.length} glyphs...`);
    });
    for (const name of favorites) insertFavorite.run(name);
    insertMeta.run('last_updated', new Date().toISOString());
    insertMeta.run('version', SCHEMA_VERSION);
    db.exec('COMMIT');
  } catch (err) {
    db.exec('ROLLBACK');
    throw err;
  }
  if (duplicates > 0) console.log(`[glyphdeck-import] skipped ${duplicates} duplicate glyphs`);
  return duplicates;
}

export function topCategories(db: Database.Database, limit: number): CategoryCount[] {
  return db
    .prepare<[number], CategoryCount>(
      `SELECT category AS name, COUNT(*) AS count FROM glyphs
       WHERE category != '' GROUP BY category ORDER BY count DESC, category ASC LIMIT ?`,
    )
    .all(limit);
}

function countOf(db: Database.Database, sql: string): number {
  return db.prepare<[], { c: number }>(sql).get()?.c ?? 0;
}

/**
 * Rebuilds the glyph database from a JSON fixture of `{ name, glyph }`
 * entries. Duplicate names keep their first occurrence.
 */
export function importGlyphs(fixturePath: string, dbPath: string, topLimit = 10): ImportSummary {
  const glyphs = loadFixture(fixturePath);
  console.log(`[glyphdeck-import] loaded ${glyphs.length} glyphs from ${fixturePath}`);
  const favorites = readExistingFavorites(dbPath);
  const db = initDatabase(dbPath);
  try {
    const duplicates = populateDatabase(db, glyphs, favorites);
    return {
      total: countOf(db, 'SELECT COUNT(*) AS c FROM glyphs'),
      categories: countOf(db, "SELECT COUNT(DISTINCT category) AS c FROM glyphs WHERE category != ''"),
      prefixes: countOf(db, "SELECT COUNT(DISTINCT prefix) AS c FROM glyphs WHERE prefix != ''"),
      duplicates,
      keptFavorites: countOf(db, 'SELECT COUNT(*) AS c FROM favorites'),
      topCategories: topCategories(db, topLimit),
    };
  } finally {
    db.close();
  }
}
