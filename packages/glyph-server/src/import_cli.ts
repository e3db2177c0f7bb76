#!/usr/bin/env node
import path from 'path';
import { importGlyphs } from './importer';
import { loadConfig } from './config';

function parseArgs(argv: string[]): { input?: string; db?: string; config?: string } {
  const result: { input?: string; db?: string; config?: string } = {};
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg.startsWith('--input=')) {
      result.input = arg.slice('--input='.length);
    } else if (arg === '--input' && argv[i + 1]) {
      result.input = argv[++i];
    } else if (arg.startsWith('--db=')) {
      result.db = arg.slice('--db='.length);
    } else if (arg === '--db' && argv[i + 1]) {
      result.db = argv[++i];
    } else if (arg.startsWith('--config=')) {
      result.config = arg.slice('--config='.length);
    } else if (arg === '--config' && argv[i + 1]) {
      result.config = argv[++i];
    }
  }
  return result;
}

function main() {
  const args = parseArgs(process.argv.slice(2));
  const config = loadConfig(args.config);
  const input = path.resolve(args.input ?? config.importer.fixturePath);
  const db = path.resolve(args.db ?? config.store.dbPath);
  const summary = importGlyphs(input, db, config.importer.topCategories);

  console.log('[glyphdeck-import] === database generation complete ===');
  console.log(`[glyphdeck-import] total glyphs: ${summary.total}`);
  console.log(`[glyphdeck-import] unique categories: ${summary.categories}`);
  console.log(`[glyphdeck-import] unique prefixes: ${summary.prefixes}`);
  console.log(`[glyphdeck-import] favorites kept: ${summary.keptFavorites}`);
  console.log(`[glyphdeck-import] database file: ${db}`);
  console.log(`[glyphdeck-import] top ${summary.topCategories.length} categories:`);
  summary.topCategories.forEach((cat, i) => {
    console.log(`[glyphdeck-import]   ${i + 1}. ${cat.name}: ${cat.count} glyphs`);
  });
}

try {
  main();
} catch (err) {
  console.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
}
