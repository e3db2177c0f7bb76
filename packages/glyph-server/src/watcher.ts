import { watch, FSWatcher } from 'chokidar';

export function debounce(fn: () => void, ms: number): () => void {
  let t: NodeJS.Timeout | undefined;
  return () => {
    if (t) clearTimeout(t);
    t = setTimeout(fn, ms);
  };
}

/** Reloads the index whenever the glyph database file is rewritten. */
export function startWatcher(dbFile: string, reload: () => Promise<number>, debounceMs = 500): FSWatcher {
  const watcher = watch(dbFile, { ignoreInitial: true });
  const schedule = debounce(() => {
    reload()
      .then(total => console.error(`[glyphdeck-watch] reloaded ${total} glyphs`))
      .catch(err => console.error(`[glyphdeck-watch] reload failed: ${err instanceof Error ? err.message : String(err)}`));
  }, debounceMs);
  watcher.on('add', schedule).on('change', schedule);
  console.error(`[glyphdeck-watch] watching ${dbFile}`);
  return watcher;
}
