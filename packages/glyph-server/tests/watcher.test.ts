import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { startWatcher } from '../src/watcher';

describe('startWatcher', () => {
  let tempDir: string;

  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'glyphdeck-watch-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('reloads once after a burst of writes settles', async () => {
    const dbFile = path.join(tempDir, 'glyphs.db');
    fs.writeFileSync(dbFile, 'v1', 'utf8');
    const reload = vi.fn(() => Promise.resolve(3));
    const watcher = startWatcher(dbFile, reload, 200);
    try {
      await new Promise<void>(resolve => watcher.on('ready', () => resolve()));
      expect(reload).not.toHaveBeenCalled();

      fs.writeFileSync(dbFile, 'v2', 'utf8');
      fs.writeFileSync(dbFile, 'v3', 'utf8');
      await vi.waitFor(() => expect(reload).toHaveBeenCalledTimes(1), { timeout: 3000, interval: 50 });
      await new Promise(resolve => setTimeout(resolve, 400));
      expect(reload).toHaveBeenCalledTimes(1);
    } finally {
      await watcher.close();
    }
  }, 10000);
});
