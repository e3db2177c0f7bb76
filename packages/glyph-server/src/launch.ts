#!/usr/bin/env node
import path from 'path';
import { loadConfig } from './config';
import { GlyphStore } from './glyph_store';
import { GlyphService } from './orchestrator';
import { SystemClipboard } from './clipboard';
import { createDispatcher, serveStdio } from './rpc';
import { startHttpBridge } from './http_bridge';
import { startWatcher } from './watcher';
import { configureTelemetry, stopTelemetry } from './telemetry';

function main() {
  const config = loadConfig(process.env.GLYPHDECK_CONFIG_PATH);
  configureTelemetry({
    logDir: config.telemetry.logDir,
    disabled: !config.telemetry.enabled,
    flushIntervalMs: config.telemetry.flushIntervalMs,
  });

  const dbPath = path.resolve(config.store.dbPath);
  console.error(`[glyphdeck] database=${dbPath}`);
  const store = new GlyphStore(dbPath);
  const service = new GlyphService({ store, clipboard: new SystemClipboard(), config });
  // queries issued before this finishes wait up to search.readyWaitMs
  service.start().catch(err => console.error(`[glyphdeck] startup load failed: ${err instanceof Error ? err.message : String(err)}`));

  const dispatch = createDispatcher(service);
  const rl = serveStdio(dispatch);
  const server = config.bridge.httpPort > 0 ? startHttpBridge(dispatch, config.bridge.httpPort) : undefined;
  const watcher = config.watch.enabled
    ? startWatcher(store.file, () => service.reload(), config.watch.debounceMs)
    : undefined;

  let closing = false;
  const shutdown = () => {
    if (closing) return;
    closing = true;
    rl.close();
    server?.close();
    store.close();
    stopTelemetry();
    if (!watcher) return process.exit(0);
    watcher
      .close()
      .catch(err => console.error(`[glyphdeck-watch] close failed: ${err instanceof Error ? err.message : String(err)}`))
      .finally(() => process.exit(0));
  };
  // the shell closes our stdin when it quits
  rl.on('close', shutdown);
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

if (require.main === module) main();
