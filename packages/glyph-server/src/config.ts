import fs from 'fs';
import path from 'path';

export type SearchStrategy = 'scan' | 'indexed';

export interface StoreConfig {
  dbPath: string;
}

export interface SearchConfig {
  strategy: SearchStrategy;
  defaultLimit: number;
  /** How long a query waits for the first index load, in ms. */
  readyWaitMs: number;
  fallbackThreshold: number;
}

export interface HistoryConfig {
  maxSize: number;
}

export interface BridgeConfig {
  /** 0 disables the HTTP bridge. */
  httpPort: number;
}

export interface WatchConfig {
  enabled: boolean;
  debounceMs: number;
}

export interface ImporterConfig {
  fixturePath: string;
  topCategories: number;
}

export interface TelemetryConfig {
  enabled: boolean;
  logDir: string;
  /** How often buffered metrics are written out, in ms. */
  flushIntervalMs: number;
}

export interface AppConfig {
  store: StoreConfig;
  search: SearchConfig;
  history: HistoryConfig;
  bridge: BridgeConfig;
  watch: WatchConfig;
  importer: ImporterConfig;
  telemetry: TelemetryConfig;
}

export const defaultConfig: AppConfig = {
  store: { dbPath: './glyphdeck.db' },
  search: { strategy: 'scan', defaultLimit: 50, readyWaitMs: 500, fallbackThreshold: 10 },
  history: { maxSize: 20 },
  bridge: { httpPort: 0 },
  watch: { enabled: false, debounceMs: 500 },
  importer: { fixturePath: './data/glyphs.json', topCategories: 10 },
  telemetry: { enabled: true, logDir: './logs', flushIntervalMs: 5000 },
};

type Section = Record<string, unknown>;

function isSection(value: unknown): value is Section {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(parsed: Section, key: string): Section {
  const value = parsed[key];
  return isSection(value) ? value : {};
}

function str(s: Section, key: string, fallback: string): string {
  const v = s[key];
  return typeof v === 'string' && v ? v : fallback;
}

function num(s: Section, key: string, fallback: number): number {
  const v = s[key];
  return typeof v === 'number' && Number.isFinite(v) ? v : fallback;
}

function bool(s: Section, key: string, fallback: boolean): boolean {
  const v = s[key];
  return typeof v === 'boolean' ? v : fallback;
}

function positiveInt(value: number, fallback: number): number {
  return Number.isInteger(value) && value > 0 ? value : fallback;
}

function resolveConfigPath(custom?: string): string | undefined {
  if (custom && fs.existsSync(custom)) return custom;
  const envPath = process.env.GLYPHDECK_CONFIG_PATH;
  if (envPath && fs.existsSync(envPath)) return envPath;
  const defaultPath = path.join(process.cwd(), 'config', 'glyphdeck.json');
  if (fs.existsSync(defaultPath)) return defaultPath;
  return undefined;
}

function applyEnv(config: AppConfig): AppConfig {
  const db = process.env.GLYPHDECK_DB;
  const port = process.env.GLYPHDECK_HTTP_PORT;
  return {
    ...config,
    store: db ? { ...config.store, dbPath: db } : config.store,
    bridge: port ? { ...config.bridge, httpPort: parseInt(port, 10) || 0 } : config.bridge,
  };
}

function readConfigFile(cfgPath: string | undefined): Section {
  if (!cfgPath) return {};
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(cfgPath, 'utf8'));
    return isSection(parsed) ? parsed : {};
  } catch {
    return {};
  }
}

export function loadConfig(customPath?: string): AppConfig {
  const parsed = readConfigFile(resolveConfigPath(customPath));
  const d = defaultConfig;
  const store = section(parsed, 'store');
  const search = section(parsed, 'search');
  const history = section(parsed, 'history');
  const bridge = section(parsed, 'bridge');
  const watch = section(parsed, 'watch');
  const importer = section(parsed, 'importer');
  const telemetry = section(parsed, 'telemetry');
  return applyEnv({
    store: { dbPath: str(store, 'dbPath', d.store.dbPath) },
    search: {
      strategy: search.strategy === 'indexed' ? 'indexed' : 'scan',
      defaultLimit: positiveInt(num(search, 'defaultLimit', d.search.defaultLimit), d.search.defaultLimit),
      readyWaitMs: Math.max(0, num(search, 'readyWaitMs', d.search.readyWaitMs)),
      fallbackThreshold: positiveInt(num(search, 'fallbackThreshold', d.search.fallbackThreshold), d.search.fallbackThreshold),
    },
    history: { maxSize: positiveInt(num(history, 'maxSize', d.history.maxSize), d.history.maxSize) },
    bridge: { httpPort: Math.max(0, num(bridge, 'httpPort', d.bridge.httpPort)) },
    watch: {
      enabled: bool(watch, 'enabled', d.watch.enabled),
      debounceMs: Math.max(0, num(watch, 'debounceMs', d.watch.debounceMs)),
    },
    importer: {
      fixturePath: str(importer, 'fixturePath', d.importer.fixturePath),
      topCategories: positiveInt(num(importer, 'topCategories', d.importer.topCategories), d.importer.topCategories),
    },
    telemetry: {
      enabled: bool(telemetry, 'enabled', d.telemetry.enabled),
      logDir: str(telemetry, 'logDir', d.telemetry.logDir),
      flushIntervalMs: positiveInt(num(telemetry, 'flushIntervalMs', d.telemetry.flushIntervalMs), d.telemetry.flushIntervalMs),
    },
  });
}
