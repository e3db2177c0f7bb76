import fs from 'fs';
import path from 'path';

/** What a bridge request reports besides its duration. */
export interface RequestFacts {
  ok?: boolean;
  /** Hits before pagination, for the search methods. */
  results?: number;
  queryLength?: number;
  strategy?: string;
}

interface MetricRecord extends RequestFacts {
  name: string;
  source: string;
  duration_ms: number;
  ts: string;
}

export interface MetricAggregate {
  name: string;
  source: string;
  count: number;
  errors: number;
  total: number;
  avg: number;
  max: number;
  min: number;
  /** Sum of `results` over requests that reported one. */
  results: number;
}

export interface TelemetryOptions {
  logDir?: string;
  disabled?: boolean;
  disableProm?: boolean;
  disableSnapshot?: boolean;
  /** 0 leaves flushing to explicit `flushTelemetry()` calls. */
  flushIntervalMs?: number;
}

type Entry = Omit<MetricAggregate, 'avg'>;

let logDir = path.join(process.cwd(), 'logs');
let enabled = true;
let promEnabled = true;
let jsonSnapshotEnabled = true;
let flushIntervalMs = 5000;
let flushTimer: NodeJS.Timeout | undefined;

const aggregates = new Map<string, Entry>();
let pending: string[] = [];
let dirty = false;

export function configureTelemetry(options: TelemetryOptions = {}) {
  if (options.logDir) logDir = path.resolve(process.cwd(), options.logDir);
  if (typeof options.disabled === 'boolean') enabled = !options.disabled;
  if (typeof options.disableProm === 'boolean') promEnabled = !options.disableProm;
  if (typeof options.disableSnapshot === 'boolean') jsonSnapshotEnabled = !options.disableSnapshot;
  if (typeof options.flushIntervalMs === 'number') flushIntervalMs = Math.max(0, options.flushIntervalMs);

  if (flushTimer) clearInterval(flushTimer);
  flushTimer = undefined;
  if (enabled && flushIntervalMs > 0) {
    flushTimer = setInterval(flushTelemetry, flushIntervalMs);
    flushTimer.unref();
  }
}

export function resetTelemetry() {
  aggregates.clear();
  pending = [];
  dirty = false;
}

/** Stops the flush timer and writes whatever is still buffered. */
export function stopTelemetry() {
  if (flushTimer) clearInterval(flushTimer);
  flushTimer = undefined;
  flushTelemetry();
}

export function startTimer(name: string, source = 'unknown') {
  const start = Date.now();
  return (facts: RequestFacts = {}) => {
    record({ ...facts, name, source, duration_ms: Date.now() - start, ts: new Date().toISOString() });
  };
}

function warn(what: string, err: unknown) {
  if (process.env.DEBUG_TELEMETRY) console.warn(`[telemetry] failed to write ${what}`, err);
}

function record(m: MetricRecord) {
  updateAggregates(m);
  if (!enabled) return;
  pending.push(JSON.stringify(m));
  dirty = true;
}

function updateAggregates(m: MetricRecord) {
  const key = JSON.stringify([m.name, m.source]);
  const entry = aggregates.get(key) ?? {
    name: m.name,
    source: m.source,
    count: 0,
    errors: 0,
    total: 0,
    max: Number.MIN_SAFE_INTEGER,
    min: Number.MAX_SAFE_INTEGER,
    results: 0,
  };
  entry.count += 1;
  if (m.ok === false) entry.errors += 1;
  entry.total += m.duration_ms;
  entry.max = Math.max(entry.max, m.duration_ms);
  entry.min = Math.min(entry.min, m.duration_ms);
  entry.results += m.results ?? 0;
  aggregates.set(key, entry);
}

export function telemetrySnapshot(): MetricAggregate[] {
  return Array.from(aggregates.values(), entry => ({ ...entry, avg: entry.count ? entry.total / entry.count : 0 }));
}

/** Appends buffered records to the JSON log and rewrites the Prometheus and snapshot files. */
export function flushTelemetry() {
  if (!enabled || !dirty) return;
  const lines = pending;
  pending = [];
  dirty = false;
  try {
    fs.mkdirSync(logDir, { recursive: true });
    if (lines.length) fs.appendFileSync(path.join(logDir, 'telemetry.log'), lines.join('\n') + '\n', 'utf8');
  } catch (err) {
    warn('JSON log', err);
  }
  if (promEnabled) emitPrometheus();
  if (jsonSnapshotEnabled) emitJsonSnapshot();
}

function label(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n');
}

function emitPrometheus() {
  try {
    const lines: string[] = [
      '# HELP glyphdeck_request_duration_ms Bridge request durations in milliseconds.',
      '# TYPE glyphdeck_request_duration_ms summary',
    ];
    for (const s of telemetrySnapshot()) {
      const labels = `{name="${label(s.name)}",source="${label(s.source)}"}`;
      lines.push(`glyphdeck_request_duration_ms_count${labels} ${s.count}`);
      lines.push(`glyphdeck_request_duration_ms_sum${labels} ${s.total}`);
      lines.push(`glyphdeck_request_duration_ms_avg${labels} ${s.avg.toFixed(2)}`);
      lines.push(`glyphdeck_request_duration_ms_max${labels} ${s.max}`);
      lines.push(`glyphdeck_request_duration_ms_min${labels} ${s.min}`);
      lines.push(`glyphdeck_request_errors_total${labels} ${s.errors}`);
      lines.push(`glyphdeck_search_results_total${labels} ${s.results}`);
    }
    fs.writeFileSync(path.join(logDir, 'telemetry.prom'), lines.join('\n') + '\n', 'utf8');
  } catch (err) {
    warn('Prometheus output', err);
  }
}

function emitJsonSnapshot() {
  try {
    fs.writeFileSync(path.join(logDir, 'telemetry_latest.json'), JSON.stringify(telemetrySnapshot(), null, 2), 'utf8');
  } catch (err) {
    warn('JSON snapshot', err);
  }
}
