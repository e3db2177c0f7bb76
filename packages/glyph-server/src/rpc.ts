/**
 * JSON-RPC 2.0 surface of the glyph service. The desktop shell sends one
 * request per line on stdin and reads responses from stdout; the HTTP bridge
 * reuses the same dispatcher.
 *
 * Methods:
 *  - get_glyphs(q?, category?, limit?, offset?)
 *  - search(q), search_indexed(q)
 *  - get_categories(), get_stats(), reload()
 *  - toggle_favorite(id), get_favorites()
 *  - get_search_history(), clear_search_history()
 *  - copy_to_clipboard(text)
 *
 * Params may be passed by name or by position, in the order listed above.
 */
import readline from 'readline';
import { Readable, Writable } from 'stream';
import { GlyphService } from './orchestrator';
import { startTimer } from './telemetry';

export const RPC_PARSE_ERROR = -32700;
export const RPC_INVALID_REQUEST = -32600;
export const RPC_METHOD_NOT_FOUND = -32601;
export const RPC_INVALID_PARAMS = -32602;
export const RPC_SERVER_ERROR = -32000;

export type RpcId = string | number | null;

export interface RpcRequest {
  jsonrpc: '2.0';
  id?: RpcId;
  method: string;
  params?: unknown;
}

export interface RpcResponse {
  jsonrpc: '2.0';
  id: RpcId;
  result?: unknown;
  error?: { code: number; message: string };
}

export class RpcError extends Error {
  constructor(readonly code: number, message: string) {
    super(message);
    this.name = 'RpcError';
  }
}

export type Dispatcher = (request: unknown) => Promise<RpcResponse | undefined>;

type Params = Record<string, unknown>;

const PARAM_NAMES = new Map<string, readonly string[]>([
  ['get_glyphs', ['q', 'category', 'limit', 'offset']],
  ['search', ['q']],
  ['search_indexed', ['q']],
  ['get_categories', []],
  ['toggle_favorite', ['id']],
  ['get_favorites', []],
  ['get_search_history', []],
  ['clear_search_history', []],
  ['copy_to_clipboard', ['text']],
  ['get_stats', []],
  ['reload', []],
]);

function isObject(value: unknown): value is Params {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isRpcId(value: unknown): value is RpcId {
  return value === null || typeof value === 'string' || typeof value === 'number';
}

function stringParam(params: Params, key: string, fallback?: string): string {
  const value = params[key];
  if (value === undefined && fallback !== undefined) return fallback;
  if (typeof value !== 'string') throw new RpcError(RPC_INVALID_PARAMS, `${key} must be a string`);
  return value;
}

function intParam(params: Params, key: string, fallback?: number): number {
  const value = params[key];
  if (value === undefined && fallback !== undefined) return fallback;
  if (typeof value !== 'number' || !Number.isInteger(value)) throw new RpcError(RPC_INVALID_PARAMS, `${key} must be an integer`);
  return value;
}

function namedParams(method: string, raw: unknown): Params {
  const names = PARAM_NAMES.get(method);
  if (!names) throw new RpcError(RPC_METHOD_NOT_FOUND, 'Method not found');
  if (raw === undefined) return {};
  if (isObject(raw)) return raw;
  if (!Array.isArray(raw)) throw new RpcError(RPC_INVALID_PARAMS, 'params must be an array or object');
  if (raw.length > names.length) {
    throw new RpcError(RPC_INVALID_PARAMS, `${method} takes at most ${names.length} params`);
  }
  const params: Params = {};
  raw.forEach((value: unknown, i) => {
    params[names[i]] = value;
  });
  return params;
}

function resultCount(result: unknown): number | undefined {
  if (Array.isArray(result)) return result.length;
  if (isObject(result) && typeof result.total === 'number') return result.total;
  return undefined;
}

const SEARCH_METHODS = new Set(['get_glyphs', 'search', 'search_indexed']);

async function invoke(service: GlyphService, method: string, params: Params): Promise<unknown> {
  switch (method) {
    case 'get_glyphs':
      return service.getGlyphs(
        stringParam(params, 'q', ''),
        stringParam(params, 'category', ''),
        intParam(params, 'limit', 0),
        intParam(params, 'offset', 0),
      );
    case 'search':
      return service.search(stringParam(params, 'q', ''));
    case 'search_indexed':
      return service.searchIndexed(stringParam(params, 'q', ''));
    case 'get_categories':
      return service.getCategories();
    case 'toggle_favorite': {
      const id = intParam(params, 'id');
      return { id, isFavorite: service.toggleFavorite(id) };
    }
    case 'get_favorites':
      return service.getFavorites();
    case 'get_search_history':
      return service.getSearchHistory();
    case 'clear_search_history':
      service.clearSearchHistory();
      return { ok: true };
    case 'copy_to_clipboard':
      service.copyToClipboard(stringParam(params, 'text'));
      return { ok: true };
    case 'get_stats':
      return service.getStats();
    case 'reload':
      return { total: await service.reload() };
    default:
      throw new RpcError(RPC_METHOD_NOT_FOUND, 'Method not found');
  }
}

export function createDispatcher(service: GlyphService): Dispatcher {
  return async (request: unknown) => {
    if (!isObject(request) || request.jsonrpc !== '2.0' || typeof request.method !== 'string') {
      return { jsonrpc: '2.0', id: null, error: { code: RPC_INVALID_REQUEST, message: 'Invalid request' } };
    }
    const method = request.method;
    const notification = !('id' in request);
    const id: RpcId = isRpcId(request.id) ? request.id : null;
    // unknown names share one bucket so clients cannot grow the metrics
    const stop = startTimer(PARAM_NAMES.has(method) ? method : 'unknown', 'bridge');
    try {
      const params = namedParams(method, request.params);
      const result = await invoke(service, method, params);
      if (SEARCH_METHODS.has(method)) {
        stop({
          ok: true,
          results: resultCount(result),
          queryLength: typeof params.q === 'string' ? params.q.trim().length : 0,
          strategy: method === 'get_glyphs' ? service.strategy : method === 'search' ? 'scan' : 'indexed',
        });
      } else {
        stop({ ok: true });
      }
      return notification ? undefined : { jsonrpc: '2.0', id, result: result ?? null };
    } catch (err) {
      stop({ ok: false });
      const code = err instanceof RpcError ? err.code : RPC_SERVER_ERROR;
      const message = err instanceof Error ? err.message : 'Internal error';
      if (code === RPC_SERVER_ERROR) console.error(`[glyphdeck] ${method} failed: ${message}`);
      return notification ? undefined : { jsonrpc: '2.0', id, error: { code, message } };
    }
  };
}

/** Handles a single request or a batch; undefined when nothing needs a reply. */
export async function dispatchPayload(
  dispatch: Dispatcher,
  payload: unknown,
): Promise<RpcResponse | RpcResponse[] | undefined> {
  if (Array.isArray(payload)) {
    if (payload.length === 0) {
      return { jsonrpc: '2.0', id: null, error: { code: RPC_INVALID_REQUEST, message: 'Empty batch' } };
    }
    const responses = await Promise.all(payload.map(p => dispatch(p)));
    const filtered = responses.filter((r): r is RpcResponse => r !== undefined);
    return filtered.length ? filtered : undefined;
  }
  return dispatch(payload);
}

export function parseError(): RpcResponse {
  return { jsonrpc: '2.0', id: null, error: { code: RPC_PARSE_ERROR, message: 'Parse error' } };
}

export async function handleLine(dispatch: Dispatcher, line: string): Promise<string | undefined> {
  let payload: unknown;
  try {
    payload = JSON.parse(line);
  } catch {
    return JSON.stringify(parseError());
  }
  const response = await dispatchPayload(dispatch, payload);
  return response === undefined ? undefined : JSON.stringify(response);
}

export function serveStdio(
  dispatch: Dispatcher,
  input: Readable = process.stdin,
  output: Writable = process.stdout,
): readline.Interface {
  const rl = readline.createInterface({ input, terminal: false });
  rl.on('line', line => {
    if (!line.trim()) return;
    handleLine(dispatch, line)
      .then(out => {
        if (out !== undefined) output.write(out + '\n');
      })
      .catch(err => console.error(`[glyphdeck] failed to handle request: ${err instanceof Error ? err.message : String(err)}`));
  });
  return rl;
}
