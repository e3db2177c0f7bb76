import http from 'http';
import { Dispatcher, dispatchPayload, parseError } from './rpc';

function sendJson(res: http.ServerResponse, status: number, body: unknown) {
  res.writeHead(status, { 'content-type': 'application/json' });
  res.end(JSON.stringify(body));
}

/**
 * Same methods as the stdio bridge, for shells that prefer HTTP:
 * `POST /rpc` with a JSON-RPC request or batch, `GET /health`.
 */
export function createHttpBridge(dispatch: Dispatcher): http.Server {
  return http.createServer((req, res) => {
    if (!req.url) return sendJson(res, 400, { error: 'Bad request' });
    const url = new URL(req.url, `http://${req.headers.host ?? '127.0.0.1'}`);
    if (url.pathname === '/health') {
      if (req.method !== 'GET') return sendJson(res, 405, { error: 'Method not allowed' });
      return sendJson(res, 200, { ok: true });
    }
    if (url.pathname !== '/rpc') return sendJson(res, 404, { error: 'Not found' });
    if (req.method !== 'POST') return sendJson(res, 405, { error: 'Method not allowed' });

    const chunks: Buffer[] = [];
    req.on('data', (c: Buffer) => chunks.push(c));
    req.on('end', () => {
      let payload: unknown;
      try {
        payload = JSON.parse(Buffer.concat(chunks).toString('utf8'));
      } catch {
        return sendJson(res, 200, parseError());
      }
      dispatchPayload(dispatch, payload)
        .then(response => {
          if (response === undefined) {
            res.writeHead(204);
            res.end();
          } else {
            sendJson(res, 200, response);
          }
        })
        .catch(err => sendJson(res, 500, { error: err instanceof Error ? err.message : 'Internal error' }));
    });
  });
}

export function startHttpBridge(dispatch: Dispatcher, port: number, host = '127.0.0.1'): http.Server {
  const server = createHttpBridge(dispatch);
  server.listen(port, host, () => console.error(`[glyphdeck] HTTP bridge listening at http://${host}:${port}/rpc`));
  return server;
}
