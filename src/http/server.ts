import { createServer, IncomingMessage, Server, ServerResponse } from 'http';
import type { ActivityRegistry } from '../activities/registry.js';
import type { RegistryErrorKind, RegistryResult } from '../activities/types.js';

const INDEX_PATH = '/static/index.html';

const STATUS_BY_KIND: Record<RegistryErrorKind, number> = {
  not_found: 404,
  conflict: 400,
  invalid: 422,
};

const CORS_HEADERS = {
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Methods': 'GET, POST, DELETE, OPTIONS',
  'Access-Control-Allow-Headers': 'Content-Type',
};

// --- HTTP helpers ---

function json(res: ServerResponse, status: number, data: unknown, headers: Record<string, string> = {}): void {
  res.writeHead(status, { 'Content-Type': 'application/json', 'Access-Control-Allow-Origin': '*', ...headers });
  res.end(JSON.stringify(data));
}

function redirect(res: ServerResponse, location: string): void {
  res.writeHead(307, { Location: location, 'Content-Length': '0' });
  res.end();
}

function sendResult(res: ServerResponse, result: RegistryResult): void {
  if (result.ok) {
    json(res, 200, { message: result.message });
  } else {
    json(res, STATUS_BY_KIND[result.kind], { detail: result.error });
  }
}

function requireEmail(res: ServerResponse, query: URLSearchParams): string | null {
  const email = query.get('email');
  if (email === null) {
    json(res, 422, {
      detail: [{ type: 'missing', loc: ['query', 'email'], msg: 'Field required', input: null }],
    });
  }
  return email;
}

/** Splits a raw path into percent-decoded segments; null when the encoding is malformed. */
export function splitPath(pathname: string): string[] | null {
  if (pathname === '/' || pathname === '') return [];
  try {
    return pathname.slice(1).split('/').map(s => decodeURIComponent(s));
  } catch {
    return null;
  }
}

// --- Routing ---

type Handler = (res: ServerResponse, params: string[], query: URLSearchParams) => void;

interface Route {
  match: (segments: string[]) => string[] | null;
  handlers: Partial<Record<string, Handler>>;
}

function createRoutes(registry: ActivityRegistry, startedAt: number): Route[] {
  return [
    {
      match: s => (s.length === 0 ? [] : null),
      handlers: { GET: res => redirect(res, INDEX_PATH) },
    },
    {
      match: s => (s.length === 1 && s[0] === 'activities' ? [] : null),
      handlers: { GET: res => json(res, 200, registry.list()) },
    },
    {
      match: s => (s.length === 3 && s[0] === 'activities' && s[2] === 'signup' ? [s[1]] : null),
      handlers: {
        POST: (res, [activityName], query) => {
          const email = requireEmail(res, query);
          if (email === null) return;
          sendResult(res, registry.signUp(activityName, email));
        },
      },
    },
    {
      match: s => (s.length === 3 && s[0] === 'activities' && s[2] === 'unregister' ? [s[1]] : null),
      handlers: {
        DELETE: (res, [activityName], query) => {
          const email = requireEmail(res, query);
          if (email === null) return;
          sendResult(res, registry.unregister(activityName, email));
        },
      },
    },
    {
      match: s => (s.length === 1 && s[0] === 'health' ? [] : null),
      handlers: {
        GET: res => json(res, 200, {
          status: 'ok',
          activities: registry.size,
          uptimeMs: Date.now() - startedAt,
          timestamp: new Date().toISOString(),
        }),
      },
    },
  ];
}

function dispatch(routes: Route[], req: IncomingMessage, res: ServerResponse): void {
  const rawUrl = req.url || '/';
  const queryIdx = rawUrl.indexOf('?');
  const pathname = queryIdx === -1 ? rawUrl : rawUrl.slice(0, queryIdx);
  const query = new URLSearchParams(queryIdx === -1 ? '' : rawUrl.slice(queryIdx + 1));

  const segments = splitPath(pathname);
  if (!segments) {
    json(res, 400, { detail: 'Malformed request path' });
    return;
  }

  for (const route of routes) {
    const params = route.match(segments);
    if (!params) continue;

    const handler = route.handlers[req.method || 'GET'];
    if (!handler) {
      json(res, 405, { detail: 'Method Not Allowed' }, { Allow: Object.keys(route.handlers).join(', ') });
      return;
    }
    handler(res, params, query);
    return;
  }

  json(res, 404, { detail: 'Not Found' });
}

// --- Server ---

/**
 * Builds the HTTP server over an explicit registry. The caller owns listen/close.
 */
export function createActivitiesServer(registry: ActivityRegistry): Server {
  const routes = createRoutes(registry, Date.now());

  return createServer((req, res) => {
    res.on('finish', () => {
      console.log(`[Activities] ${req.method} ${req.url} -> ${res.statusCode}`);
    });

    if (req.method === 'OPTIONS') {
      res.writeHead(204, CORS_HEADERS);
      res.end();
      return;
    }

    try {
      dispatch(routes, req, res);
    } catch (err) {
      console.error('[Activities] Request error:', err);
      if (!res.headersSent) {
        json(res, 500, { detail: 'Internal Server Error' });
      } else {
        res.end();
      }
    }
  });
}

/** Resolves once listening; rejects with the listen error (EADDRINUSE, EACCES) instead of emitting it. */
export function listenOn(server: Server, port: number, host: string): Promise<void> {
  return new Promise((resolve, reject) => {
    const onError = (err: Error) => reject(err);
    server.once('error', onError);
    server.listen(port, host, () => {
      server.off('error', onError);
      resolve();
    });
  });
}
