import { createServer, IncomingMessage, Server, ServerResponse } from 'http';
import { readFileSync, statSync } from 'fs';
import { extname, resolve, sep } from 'path';
import type { RegistrationEngine } from '../activities/engine.js';
import { missingField, toHttpError } from './errors.js';

export interface AppServerOptions {
  engine: RegistrationEngine;
  staticDir: string;
}

type Params = Record<string, string>;

interface RequestContext {
  url: URL;
  params: Params;
}

type Handler = (req: IncomingMessage, res: ServerResponse, ctx: RequestContext) => void | Promise<void>;

interface Route {
  method: string;
  /** Path template; `:name` captures one decoded segment, a trailing `*` captures the rest. */
  path: string;
  handle: Handler;
}

const CONTENT_TYPES: Record<string, string> = {
  '.html': 'text/html; charset=utf-8',
  '.css': 'text/css; charset=utf-8',
  '.js': 'text/javascript; charset=utf-8',
  '.json': 'application/json',
  '.svg': 'image/svg+xml',
  '.png': 'image/png',
  '.ico': 'image/x-icon',
};

// --- HTTP helpers ---

function json(res: ServerResponse, status: number, data: unknown): void {
  res.writeHead(status, { 'Content-Type': 'application/json', 'Access-Control-Allow-Origin': '*' });
  res.end(JSON.stringify(data));
}

function splitPath(path: string): string[] {
  return path === '/' ? [] : path.split('/').slice(1);
}

function matchPath(template: string, segments: string[]): Params | null {
  const parts = splitPath(template);
  const params: Params = {};
  for (let i = 0; i < parts.length; i++) {
    const part = parts[i];
    if (part === '*') {
      params['*'] = segments.slice(i).join('/');
      return params;
    }
    if (i >= segments.length) return null;
    if (part.startsWith(':')) {
      params[part.slice(1)] = segments[i];
    } else if (part !== segments[i]) {
      return null;
    }
  }
  return parts.length === segments.length ? params : null;
}

// --- Server ---

export function createAppServer({ engine, staticDir }: AppServerOptions): Server {
  const startedAt = Date.now();
  const staticRoot = resolve(staticDir);

  function requireEmail(res: ServerResponse, url: URL): string | null {
    const email = url.searchParams.get('email');
    if (email === null) {
      json(res, 422, missingField('query', 'email'));
      return null;
    }
    return email;
  }

  function serveStatic(res: ServerResponse, relPath: string): void {
    const filePath = resolve(staticRoot, relPath);
    if (!filePath.startsWith(staticRoot + sep)) {
      json(res, 404, { detail: 'Not Found' });
      return;
    }
    try {
      if (!statSync(filePath).isFile()) {
        json(res, 404, { detail: 'Not Found' });
        return;
      }
      const body = readFileSync(filePath);
      res.writeHead(200, {
        'Content-Type': CONTENT_TYPES[extname(filePath).toLowerCase()] ?? 'application/octet-stream',
        'Cache-Control': 'no-cache',
      });
      res.end(body);
    } catch {
      json(res, 404, { detail: 'Not Found' });
    }
  }

  const routes: Route[] = [
    {
      method: 'GET',
      path: '/',
      handle: (_req, res) => {
        res.writeHead(307, { Location: '/static/index.html' });
        res.end();
      },
    },
    {
      method: 'GET',
      path: '/static/*',
      handle: (_req, res, { params }) => serveStatic(res, params['*']),
    },
    {
      method: 'GET',
      path: '/health',
      handle: (_req, res) => json(res, 200, {
        ok: true,
        activities: engine.activityCount,
        uptimeMs: Date.now() - startedAt,
      }),
    },
    {
      method: 'GET',
      path: '/activities',
      handle: (_req, res) => json(res, 200, engine.listActivities()),
    },
    {
      method: 'POST',
      path: '/activities/:activity/signup',
      handle: async (_req, res, { url, params }) => {
        const email = requireEmail(res, url);
        if (email === null) return;
        const result = await engine.signup(params.activity, email);
        if (!result.ok) {
          const { status, detail } = toHttpError(result.error);
          json(res, status, { detail });
          return;
        }
        json(res, 200, { message: `Signed up ${email} for ${params.activity}` });
      },
    },
    {
      method: 'DELETE',
      path: '/activities/:activity/participants/:email',
      handle: async (_req, res, { params }) => {
        const result = await engine.remove(params.activity, params.email);
        if (!result.ok) {
          const { status, detail } = toHttpError(result.error);
          json(res, status, { detail });
          return;
        }
        json(res, 200, { message: `Removed ${params.email} from ${params.activity}` });
      },
    },
    {
      method: 'DELETE',
      path: '/activities/:activity/unregister',
      handle: async (_req, res, { url, params }) => {
        const email = requireEmail(res, url);
        if (email === null) return;
        const result = await engine.remove(params.activity, email);
        if (!result.ok) {
          const { status, detail } = toHttpError(result.error);
          json(res, status, { detail });
          return;
        }
        json(res, 200, { message: `Removed ${email} from ${params.activity}` });
      },
    },
  ];

  return createServer(async (req, res) => {
    if (req.method === 'OPTIONS') {
      res.writeHead(204, {
        'Access-Control-Allow-Origin': '*',
        'Access-Control-Allow-Methods': 'GET, HEAD, POST, DELETE, OPTIONS',
        'Access-Control-Allow-Headers': 'Content-Type',
      });
      res.end();
      return;
    }

    try {
      const url = new URL(req.url || '/', 'http://localhost');
      let segments: string[];
      try {
        segments = splitPath(url.pathname).map(decodeURIComponent);
      } catch {
        json(res, 400, { detail: 'Malformed path' });
        return;
      }

      // HEAD runs the GET handler; node:http drops the body for HEAD requests
      const method = req.method === 'HEAD' ? 'GET' : req.method;
      let pathMatched = false;
      for (const route of routes) {
        const params = matchPath(route.path, segments);
        if (!params) continue;
        pathMatched = true;
        if (route.method !== method) continue;
        await route.handle(req, res, { url, params });
        return;
      }

      if (pathMatched) {
        json(res, 405, { detail: 'Method Not Allowed' });
      } else {
        json(res, 404, { detail: 'Not Found' });
      }
    } catch (err) {
      console.error('[Server] Request error:', err);
      if (!res.headersSent) {
        json(res, 500, { detail: 'Internal Server Error' });
      } else {
        res.end();
      }
    }
  });
}
