import { Router } from 'express';
import type { Request, Response } from 'express';
import logger from '../logger';
import { asyncHandler } from './asyncHandler';

type UpstreamFetch = typeof fetch;
type UpstreamResponse = Awaited<ReturnType<UpstreamFetch>>;

export interface ProxiedRoute {
  method: 'get' | 'post';
  path: string;
}

// Endpoints owned by the simulation backend. Everything else is served locally.
export const proxiedRoutes: readonly ProxiedRoute[] = [
  { method: 'get', path: '/current_time' },
  { method: 'post', path: '/meter_reading' },
  { method: 'post', path: '/validate_meter' },
  { method: 'get', path: '/monthly_history' },
  { method: 'get', path: '/query_usage' },
  { method: 'post', path: '/register' },
  { method: 'get', path: '/api/areas' },
  { method: 'get', path: '/reset' },
];

export function buildUpstreamInit(req: Request): RequestInit {
  const headers: Record<string, string> = { accept: req.get('accept') ?? '*/*' };
  if (req.method === 'GET' || req.method === 'HEAD') {
    return { method: req.method, headers };
  }
  headers['content-type'] = 'application/json';
  return { method: req.method, headers, body: JSON.stringify(req.body ?? {}) };
}

async function relay(upstream: UpstreamResponse, res: Response) {
  const body = Buffer.from(await upstream.arrayBuffer());
  const contentType = upstream.headers.get('content-type');
  if (contentType) {
    res.setHeader('Content-Type', contentType);
  }
  res.status(upstream.status).send(body);
}

export function createSimulatorRouter(baseUrl: string, fetchImpl: UpstreamFetch = fetch): Router {
  const router = Router();

  const forward = asyncHandler(async (req, res) => {
    const target = `${baseUrl}${req.originalUrl}`;
    let upstream: UpstreamResponse;
    try {
      upstream = await fetchImpl(target, buildUpstreamInit(req));
    } catch (err) {
      logger.error({ err, target }, '[proxy] simulation backend unreachable');
      res.status(502).json({ error: 'Simulation backend unavailable' });
      return;
    }

    logger.debug('[proxy] forwarded', {
      method: req.method,
      path: req.path,
      status: upstream.status,
    });
    await relay(upstream, res);
  });

  for (const route of proxiedRoutes) {
    router[route.method](route.path, forward);
  }

  return router;
}
