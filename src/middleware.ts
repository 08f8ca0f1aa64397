import type { ErrorRequestHandler, RequestHandler } from 'express';
import logger from './logger';

export const requestLog: RequestHandler = (req, res, next) => {
  const startedAt = Date.now();
  res.on('finish', () => {
    logger.debug('[http] request', {
      method: req.method,
      path: req.originalUrl,
      status: res.statusCode,
      durationMs: Date.now() - startedAt,
    });
  });
  next();
};

function statusOf(err: unknown): number {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return 500;
}

export const errorHandler: ErrorRequestHandler = (err, req, res, next) => {
  if (res.headersSent) {
    next(err);
    return;
  }

  const status = statusOf(err);
  if (status === 404) {
    res.status(404).json({ error: 'Not found' });
    return;
  }
  if (status >= 400 && status < 500) {
    logger.warn('[http] rejected request', { path: req.originalUrl, status });
    res.status(status).json({ error: 'Invalid request' });
    return;
  }

  logger.error(err instanceof Error ? err : { err }, `[http] ${req.method} ${req.originalUrl} failed`);
  res.status(500).json({ error: 'Internal server error' });
};
