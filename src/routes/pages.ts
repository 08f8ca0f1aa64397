import path from 'path';
import express, { Router } from 'express';

export const pageRoutes = ['/', '/collect', '/query', '/register'];

/**
 * Serves the built consoles. Every page route answers with the same
 * index.html; the client picks the console from the pathname.
 */
export function createPagesRouter(staticDir: string): Router {
  const router = Router();
  const indexFile = path.join(staticDir, 'index.html');

  router.get(pageRoutes, (_req, res, next) => {
    res.sendFile(indexFile, (err) => {
      if (err) next(err);
    });
  });

  router.use(express.static(staticDir, { index: false }));

  return router;
}
