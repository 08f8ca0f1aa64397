import express from 'express';
import type { Express } from 'express';
import cors from 'cors';
import type { CorsOptions } from 'cors';
import http from 'http';
import config from './config';
import logger from './logger';
import { errorHandler, requestLog } from './middleware';
import { createPagesRouter } from './routes/pages';
import { createSimulatorRouter } from './routes/simulator';

export interface AppOptions {
  simulatorUrl?: string;
  staticDir?: string;
  corsAllowedOrigins?: string[];
  fetchImpl?: typeof fetch;
}

export interface StartServerOptions extends AppOptions {
  port?: number;
}

export interface StartedServer {
  app: Express;
  server: http.Server;
  port: number;
  stop: () => Promise<void>;
}

export function createApp(options: AppOptions = {}): Express {
  const simulatorUrl = options.simulatorUrl ?? config.simulator.baseUrl;
  const staticDir = options.staticDir ?? config.staticDir;
  const allowedOrigins = new Set(options.corsAllowedOrigins ?? config.ingress.corsAllowedOrigins);

  const corsOptions: CorsOptions = {
    origin(origin, callback) {
      if (!origin) return callback(null, true);
      return callback(null, allowedOrigins.has(origin));
    },
    optionsSuccessStatus: 204,
  };

  const app = express();
  app.use(requestLog);
  app.use(cors(corsOptions));
  app.use(express.json({ limit: config.ingress.jsonBodyLimit }));

  app.get('/healthz', (_req, res) => {
    res.json({ status: 'ok', upstream: simulatorUrl });
  });

  app.use(createSimulatorRouter(simulatorUrl, options.fetchImpl));
  app.use(createPagesRouter(staticDir));

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });
  app.use(errorHandler);

  return app;
}

export async function startServer(options: StartServerOptions = {}): Promise<StartedServer> {
  const app = createApp(options);
  const server = http.createServer(app);
  const desiredPort = options.port ?? config.port;

  const actualPort = await new Promise<number>((resolve, reject) => {
    server.once('error', reject);
    server.listen(desiredPort, () => {
      const address = server.address();
      const port = typeof address === 'object' && address ? address.port : desiredPort;
      logger.info(`Smart meter consoles listening on http://localhost:${port}`, {
        upstream: options.simulatorUrl ?? config.simulator.baseUrl,
      });
      resolve(port);
    });
  });

  const stop = () =>
    new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });

  return { app, server, port: actualPort, stop };
}
