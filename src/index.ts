import logger from './logger';
import { startServer } from './server';

async function main() {
  const started = await startServer();

  const shutdown = (signal: string) => {
    logger.info(`[shutdown] ${signal} received, closing server`);
    started.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error(err instanceof Error ? err : { err }, '[shutdown] close failed');
        process.exit(1);
      },
    );
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((err: unknown) => {
  logger.error(err instanceof Error ? err : { err }, '[startup] failed to start server');
  process.exit(1);
});
