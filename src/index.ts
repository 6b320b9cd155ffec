import { serve } from '@hono/node-server';
import { settings } from './config/settings.js';
import { closeAppContext, createAppContext } from './context.js';
import { createApp } from './app.js';
import { describeError, logger } from './lib/logger.js';

const ctx = await createAppContext(settings);
const app = createApp(ctx);

logger.info('Server starting', { port: settings.port });
const server = serve({ fetch: app.fetch, port: settings.port }, (info) => {
  logger.info('Server running', {
    url: `http://localhost:${info.port}`,
    dataDir: settings.dataDir,
    workerPoolSize: settings.workerPoolSize,
  });
});

let shuttingDown = false;

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;
  logger.info('Shutdown signal received', { signal });

  server.close();
  try {
    await closeAppContext(ctx);
    logger.info('Shutdown complete');
    process.exit(0);
  } catch (error) {
    logger.error('Shutdown failed', { error: describeError(error) });
    process.exit(1);
  }
}

process.on('SIGINT', () => {
  void shutdown('SIGINT');
});
process.on('SIGTERM', () => {
  void shutdown('SIGTERM');
});
