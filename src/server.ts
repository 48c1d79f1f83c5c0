// ═══════════════════════════════════════════════════════════════════════════════
// SERVER — HTTP API and Worker Process Entry Point
// ═══════════════════════════════════════════════════════════════════════════════

import type { Server } from 'node:http';
import { createApp } from './api/app.js';
import { loadConfig } from './config/index.js';
import { getLogger } from './logging/index.js';
import { createNotificationEngine } from './notifications/engine.js';
import { closeStore } from './storage/index.js';

const logger = getLogger({ component: 'server' });

const SHUTDOWN_TIMEOUT_MS = 30_000;
const SHUTDOWN_SIGNALS: NodeJS.Signals[] = ['SIGTERM', 'SIGINT'];

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close(error => (error ? reject(error) : resolve()));
  });
}

async function main(): Promise<void> {
  const config = loadConfig();
  const engine = createNotificationEngine(config);
  const app = createApp(engine);

  engine.worker.start();
  const server = app.listen(config.server.port, config.server.host, () => {
    logger.info('Server listening', {
      host: config.server.host,
      port: config.server.port,
      environment: config.environment,
    });
  });

  let shuttingDown = false;

  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) {
      logger.warn('Received signal during shutdown, ignoring', { signal });
      return;
    }
    shuttingDown = true;
    logger.info('Received shutdown signal', { signal });

    const timeout = setTimeout(() => {
      logger.fatal('Shutdown timed out, forcing exit');
      process.exit(124);
    }, SHUTDOWN_TIMEOUT_MS);
    timeout.unref();

    try {
      await closeServer(server);
      await engine.worker.stop();
      await closeStore();
      logger.info('Shutdown complete');
      process.exit(0);
    } catch (error) {
      logger.error('Shutdown failed', error);
      process.exit(1);
    }
  };

  for (const signal of SHUTDOWN_SIGNALS) {
    process.on(signal, () => void shutdown(signal));
  }
}

main().catch(error => {
  logger.fatal('Failed to start server', error);
  process.exit(1);
});
