import 'dotenv/config';
import { serve } from '@hono/node-server';
import { createApp } from './app.js';
import { VideoAnalyzer } from '../core/orchestrator.js';
import { getAnalysisStore } from './store/analysis-store.js';
import { ConfigManager } from '../utils/config.js';
import { logger } from '../utils/logger.js';
import { errorMessage } from '../types/index.js';

export interface ServerHandle {
  port: number;
  close(): Promise<void>;
}

/**
 * Load configuration and start the HTTP server
 */
export async function startServer(portOverride?: number): Promise<ServerHandle> {
  const config = await ConfigManager.getInstance().load(portOverride ? { port: portOverride } : undefined);
  const store = getAnalysisStore();
  const analyzer = new VideoAnalyzer({ config, repository: store });
  const app = createApp({ analyzer, store, config });
  const port = config.server.port;

  logger.info(`Starting clipsense API server on port ${port}...`);

  const server = serve({ fetch: app.fetch, port });

  logger.success(`Server running at http://localhost:${port}`);
  logger.info(`Health check: http://localhost:${port}/api/v1/health`);
  logger.info(`OpenAPI document: http://localhost:${port}/openapi.json`);

  return {
    port,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
      }),
  };
}

/**
 * SIGTERM/SIGINT close the server, forcing exit after 10s
 */
export function installShutdownHandlers(handle: ServerHandle): void {
  let isShuttingDown = false;

  const shutdown = (signal: string) => {
    if (isShuttingDown) {
      logger.warn('Shutdown already in progress...');
      return;
    }

    isShuttingDown = true;
    logger.info(`Received ${signal}, shutting down gracefully...`);

    const forceShutdownTimer = setTimeout(() => {
      logger.error('Forced shutdown after timeout');
      process.exit(1);
    }, 10000);

    handle
      .close()
      .then(() => {
        clearTimeout(forceShutdownTimer);
        logger.info('Server closed successfully');
        process.exit(0);
      })
      .catch((error: unknown) => {
        logger.error(`Error during shutdown: ${errorMessage(error)}`);
        process.exit(1);
      });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));

  process.on('unhandledRejection', (reason) => {
    logger.error(`Unhandled rejection: ${errorMessage(reason)}`);
  });
}

if (require.main === module) {
  startServer()
    .then(installShutdownHandlers)
    .catch((error: unknown) => {
      logger.error(`Failed to start server: ${errorMessage(error)}`);
      process.exit(1);
    });
}
