/**
 * HTTP server entrypoint for the listing experiments service.
 *
 * This file:
 * - Loads configuration
 * - Wires runtime dependencies
 * - Creates the Express app
 * - Starts listening on the configured port
 */
import { createServer } from 'http';
import { createApp } from './app';
import { buildRuntimeDeps } from './bootstrap/buildDeps';
import { config } from './shared/config/Config';
import { logger } from './shared/logging/Logger';

const deps = buildRuntimeDeps();
const app = createApp({ experiments: deps.experiments });
const server = createServer(app);

server.listen(config.port, () => {
  logger.info(
    {
      port: config.port,
      env: config.env,
      experimentsDir: config.experimentsDir,
    },
    'Listing experiments service started',
  );
});

function shutdown(signal: string): void {
  logger.info(`Received ${signal}, shutting down gracefully...`);
  server.close(() => {
    logger.info('HTTP server closed');
    deps
      .shutdown()
      .catch((err: unknown) => logger.error({ err }, 'Error while releasing resources'))
      .finally(() => process.exit(0));
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
