import { startServer } from './server/app.js';
import { loadConfig } from './config/index.js';
import { createLogger } from './utils/logger.js';

const config = loadConfig();
const logger = createLogger(config.logging.level);

logger.info({
  port: config.server.port,
  pathPrefix: config.websocket.pathPrefix,
  connectTimeout: config.ssh.connectTimeout,
  diagnostics: config.diagnostics.enabled ? 'enabled' : 'disabled',
}, 'Starting with config');

startServer(config, logger)
  .then((server) => {
    const shutdown = (signal: string) => {
      logger.info({ signal, terminals: server.registry.size }, 'Shutting down');
      server.close()
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          logger.error({ err }, 'Error during shutdown');
          process.exit(1);
        });
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
  })
  .catch((err: unknown) => {
    logger.fatal({ err }, 'Failed to start server');
    process.exit(1);
  });
