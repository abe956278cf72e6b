import { createApp } from './app.js';
import { config } from './config/env.js';
import { SEED_ACTIVITIES } from './data/activities.js';
import { ActivityRegistry } from './services/activities.js';
import { logger } from './utils/logger.js';

const registry = new ActivityRegistry(SEED_ACTIVITIES);
const app = createApp({ registry, config });

const server = app.listen(config.port, config.host, () => {
  logger.info(`Server running on port ${config.port}`, {
    host: config.host,
    nodeEnv: config.nodeEnv,
    activities: registry.size,
    corsOrigins: config.corsOrigins.length > 0 ? config.corsOrigins : '*'
  });
});

server.on('error', (error: Error) => {
  logger.error('Server failed to start', { error: error.message });
  process.exitCode = 1;
});

const shutdown = (signal: NodeJS.Signals) => {
  logger.info('Shutting down server', { signal });
  server.close(error => {
    if (error) {
      logger.error('Error while closing server', { error: error.message });
      process.exitCode = 1;
    }
    logger.info('Server closed');
  });
};

process.on('SIGTERM', shutdown);
process.on('SIGINT', shutdown);
