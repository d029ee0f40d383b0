import { createApp } from './app.js';
import { config } from './config/env.js';
import { seedActivities } from './data/activities.js';
import { ActivityRegistry } from './services/registry.js';
import { logger } from './utils/logger.js';

const registry = new ActivityRegistry(seedActivities, {
  enforceCapacity: config.ENFORCE_CAPACITY
});

const app = createApp({ registry });

const server = app.listen(config.PORT, config.HOST, () => {
  logger.info(`Server running on http://${config.HOST}:${config.PORT}`, {
    tags: ['startup'],
    environment: config.NODE_ENV,
    staticDir: config.STATIC_DIR,
    allowedOrigins: config.CORS_ORIGINS,
    activities: registry.size
  });
});

function shutdown(signal: NodeJS.Signals): void {
  logger.info(`Server shutting down (${signal})...`, { tags: ['shutdown'] });
  server.close(error => {
    if (error) {
      logger.error('Error while closing HTTP server', { error: error.message });
      process.exit(1);
    }
    process.exit(0);
  });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
