import http from 'http';
import { createApp } from './app';
import { env } from './config/env';
import logger from './utils/logger';

const server = http.createServer(createApp());

server.listen(env.PORT, () => {
  logger.info(`Server running on port ${env.PORT}`, { version: env.APP_VERSION });
});

const gracefulShutdown = (signal: NodeJS.Signals) => {
  logger.info('Received shutdown signal', { signal });

  server.close(error => {
    if (error) {
      logger.error(`Error during graceful shutdown: ${error.message}`);
      process.exit(1);
    }
    logger.info('Server shut down gracefully');
    process.exit(0);
  });
};

process.on('SIGTERM', gracefulShutdown);
process.on('SIGINT', gracefulShutdown);
