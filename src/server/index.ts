import { createServer as createHttpServer, type Server } from 'http';
import { createApp } from './app.js';
import { validateEnv } from './config/env.js';
import { logger } from './utils/logger.js';

let httpServer: Server | null = null;
let isShuttingDown = false;

function startServer(): void {
  try {
    const env = validateEnv();
    const app = createApp({ env });
    httpServer = createHttpServer(app);

    httpServer.on('listening', () => {
      logger.info({ port: env.PORT, env: env.NODE_ENV }, 'Number simplifier API listening');
    });

    httpServer.on('error', (error: Error) => {
      logger.fatal({ error }, 'HTTP server error');
      process.exit(1);
    });

    // Start HTTP server
    logger.info({ port: env.PORT }, 'Starting Express server');
    httpServer.listen(env.PORT, '0.0.0.0');
  } catch (error) {
    const errorDetails = error instanceof Error
      ? { message: error.message, stack: error.stack, name: error.name }
      : { error: String(error), type: typeof error };
    logger.fatal({ error: errorDetails }, 'Failed to start server');
    process.exit(1);
  }
}

startServer();

// Handle unhandled promise rejections
process.on('unhandledRejection', (reason: unknown) => {
  logger.error({
    reason: reason instanceof Error ? reason : { reason: String(reason) },
  }, 'Unhandled promise rejection');
});

// Handle uncaught exceptions
process.on('uncaughtException', (error: Error) => {
  logger.fatal({ error }, 'Uncaught exception - shutting down');
  process.exit(1);
});

// Graceful shutdown: stop accepting connections, then exit
function gracefulShutdown(signal: string): void {
  const server = httpServer;
  if (isShuttingDown || !server) {
    logger.warn({ signal }, 'Shutdown already in progress, forcing exit');
    process.exit(1);
  }
  isShuttingDown = true;
  logger.info({ signal }, 'Shutting down');

  server.close((error) => {
    if (error) {
      logger.error({ error }, 'Error while closing HTTP server');
      process.exit(1);
    }
    process.exit(0);
  });
}

// Graceful shutdown signal handlers
process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => gracefulShutdown('SIGINT'));
