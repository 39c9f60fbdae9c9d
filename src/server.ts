import { Server } from 'http';
import app from './app';
import { env } from '@/config/env';
import { logger } from '@/adapters/logging/LoggerFactory';
import { testConnection, closePool } from '@/config/database';

/**
 * Server Entry Point
 * Starts the Express server and handles graceful shutdown
 */

let server: Server | undefined;

const SHUTDOWN_TIMEOUT_MS = 10_000;

/**
 * Start the server
 */
async function startServer(): Promise<void> {
  try {
    // Test database connection
    logger.info('Testing database connection...');
    const dbConnected = await testConnection();

    if (!dbConnected) {
      logger.error('Failed to connect to database. Exiting...');
      process.exit(1);
    }

    // Start HTTP server
    server = app.listen(env.PORT, () => {
      logger.info(
        {
          port: env.PORT,
          env: env.NODE_ENV,
        },
        `Position ledger listening on http://localhost:${env.PORT}`
      );
      logger.info(`API endpoints available at http://localhost:${env.PORT}/api/v1`);
      logger.info(`Health check: http://localhost:${env.PORT}/api/health`);
    });

    // Handle server errors
    server.on('error', (error: NodeJS.ErrnoException) => {
      if (error.code === 'EADDRINUSE') {
        logger.error(`Port ${env.PORT} is already in use`);
      } else {
        logger.error({ error }, 'Server error');
      }
      process.exit(1);
    });
  } catch (error) {
    logger.error({ error }, 'Failed to start server');
    process.exit(1);
  }
}

/**
 * Graceful shutdown handler
 */
function gracefulShutdown(signal: string): void {
  logger.info(`${signal} received. Starting graceful shutdown...`);

  // Stop accepting new connections
  if (server) {
    server.close(() => {
      logger.info('HTTP server closed');

      closePool()
        .then(() => {
          logger.info('Graceful shutdown complete');
          process.exit(0);
        })
        .catch((error: unknown) => {
          logger.error({ error }, 'Error closing database connections');
          process.exit(1);
        });
    });

    setTimeout(() => {
      logger.error('Forced shutdown after timeout');
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS).unref();
  } else {
    process.exit(0);
  }
}

/**
 * Process event handlers
 */
process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
process.on('SIGINT', () => gracefulShutdown('SIGINT'));

process.on('unhandledRejection', (reason) => {
  logger.error({ reason }, 'Unhandled Promise Rejection');
});

process.on('uncaughtException', (error) => {
  logger.error(
    {
      error,
    },
    'Uncaught Exception'
  );
  process.exit(1);
});

void startServer();
