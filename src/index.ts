import { config } from './config/index.js';
import { createServer } from './api/server.js';
import { DatabaseConnection } from './db/database.js';
import { DocumentStore } from './db/documentStore.js';
import { ChallengesRepository } from './db/repositories/challenges.repository.js';
import { SolvesRepository } from './db/repositories/solves.repository.js';
import { UsersRepository } from './db/repositories/users.repository.js';
import { HashingService } from './services/hashing.service.js';
import { StatusHandler } from './handlers/status.handler.js';
import { AuthHandler } from './handlers/auth.handler.js';
import { ChallengesHandler } from './handlers/challenges.handler.js';
import { SolvesHandler } from './handlers/solves.handler.js';
import { logger } from './utils/logger.js';

async function main() {
  logger.info('Starting CTF scoring backend...');

  if (!config.databaseUrl) {
    throw new Error('Missing required environment variable: DATABASE_URL');
  }

  try {
    // Initialize database
    logger.info('Initializing database...');
    const dbConnection = new DatabaseConnection({
      connectionString: config.databaseUrl,
    });
    await dbConnection.initialize();

    const store = new DocumentStore(dbConnection.getAdapter());
    const usersRepository = new UsersRepository(store);
    const challengesRepository = new ChallengesRepository(store);
    const solvesRepository = new SolvesRepository(store);

    const hashing = new HashingService();

    // Initialize handlers
    const statusHandler = new StatusHandler(store, Boolean(config.databaseUrl));
    const authHandler = new AuthHandler(usersRepository, hashing);
    const challengesHandler = new ChallengesHandler(challengesRepository, hashing);
    const solvesHandler = new SolvesHandler(challengesRepository, solvesRepository, hashing);

    // Create and start server
    const app = createServer({
      statusHandler,
      authHandler,
      challengesHandler,
      solvesHandler,
    });

    const port = config.port;

    const server = app.listen(port, () => {
      logger.info(`Server running on port ${port}`);
      logger.info(`Health check: http://localhost:${port}/health`);
    });

    // Graceful shutdown
    const shutdown = async (signal: string) => {
      logger.info(`Received ${signal}, starting graceful shutdown...`);

      // Stop accepting new connections
      await new Promise<void>((resolve) => {
        server.close(() => {
          logger.info('HTTP server closed');
          resolve();
        });
      });

      // Close database
      await dbConnection.close();

      logger.info('Graceful shutdown complete');
      process.exit(0);
    };

    const onSignal = (signal: string) => {
      shutdown(signal).catch((error) => {
        logger.fatal({ err: error }, 'Graceful shutdown failed');
        process.exit(1);
      });
    };

    process.on('SIGTERM', () => onSignal('SIGTERM'));
    process.on('SIGINT', () => onSignal('SIGINT'));
  } catch (error) {
    logger.fatal({ err: error }, 'Failed to start server');
    process.exit(1);
  }
}

// Handle uncaught errors
process.on('uncaughtException', (error) => {
  logger.fatal({ err: error }, 'Uncaught Exception');
  process.exit(1);
});

process.on('unhandledRejection', (reason, promise) => {
  logger.fatal({ reason, promise }, 'Unhandled Rejection');
  process.exit(1);
});

// Start the application
main().catch((error) => {
  logger.fatal({ err: error }, 'Failed to start application');
  process.exit(1);
});
