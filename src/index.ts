/**
 * Harbor Club Manager - Main Entry Point
 *
 * Opens the database, makes sure the default roles exist and starts the
 * Fastify server.
 */

import type { FastifyInstance } from 'fastify';
import { fileURLToPath } from 'url';
import { Settings } from './config/settings.js';
import { DatabaseManager } from './db/index.js';
import { createServer, startServer } from './server/fastifyServer.js';
import { createServices } from './services/index.js';
import { closeLogging, createLogger } from './utils/loggingConfig.js';

const logger = createLogger('index.ts');

/**
 * Graceful shutdown handler
 */
async function gracefulShutdown(
  signal: string,
  database: DatabaseManager,
  server: FastifyInstance | null,
): Promise<void> {
  logger.info(`📥 Received ${signal}, shutting down gracefully...`);

  try {
    if (server) {
      await server.close();
      logger.info('✅ Fastify server closed');
    }

    database.close();
    await closeLogging();
    process.exit(0);
  } catch (error) {
    console.error(`Error during shutdown: ${error}`);
    await closeLogging().catch(closeError => console.error(closeError));
    setTimeout(() => process.exit(1), 50);
  }
}

/**
 * Main application initialization function
 */
async function main(): Promise<void> {
  const database = DatabaseManager.getInstance();
  let server: FastifyInstance | null = null;

  try {
    logger.info('🚀 Starting Harbor Club Manager...');
    Settings.logConfiguration(logger);

    database.connect();
    const services = createServices(database);
    const created = await services.roles.ensureDefaultRoles();
    if (created.length > 0) {
      logger.info(`Created default roles: ${created.map(role => role.name).join(', ')}`);
    }

    server = await createServer({ services, database });
    await startServer(server);

    process.on('SIGINT', () => void gracefulShutdown('SIGINT', database, server));
    process.on('SIGTERM', () => void gracefulShutdown('SIGTERM', database, server));

    logger.info('✅ Application started successfully');
  } catch (error) {
    logger.error('❌ Failed to start application', error);

    if (server) {
      try {
        await server.close();
      } catch (closeError) {
        logger.error('Error closing server', closeError);
      }
    }
    database.close();

    await closeLogging();
    process.exit(1);
  }
}

process.on('unhandledRejection', error => {
  logger.error('Unhandled promise rejection:', error);
  closeLogging()
    .catch(closeError => console.error(closeError))
    .finally(() => setTimeout(() => process.exit(1), 50));
});

process.on('uncaughtException', error => {
  logger.error('Uncaught exception:', error);
  closeLogging()
    .catch(closeError => console.error(closeError))
    .finally(() => setTimeout(() => process.exit(1), 50));
});

// ES module equivalent of require.main === module
const __filename = fileURLToPath(import.meta.url);

if (process.argv[1] === __filename) {
  main().catch(error => {
    console.error('Fatal error starting application:', error);
    process.exit(1);
  });
}

export default main;
