/**
 * @file main.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { nanoid } from 'nanoid';
import { getEnv, generatePublicUrl } from './config/env.js';
import { CONNECTION_TIMING, SESSION_LIMITS } from './config/constants.js';
import { getServerVersion } from './utils/version.js';
import { createLogger } from './infrastructure/logging/pino-logger.js';
import { createServer } from './server.js';

/**
 * Prints the startup banner to console.
 */
function printBanner(version: string): void {
  const dim = '\x1b[2m';
  const white = '\x1b[97m';
  const reset = '\x1b[0m';

  process.stdout.write(`
       ${white}C H O R U S${reset}  ${dim}·${reset}  Broadcast Server
       ${dim}Every message to every connected client${reset}
       ${dim}v${version}${reset}

`);
}

/**
 * Bootstraps and starts the broadcast server.
 */
async function bootstrap(): Promise<void> {
  const version = getServerVersion();
  printBanner(version);

  // Load configuration
  const env = getEnv();

  // Create logger
  const logger = createLogger({
    name: 'chorus',
    level: env.LOG_LEVEL,
    pretty: env.NODE_ENV === 'development',
  });

  logger.info(
    {
      version,
      nodeEnv: env.NODE_ENV,
      port: env.PORT,
      queueCapacity: env.SESSION_QUEUE_CAPACITY,
      trustProxy: env.TRUST_PROXY,
    },
    'Starting broadcast server'
  );

  const server = createServer({
    env,
    logger,
    version,
    generateSessionId: () => nanoid(SESSION_LIMITS.SESSION_ID_LENGTH),
  });

  // Start server
  try {
    await server.listen();
    logger.info(
      {
        address: `http://${env.HOST}:${env.PORT}`,
        websocket: generatePublicUrl(env),
      },
      '🚀 Broadcast server is running'
    );
  } catch (error) {
    logger.fatal({ error }, 'Failed to start server');
    process.exit(1);
  }

  // Graceful shutdown with overall timeout
  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Shutdown signal received');

    // Force exit after timeout
    const forceExitTimer = setTimeout(() => {
      logger.error('Shutdown timed out, forcing exit');
      process.exit(1);
    }, CONNECTION_TIMING.SHUTDOWN_TIMEOUT_MS);

    try {
      await server.close();
      clearTimeout(forceExitTimer);
      logger.info('Shutdown complete');
      process.exit(0);
    } catch (error) {
      clearTimeout(forceExitTimer);
      logger.error({ error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  // Unhandled rejection handler
  process.on('unhandledRejection', (reason) => {
    logger.error({ reason }, 'Unhandled rejection');
  });

  // Uncaught exception handler
  process.on('uncaughtException', (error) => {
    logger.fatal({ error }, 'Uncaught exception');
    process.exit(1);
  });
}

// Run the server
bootstrap().catch((error: unknown) => {
  console.error('Failed to bootstrap:', error);
  process.exit(1);
});
