/**
 * Main entry point for the reachability monitor
 */

import { ReachabilityMonitorApp } from './app';
import { Logger } from './utils/logger';

const logger = new Logger('Main');
let app: ReachabilityMonitorApp | null = null;
let shuttingDown = false;

/**
 * Graceful shutdown handler
 */
async function gracefulShutdown(signal: string): Promise<void> {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;
  logger.info(`Received ${signal}, initiating graceful shutdown...`);

  try {
    if (app) {
      await app.stop();
      app = null;
    }

    logger.info('Graceful shutdown completed');
    process.exit(0);
  } catch (error) {
    logger.error('Error during graceful shutdown:', error);
    process.exit(1);
  }
}

function shutdownOn(signal: string): void {
  gracefulShutdown(signal).catch((error: unknown) => {
    logger.error('Shutdown failed:', error);
    process.exit(1);
  });
}

/**
 * Main application startup
 */
async function main(): Promise<void> {
  try {
    logger.info('Starting reachability monitor...');
    logger.info(`Node version: ${process.version}`);
    logger.info(`Platform: ${process.platform}`);

    app = new ReachabilityMonitorApp();
    await app.initialize();
    await app.start();

    process.on('SIGTERM', () => shutdownOn('SIGTERM'));
    process.on('SIGINT', () => shutdownOn('SIGINT'));

    process.on('uncaughtException', (error) => {
      logger.error('Uncaught exception:', error);
      shutdownOn('uncaughtException');
    });

    process.on('unhandledRejection', (reason) => {
      logger.error('Unhandled promise rejection:', reason);
      shutdownOn('unhandledRejection');
    });

    logger.info('Reachability monitor started, press Ctrl+C to stop');
  } catch (error) {
    logger.error('Failed to start reachability monitor:', error);
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  logger.error('Unhandled error in main:', error);
  process.exit(1);
});
