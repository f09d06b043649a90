/**
 * Classroom reminders - homework and class reminder scheduler
 *
 * Entry point for the application.
 */

import 'dotenv/config';

import { createContainerAsync, type Container } from './core/container.js';

let container: Container | undefined;
let isShuttingDown = false;

async function main(): Promise<void> {
  container = await createContainerAsync();
  const { logger, reminders, driver } = container;

  logger.info('Classroom reminders starting...');
  container.start();

  const info = reminders.getScheduledJobsInfo();
  logger.info({ count: info.count, nextRuns: driver.nextRuns() }, 'Scheduler ready');
}

// Handle shutdown gracefully
async function shutdown(exitCode = 0): Promise<void> {
  if (isShuttingDown) {
    return;
  }
  isShuttingDown = true;

  if (container) {
    await container.shutdown();
  }
  process.exit(exitCode);
}

process.on('SIGINT', () => {
  void shutdown();
});

process.on('SIGTERM', () => {
  void shutdown();
});

process.on('uncaughtException', (error: unknown) => {
  // eslint-disable-next-line no-console
  console.error('Uncaught exception:', error);
  void shutdown(1);
});

process.on('unhandledRejection', (reason: unknown) => {
  // eslint-disable-next-line no-console
  console.error('Unhandled rejection:', reason);
  void shutdown(1);
});

main().catch((error: unknown) => {
  // eslint-disable-next-line no-console
  console.error('Failed to start:', error);
  process.exit(1);
});
