import { join } from 'node:path';
import type { Logger } from '../types/index.js';
import type { ClassroomStore } from '../ports/index.js';
import { createLogger } from './logger.js';
import { type Clock, systemClock } from './clock.js';
import { TimeZoneResolver } from './time-zone.js';
import { type JobStore, createJobStore } from './job-store.js';
import { type MergedConfig, loadConfig } from '../config/index.js';
import { createJSONStorage, createJsonClassroomStore } from '../storage/index.js';
import { type TelegramNotifier, createTelegramNotifier } from '../channels/index.js';
import { HomeworkPlanner } from '../scheduling/homework-planner.js';
import { ClassPlanner } from '../scheduling/class-planner.js';
import { ReminderDispatcher } from '../scheduling/reminder-dispatcher.js';
import { ReminderService } from '../scheduling/reminder-service.js';
import { ReplanDriver } from '../scheduling/replan-driver.js';

const MINUTE_MS = 60_000;

/**
 * Container holding all application dependencies.
 */
export interface Container {
  config: MergedConfig;
  logger: Logger;
  store: ClassroomStore;
  jobStore: JobStore;
  notifier: TelegramNotifier;
  reminders: ReminderService;
  driver: ReplanDriver;

  /** Start the job timer and the re-planning driver */
  start(): void;
  /** Stop both timers and wait for a running pass */
  shutdown(): Promise<void>;
}

export interface ContainerOptions {
  /** Directory holding app.json */
  configPath?: string;
  /** Pre-loaded config; skips the loader */
  config?: MergedConfig;
  clock?: Clock;
}

/**
 * Create the application container.
 *
 * Loads config, opens the classroom document and wires the scheduler.
 * Nothing is started until start() is called.
 */
export async function createContainerAsync(options: ContainerOptions = {}): Promise<Container> {
  const config = options.config ?? (await loadConfig(options.configPath));
  const clock = options.clock ?? systemClock;

  const logger: Logger = createLogger({
    level: config.logging.level,
    pretty: config.logging.pretty,
    logDir: config.logging.logDir,
    maxFiles: config.logging.maxFiles,
  });

  const storage = createJSONStorage(config.paths.data, { logger });
  const store = createJsonClassroomStore(storage, logger);
  logger.info(
    { path: join(config.paths.data, 'classroom.json') },
    'Classroom store configured'
  );

  const zones = new TimeZoneResolver(logger);
  const jobStore = createJobStore(logger, { clock });

  const homeworkLeadMs = config.scheduler.homeworkLeadMinutes * MINUTE_MS;
  const classLeadMs = config.scheduler.classLeadMinutes * MINUTE_MS;
  const toleranceMs = config.scheduler.rescheduleToleranceMs;

  const notifier = createTelegramNotifier(
    {
      botToken: config.telegram.botToken,
      frontendDomain: config.frontendDomain,
      homeworkLeadMs,
      classLeadMs,
      timeout: config.telegram.timeout,
      maxRetries: config.telegram.maxRetries,
      retryDelay: config.telegram.retryDelay,
    },
    logger
  );
  if (!notifier.isAvailable()) {
    logger.warn('BOT_TOKEN not set, reminders will be logged as failed deliveries');
  }

  const homeworkPlanner = new HomeworkPlanner(jobStore, logger, { leadMs: homeworkLeadMs });
  const classPlanner = new ClassPlanner(store, jobStore, zones, logger, {
    clock,
    config: { leadMs: classLeadMs, toleranceMs },
  });
  const dispatcher = new ReminderDispatcher(store, notifier, zones, logger, { toleranceMs });

  jobStore.onFire(async (job) => {
    await dispatcher.dispatch(job);
  });

  const reminders = new ReminderService({
    store,
    jobStore,
    homeworkPlanner,
    classPlanner,
    dispatcher,
    logger,
    clock,
    config: { catchUpMissedHomework: config.scheduler.catchUpMissedHomework },
  });

  const driver = new ReplanDriver(reminders, logger, {
    clock,
    config: {
      dailyCron: config.scheduler.dailyCron,
      hourlyCron: config.scheduler.hourlyCron,
      cronTimezone: config.scheduler.cronTimezone,
      sweepHomeworkOnStartup: config.scheduler.sweepHomeworkOnStartup,
    },
  });

  const start = (): void => {
    jobStore.start();
    driver.start();
  };

  const shutdown = async (): Promise<void> => {
    logger.info('Shutting down...');
    driver.stop();
    jobStore.stop();
    await driver.idle();
    logger.info('Shutdown complete');
  };

  return {
    config,
    logger,
    store,
    jobStore,
    notifier,
    reminders,
    driver,
    start,
    shutdown,
  };
}
