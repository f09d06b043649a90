import { z } from 'zod';

/**
 * Config file schema version.
 */
export const CONFIG_FILE_VERSION = 1;

const logLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']);

export type LogLevel = z.infer<typeof logLevelSchema>;

/**
 * Application configuration file schema.
 *
 * This is what gets loaded from data/config/app.json.
 * All fields are optional - defaults are used for missing values.
 * The bot token is not accepted here; it only comes from the environment.
 */
export const appConfigFileSchema = z
  .object({
    version: z.number().int().positive().optional(),

    telegram: z
      .object({
        /** API request timeout in ms */
        timeout: z.number().int().positive().optional(),
        /** Max retries for retryable errors */
        maxRetries: z.number().int().nonnegative().optional(),
        /** Base retry delay in ms */
        retryDelay: z.number().int().nonnegative().optional(),
      })
      .strict()
      .optional(),

    /** Mini App URL shown as a button under class reminders */
    frontendDomain: z.string().url().nullable().optional(),

    scheduler: z
      .object({
        homeworkLeadMinutes: z.number().positive().optional(),
        classLeadMinutes: z.number().positive().optional(),
        /** An existing class job closer than this to the new fire time is kept */
        rescheduleToleranceMs: z.number().int().nonnegative().optional(),
        dailyCron: z.string().min(1).optional(),
        hourlyCron: z.string().min(1).optional(),
        cronTimezone: z.string().min(1).optional(),
        sweepHomeworkOnStartup: z.boolean().optional(),
        catchUpMissedHomework: z.boolean().optional(),
      })
      .strict()
      .optional(),

    logging: z
      .object({
        level: logLevelSchema.optional(),
        pretty: z.boolean().optional(),
        logDir: z.string().min(1).optional(),
        maxFiles: z.number().int().positive().optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

export type AppConfigFile = z.infer<typeof appConfigFileSchema>;

/**
 * Merged configuration (defaults + config file + env).
 */
export interface MergedConfig {
  telegram: {
    /** From BOT_TOKEN; null means delivery is disabled */
    botToken: string | null;
    timeout: number;
    maxRetries: number;
    retryDelay: number;
  };

  frontendDomain: string | null;

  scheduler: {
    homeworkLeadMinutes: number;
    classLeadMinutes: number;
    rescheduleToleranceMs: number;
    dailyCron: string;
    hourlyCron: string;
    cronTimezone: string;
    sweepHomeworkOnStartup: boolean;
    catchUpMissedHomework: boolean;
  };

  logging: {
    level: LogLevel;
    pretty: boolean;
    logDir: string;
    maxFiles: number;
  };

  paths: {
    /** Data directory; the classroom document lives here */
    data: string;
    /** Directory holding app.json */
    config: string;
  };
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: MergedConfig = {
  telegram: {
    botToken: null,
    timeout: 30_000,
    maxRetries: 2,
    retryDelay: 1000,
  },
  frontendDomain: null,
  scheduler: {
    homeworkLeadMinutes: 60,
    classLeadMinutes: 60,
    rescheduleToleranceMs: 60_000,
    dailyCron: '1 0 * * *',
    hourlyCron: '0 * * * *',
    cronTimezone: 'UTC',
    sweepHomeworkOnStartup: true,
    catchUpMissedHomework: true,
  },
  logging: {
    level: 'info',
    pretty: process.env['NODE_ENV'] !== 'production',
    logDir: 'data/logs',
    maxFiles: 10,
  },
  paths: {
    data: 'data',
    config: 'data/config',
  },
};
