import fs from 'node:fs';
import path from 'node:path';
import pino from 'pino';
import { getTraceContext } from './trace-context.js';
import { isFileNotFound } from '../utils/fs.js';

/**
 * Logger configuration.
 */
export interface LoggerConfig {
  /** Directory for log files */
  logDir: string;
  /** Maximum number of log files to keep */
  maxFiles: number;
  /** Log level */
  level: pino.Level;
  /** Enable pretty printing (development) */
  pretty: boolean;
}

const DEFAULT_CONFIG: LoggerConfig = {
  logDir: './data/logs',
  maxFiles: 10,
  level: 'info',
  pretty: process.env['NODE_ENV'] !== 'production',
};

const LOG_FILE_PREFIX = 'reminders-';

function generateLogFilename(now: Date): string {
  const timestamp = now.toISOString().replace(/[:.]/g, '-');
  return `${LOG_FILE_PREFIX}${timestamp}.log`;
}

/**
 * Keep the newest maxFiles non-empty log files, remove the rest.
 */
export function cleanupOldLogs(logDir: string, maxFiles: number): void {
  if (!fs.existsSync(logDir)) {
    return;
  }

  const files = fs
    .readdirSync(logDir)
    .filter((f) => f.startsWith(LOG_FILE_PREFIX) && f.endsWith('.log'))
    .map((f) => {
      const filePath = path.join(logDir, f);
      const stats = fs.statSync(filePath);
      return { path: filePath, mtime: stats.mtime.getTime(), size: stats.size };
    });

  const stale = [
    ...files.filter((f) => f.size === 0),
    ...files
      .filter((f) => f.size > 0)
      .sort((a, b) => b.mtime - a.mtime)
      .slice(maxFiles),
  ];

  for (const file of stale) {
    try {
      fs.unlinkSync(file.path);
    } catch (error) {
      // Another process may have removed it already
      if (!isFileNotFound(error)) throw error;
    }
  }
}

/**
 * Pino mixin that injects the current trace context into every entry.
 * Explicit trace fields in log args take precedence.
 */
export function createTraceMixin(): () => Record<string, unknown> {
  return () => {
    const ctx = getTraceContext();
    if (!ctx) return {};

    const result: Record<string, unknown> = { traceId: ctx.traceId };
    if (ctx.correlationId) result['correlationId'] = ctx.correlationId;
    if (ctx.spanId) result['spanId'] = ctx.spanId;
    return result;
  };
}

/**
 * Create the application logger.
 *
 * Console output goes through pino-pretty in development and raw JSON to stdout
 * otherwise; every run also writes a timestamped file under logDir.
 */
export function createLogger(config: Partial<LoggerConfig> = {}): pino.Logger {
  const { logDir, maxFiles, level, pretty } = { ...DEFAULT_CONFIG, ...config };

  fs.mkdirSync(logDir, { recursive: true });
  cleanupOldLogs(logDir, maxFiles);

  const targets: pino.TransportTargetOptions[] = [
    pretty
      ? { target: 'pino-pretty', level, options: { colorize: true } }
      : { target: 'pino/file', level, options: { destination: 1 } },
    {
      target: 'pino-pretty',
      level,
      options: {
        destination: path.join(logDir, generateLogFilename(new Date())),
        mkdir: true,
        colorize: false,
      },
    },
  ];

  return pino({
    level,
    transport: { targets },
    mixin: createTraceMixin(),
  });
}
