/**
 * Re-planning Driver
 *
 * Re-runs the class planner on a fixed cadence so membership, time zone and
 * activation changes are picked up without an edit-time hook:
 * - once at start
 * - daily, shortly after midnight UTC
 * - hourly, on the hour
 *
 * Each cron trigger keeps its own timer and re-arms itself after it fires.
 */

import { randomUUID } from 'node:crypto';
import { CronExpressionParser } from 'cron-parser';
import type { Logger } from '../types/logger.js';
import type { Clock } from '../core/clock.js';
import { systemClock } from '../core/clock.js';
import { createTraceContext, withTraceContext } from '../core/trace-context.js';
import type { ReplanSummary } from './class-planner.js';

export interface ReplanDriverConfig {
  /** Cron expression for the daily pass */
  dailyCron: string;
  /** Cron expression for the hourly pass */
  hourlyCron: string;
  /** Zone the cron expressions are evaluated in */
  cronTimezone: string;
  /** Run the homework recovery sweep at start */
  sweepHomeworkOnStartup: boolean;
}

const DEFAULT_CONFIG: ReplanDriverConfig = {
  dailyCron: '1 0 * * *',
  hourlyCron: '0 * * * *',
  cronTimezone: 'UTC',
  sweepHomeworkOnStartup: true,
};

export type ReplanReason = 'startup' | 'daily' | 'hourly' | 'manual';

/**
 * What the driver drives. Implemented by ReminderService.
 */
export interface ReplanTarget {
  replanClassOccurrences(): Promise<ReplanSummary>;
  sweepHomeworkReminders(): Promise<unknown>;
}

interface CronTrigger {
  reason: Exclude<ReplanReason, 'startup' | 'manual'>;
  expression: string;
  timer: NodeJS.Timeout | null;
  /** Occurrence the timer was last armed for */
  armedFor: Date | null;
}

/**
 * Validate a cron expression. Throws if invalid.
 */
export function validateCron(expression: string, timezone: string): void {
  const fields = expression.trim().split(/\s+/);
  if (fields.length < 5 || fields.length > 6) {
    throw new Error(
      `Invalid cron expression "${expression}": expected 5-6 fields, got ${String(fields.length)}`
    );
  }
  CronExpressionParser.parse(expression, { tz: timezone });
}

/**
 * Next occurrence of a cron expression strictly after `after`.
 */
export function nextCronOccurrence(expression: string, after: Date, timezone: string): Date {
  const cron = CronExpressionParser.parse(expression, { currentDate: after, tz: timezone });
  return cron.next().toDate();
}

export class ReplanDriver {
  private readonly logger: Logger;
  private readonly target: ReplanTarget;
  private readonly clock: Clock;
  private readonly config: ReplanDriverConfig;
  private readonly triggers: CronTrigger[];
  private running = false;
  private passInFlight: Promise<ReplanSummary | null> | null = null;

  constructor(
    target: ReplanTarget,
    logger: Logger,
    options: { clock?: Clock; config?: Partial<ReplanDriverConfig> } = {}
  ) {
    this.target = target;
    this.logger = logger.child({ component: 'replan-driver' });
    this.clock = options.clock ?? systemClock;
    this.config = { ...DEFAULT_CONFIG, ...options.config };

    // Fail fast on bad configuration
    validateCron(this.config.dailyCron, this.config.cronTimezone);
    validateCron(this.config.hourlyCron, this.config.cronTimezone);

    this.triggers = [
      { reason: 'daily', expression: this.config.dailyCron, timer: null, armedFor: null },
      { reason: 'hourly', expression: this.config.hourlyCron, timer: null, armedFor: null },
    ];
  }

  /**
   * Run the startup pass and arm the recurring triggers.
   */
  start(): void {
    if (this.running) {
      this.logger.warn('Re-planning driver already running');
      return;
    }
    this.running = true;

    for (const trigger of this.triggers) {
      this.arm(trigger);
    }

    void this.startupPass();
    this.logger.info(
      { dailyCron: this.config.dailyCron, hourlyCron: this.config.hourlyCron },
      'Re-planning driver started'
    );
  }

  stop(): void {
    this.running = false;
    for (const trigger of this.triggers) {
      if (trigger.timer) {
        clearTimeout(trigger.timer);
        trigger.timer = null;
      }
    }
    this.logger.info('Re-planning driver stopped');
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Resolve once the pass in flight, if any, has finished.
   */
  async idle(): Promise<void> {
    if (this.passInFlight) {
      await this.passInFlight;
    }
  }

  /**
   * Next fire time of each trigger, for diagnostics.
   */
  nextRuns(): Record<string, string> {
    const now = this.clock.now();
    const result: Record<string, string> = {};
    for (const trigger of this.triggers) {
      result[trigger.reason] = nextCronOccurrence(
        trigger.expression,
        now,
        this.config.cronTimezone
      ).toISOString();
    }
    return result;
  }

  /**
   * Run one class planning pass.
   *
   * A pass requested while another is running is coalesced: the caller gets
   * null and no second pass starts.
   */
  async runPass(reason: ReplanReason): Promise<ReplanSummary | null> {
    if (this.passInFlight) {
      this.logger.debug({ reason }, 'Pass already running, trigger coalesced');
      return null;
    }

    const passId = `replan_${randomUUID().slice(0, 8)}`;
    this.passInFlight = withTraceContext(
      createTraceContext(passId, { correlationId: reason }),
      async () => {
        try {
          return await this.target.replanClassOccurrences();
        } catch (error) {
          this.logger.error(
            { reason, error: error instanceof Error ? error.message : String(error) },
            'Re-planning pass failed'
          );
          return null;
        }
      }
    );

    try {
      return await this.passInFlight;
    } finally {
      this.passInFlight = null;
    }
  }

  private async startupPass(): Promise<void> {
    await this.runPass('startup');

    if (!this.config.sweepHomeworkOnStartup) return;

    try {
      await this.target.sweepHomeworkReminders();
    } catch (error) {
      this.logger.error(
        { error: error instanceof Error ? error.message : String(error) },
        'Homework recovery sweep failed'
      );
    }
  }

  private arm(trigger: CronTrigger): void {
    if (!this.running) return;

    const now = this.clock.now();
    // A timer may wake a little early; never re-arm for the occurrence just handled
    const from = trigger.armedFor && trigger.armedFor > now ? trigger.armedFor : now;
    const next = nextCronOccurrence(trigger.expression, from, this.config.cronTimezone);
    const delay = Math.max(next.getTime() - now.getTime(), 0);
    trigger.armedFor = next;

    trigger.timer = setTimeout(() => {
      trigger.timer = null;
      void this.runPass(trigger.reason).then(() => {
        this.arm(trigger);
      });
    }, delay);

    this.logger.debug({ trigger: trigger.reason, next: next.toISOString() }, 'Trigger armed');
  }
}
