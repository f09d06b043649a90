/**
 * Job Store
 *
 * Process-wide table of future reminder jobs, keyed by structured job keys.
 * A single timer is armed at the earliest fire time; on expiry every due job is
 * removed from the table and then handed to the fire handler, so each job runs
 * at most once.
 *
 * The table is volatile. After a restart it is rebuilt by re-planning.
 */

import type { Logger } from '../types/logger.js';
import type {
  CancelResult,
  JobKey,
  JobPayload,
  ScheduledJob,
  ScheduledJobInfo,
  UpsertResult,
} from '../types/jobs.js';
import { jobHandlerName, jobKeyId } from '../types/jobs.js';
import type { Clock } from './clock.js';
import { systemClock } from './clock.js';
import { createTraceContext, withTraceContext } from './trace-context.js';

/**
 * Handler invoked for each fired job.
 */
export type JobFireHandler = (job: ScheduledJob) => Promise<void>;

/**
 * Largest delay setTimeout accepts (~24.8 days).
 */
const MAX_TIMER_DELAY_MS = 2_147_483_647;

export interface JobStoreOptions {
  clock?: Clock;
}

export class JobStore {
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly jobs = new Map<string, ScheduledJob>();
  private handler: JobFireHandler | null = null;
  private timer: NodeJS.Timeout | null = null;
  private running = false;

  constructor(logger: Logger, options: JobStoreOptions = {}) {
    this.logger = logger.child({ component: 'job-store' });
    this.clock = options.clock ?? systemClock;
  }

  /**
   * Register the handler that executes fired jobs.
   */
  onFire(handler: JobFireHandler): void {
    this.handler = handler;
  }

  /**
   * Insert or replace the job stored under key.
   *
   * A fire time at or before now is dropped, and any pending job with the same
   * key is removed with it.
   *
   * @throws RangeError if fireAt is an invalid date; the table is left untouched
   */
  upsert(key: JobKey, fireAt: Date, payload: JobPayload): UpsertResult {
    const id = jobKeyId(key);
    if (Number.isNaN(fireAt.getTime())) {
      throw new RangeError(`Invalid fire time for job ${id}`);
    }
    const now = this.clock.now();

    if (fireAt.getTime() <= now.getTime()) {
      const removed = this.jobs.delete(id);
      this.logger.debug(
        { jobId: id, fireAt: fireAt.toISOString(), removedPending: removed },
        'Dropped job with past fire time'
      );
      if (removed) this.arm();
      return 'dropped';
    }

    const replaced = this.jobs.has(id);
    this.jobs.set(id, {
      id,
      key,
      fireAt: new Date(fireAt.getTime()),
      payload,
      createdAt: now,
    });
    this.arm();

    this.logger.debug(
      { jobId: id, fireAt: fireAt.toISOString(), replaced },
      replaced ? 'Job replaced' : 'Job scheduled'
    );
    return replaced ? 'replaced' : 'scheduled';
  }

  /**
   * Remove a job. An absent key is reported, not thrown.
   */
  cancel(key: JobKey): CancelResult {
    const id = jobKeyId(key);
    const job = this.jobs.get(id);
    if (!job) {
      return { status: 'not_found' };
    }

    this.jobs.delete(id);
    this.arm();
    this.logger.debug({ jobId: id }, 'Job cancelled');
    return { status: 'cancelled', job };
  }

  get(key: JobKey): ScheduledJob | undefined {
    return this.jobs.get(jobKeyId(key));
  }

  has(key: JobKey): boolean {
    return this.jobs.has(jobKeyId(key));
  }

  get size(): number {
    return this.jobs.size;
  }

  /**
   * Diagnostic listing, ordered by fire time. Does not touch the table.
   */
  peekJobs(): ScheduledJobInfo[] {
    return this.sortedJobs().map((job) => ({
      id: job.id,
      key: { ...job.key },
      nextRunTime: job.fireAt.toISOString(),
      handler: jobHandlerName(job.payload),
      args: describePayload(job.payload),
    }));
  }

  /**
   * Fire every job due at `now`.
   *
   * Due jobs are removed before any handler runs. Handlers run sequentially in
   * fire-time order; a failing handler is logged and the rest still run.
   *
   * @returns Number of jobs fired
   */
  async tick(now: Date = this.clock.now()): Promise<number> {
    const due = this.sortedJobs().filter((job) => job.fireAt.getTime() <= now.getTime());
    for (const job of due) {
      this.jobs.delete(job.id);
    }

    if (due.length > 0) {
      this.logger.debug({ count: due.length }, 'Firing due jobs');
    }

    for (const job of due) {
      await withTraceContext(createTraceContext(job.id, { spanId: `fire_${job.id}` }), () =>
        this.fire(job)
      );
    }

    this.arm();
    return due.length;
  }

  /**
   * Start the firing loop.
   */
  start(): void {
    if (this.running) {
      this.logger.warn('Job store already running');
      return;
    }
    this.running = true;
    this.arm();
    this.logger.info({ pending: this.jobs.size }, 'Job store started');
  }

  /**
   * Stop the firing loop. Pending jobs are kept.
   */
  stop(): void {
    this.running = false;
    this.disarm();
    this.logger.info({ pending: this.jobs.size }, 'Job store stopped');
  }

  isRunning(): boolean {
    return this.running;
  }

  private async fire(job: ScheduledJob): Promise<void> {
    if (!this.handler) {
      this.logger.warn({ jobId: job.id }, 'No fire handler registered, job discarded');
      return;
    }

    try {
      await this.handler(job);
      this.logger.debug({ jobId: job.id, handler: jobHandlerName(job.payload) }, 'Job fired');
    } catch (error) {
      this.logger.error(
        { jobId: job.id, error: error instanceof Error ? error.message : String(error) },
        'Job handler failed'
      );
    }
  }

  /**
   * (Re)arm the single timer at the earliest fire time.
   */
  private arm(): void {
    this.disarm();
    if (!this.running) return;

    const next = this.sortedJobs()[0];
    if (!next) return;

    const delay = Math.min(
      Math.max(next.fireAt.getTime() - this.clock.now().getTime(), 0),
      MAX_TIMER_DELAY_MS
    );

    this.timer = setTimeout(() => {
      this.timer = null;
      void this.tick();
    }, delay);
  }

  private disarm(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  private sortedJobs(): ScheduledJob[] {
    return Array.from(this.jobs.values()).sort((a, b) => a.fireAt.getTime() - b.fireAt.getTime());
  }
}

function describePayload(payload: JobPayload): Record<string, unknown> {
  switch (payload.kind) {
    case 'homework':
      return { homeworkId: payload.homeworkId, groupId: payload.groupId };
    case 'class':
      return {
        slotId: payload.slotId,
        studentId: payload.studentId,
        date: payload.date,
        startsAt: payload.startsAt.toISOString(),
      };
  }
}

/**
 * Create a job store.
 */
export function createJobStore(logger: Logger, options?: JobStoreOptions): JobStore {
  return new JobStore(logger, options);
}
