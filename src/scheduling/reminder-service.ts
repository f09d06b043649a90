/**
 * Reminder Service
 *
 * The scheduling surface the request layer talks to. Homework mutations call
 * plan/cancel/reschedule synchronously; the re-planning driver calls
 * replanClassOccurrences and, at start, sweepHomeworkReminders.
 */

import type { Logger } from '../types/logger.js';
import type { CancelResult, ScheduledJobsReport, UpsertResult } from '../types/jobs.js';
import { jobKeyId } from '../types/jobs.js';
import type { ClassroomStore } from '../ports/classroom-store.js';
import type { JobStore } from '../core/job-store.js';
import type { Clock } from '../core/clock.js';
import { systemClock } from '../core/clock.js';
import { createTraceContext, withTraceContext } from '../core/trace-context.js';
import type { HomeworkPlanner } from './homework-planner.js';
import type { ClassPlanner, ReplanSummary } from './class-planner.js';
import type { ReminderDispatcher } from './reminder-dispatcher.js';
import type { ReplanTarget } from './replan-driver.js';

export interface ReminderServiceConfig {
  /**
   * Send a reminder immediately for unsent homework whose reminder time passed
   * while the process was down, as long as the deadline is still ahead.
   */
  catchUpMissedHomework: boolean;
}

const DEFAULT_CONFIG: ReminderServiceConfig = {
  catchUpMissedHomework: true,
};

export interface SweepSummary {
  examined: number;
  planned: number;
  caughtUp: number;
  expired: number;
}

export interface ReminderServiceDeps {
  store: ClassroomStore;
  jobStore: JobStore;
  homeworkPlanner: HomeworkPlanner;
  classPlanner: ClassPlanner;
  dispatcher: ReminderDispatcher;
  logger: Logger;
  clock?: Clock;
  config?: Partial<ReminderServiceConfig>;
}

export class ReminderService implements ReplanTarget {
  private readonly logger: Logger;
  private readonly store: ClassroomStore;
  private readonly jobStore: JobStore;
  private readonly homeworkPlanner: HomeworkPlanner;
  private readonly classPlanner: ClassPlanner;
  private readonly dispatcher: ReminderDispatcher;
  private readonly clock: Clock;
  private readonly config: ReminderServiceConfig;

  constructor(deps: ReminderServiceDeps) {
    this.store = deps.store;
    this.jobStore = deps.jobStore;
    this.homeworkPlanner = deps.homeworkPlanner;
    this.classPlanner = deps.classPlanner;
    this.dispatcher = deps.dispatcher;
    this.logger = deps.logger.child({ component: 'reminder-service' });
    this.clock = deps.clock ?? systemClock;
    this.config = { ...DEFAULT_CONFIG, ...deps.config };
  }

  /** Homework created */
  planHomeworkReminder(homeworkId: number, deadline: Date, groupId: number): UpsertResult {
    return this.homeworkPlanner.plan(homeworkId, deadline, groupId);
  }

  /** Homework deleted */
  cancelHomeworkReminder(homeworkId: number): CancelResult {
    return this.homeworkPlanner.cancel(homeworkId);
  }

  /** Homework deadline edited */
  rescheduleHomeworkReminder(homeworkId: number, deadline: Date, groupId: number): UpsertResult {
    return this.homeworkPlanner.replan(homeworkId, deadline, groupId);
  }

  replanClassOccurrences(): Promise<ReplanSummary> {
    return this.classPlanner.replan();
  }

  /**
   * Rebuild homework jobs after a restart.
   *
   * Every unsent homework with a future deadline is planned again. Reminders
   * that fell into downtime are sent now when catch-up is enabled; the
   * dispatcher re-checks everything, including reminderSent.
   */
  async sweepHomeworkReminders(): Promise<SweepSummary> {
    const now = this.clock.now();
    const items = await this.store.listUnsentHomework();
    const summary: SweepSummary = { examined: items.length, planned: 0, caughtUp: 0, expired: 0 };

    for (const homework of items) {
      if (homework.deadline <= now) {
        summary.expired++;
        continue;
      }

      const result = this.homeworkPlanner.plan(homework.id, homework.deadline, homework.groupId);
      if (result !== 'dropped') {
        summary.planned++;
        continue;
      }

      if (!this.config.catchUpMissedHomework) continue;

      const traceId = jobKeyId({ kind: 'homework', homeworkId: homework.id });
      const dispatched = await withTraceContext(
        createTraceContext(traceId, { correlationId: 'catch_up', spanId: `fire_${traceId}` }),
        () =>
          this.dispatcher.sendHomeworkReminder({
            kind: 'homework',
            homeworkId: homework.id,
            groupId: homework.groupId,
          })
      );
      if (!dispatched.suppressed) {
        summary.caughtUp++;
      }
    }

    this.logger.info({ ...summary }, 'Homework reminders swept');
    return summary;
  }

  /**
   * Diagnostic snapshot of pending jobs.
   */
  getScheduledJobsInfo(): ScheduledJobsReport {
    const jobs = this.jobStore.peekJobs();
    return { count: jobs.length, jobs };
  }
}
