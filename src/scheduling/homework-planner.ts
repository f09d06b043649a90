/**
 * Homework Reminder Planner
 *
 * One job per homework item, firing a fixed lead before the deadline.
 * Called from the request path on create, edit and delete.
 */

import type { Logger } from '../types/logger.js';
import type { CancelResult, HomeworkJobKey, UpsertResult } from '../types/jobs.js';
import type { JobStore } from '../core/job-store.js';

export interface HomeworkPlannerConfig {
  /** Lead before the deadline, in ms */
  leadMs: number;
}

const DEFAULT_CONFIG: HomeworkPlannerConfig = {
  leadMs: 60 * 60 * 1000,
};

export function homeworkJobKey(homeworkId: number): HomeworkJobKey {
  return { kind: 'homework', homeworkId };
}

export class HomeworkPlanner {
  private readonly logger: Logger;
  private readonly jobStore: JobStore;
  private readonly config: HomeworkPlannerConfig;

  constructor(jobStore: JobStore, logger: Logger, config: Partial<HomeworkPlannerConfig> = {}) {
    this.jobStore = jobStore;
    this.logger = logger.child({ component: 'homework-planner' });
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Fire time for a deadline.
   */
  reminderInstant(deadline: Date): Date {
    return new Date(deadline.getTime() - this.config.leadMs);
  }

  /**
   * Schedule (or move) the reminder for a homework item.
   * A reminder time that already passed schedules nothing.
   */
  plan(homeworkId: number, deadline: Date, groupId: number): UpsertResult {
    const fireAt = this.reminderInstant(deadline);
    const result = this.jobStore.upsert(homeworkJobKey(homeworkId), fireAt, {
      kind: 'homework',
      homeworkId,
      groupId,
    });

    if (result === 'dropped') {
      this.logger.debug(
        { homeworkId, deadline: deadline.toISOString() },
        'Homework reminder time already passed, not scheduled'
      );
    } else {
      this.logger.info(
        { homeworkId, groupId, fireAt: fireAt.toISOString(), result },
        'Homework reminder planned'
      );
    }

    return result;
  }

  /**
   * Remove a pending reminder. Not finding one is fine.
   */
  cancel(homeworkId: number): CancelResult {
    const result = this.jobStore.cancel(homeworkJobKey(homeworkId));
    if (result.status === 'cancelled') {
      this.logger.info({ homeworkId }, 'Homework reminder cancelled');
    }
    return result;
  }

  /**
   * Edit flow: drop the old reminder, then plan from the new deadline.
   */
  replan(homeworkId: number, deadline: Date, groupId: number): UpsertResult {
    this.cancel(homeworkId);
    return this.plan(homeworkId, deadline, groupId);
  }
}
