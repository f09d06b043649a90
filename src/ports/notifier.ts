/**
 * Notifier Port - Hexagonal Architecture
 *
 * Outbound delivery of reminders to a single recipient. The core does not care
 * how a message travels; it only relies on each call being async and failing
 * independently per recipient.
 */

import type { Group, HomeworkItem, Person, ScheduleSlot } from '../types/classroom.js';
import type { ResolvedZone } from '../core/time-zone.js';

export interface ReminderNotifier {
  /**
   * Remind a student that a homework deadline is close.
   * recipientZone is used for displaying the deadline only.
   */
  notifyHomeworkDeadline(
    recipient: Person,
    homework: HomeworkItem,
    group: Group,
    recipientZone: ResolvedZone
  ): Promise<void>;

  /**
   * Remind a student that a class is starting soon.
   */
  notifyClassStarting(
    recipient: Person,
    group: Group,
    slot: ScheduleSlot,
    recipientZone: ResolvedZone,
    startsAt: Date
  ): Promise<void>;
}
