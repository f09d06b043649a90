/**
 * Reminder message texts.
 *
 * Pure formatting, kept apart from the Telegram adapter so it can be tested
 * without a bot.
 */

import { DateTime } from 'luxon';
import type { Group, HomeworkItem } from '../types/classroom.js';
import type { ResolvedZone } from '../core/time-zone.js';

/**
 * "1 hour", "30 minutes", "1 hour 30 minutes".
 */
export function formatLeadTime(leadMs: number): string {
  const totalMinutes = Math.round(leadMs / 60_000);
  const hours = Math.floor(totalMinutes / 60);
  const minutes = totalMinutes % 60;

  const parts: string[] = [];
  if (hours > 0) parts.push(`${String(hours)} ${hours === 1 ? 'hour' : 'hours'}`);
  if (minutes > 0 || hours === 0) {
    parts.push(`${String(minutes)} ${minutes === 1 ? 'minute' : 'minutes'}`);
  }
  return parts.join(' ');
}

/**
 * Format an instant as "yyyy-MM-dd HH:mm" in the recipient's zone.
 */
export function formatLocalDateTime(instant: Date, zone: ResolvedZone): string {
  return DateTime.fromJSDate(instant, { zone: zone.zone }).toFormat('yyyy-MM-dd HH:mm');
}

export function homeworkReminderText(
  homework: HomeworkItem,
  group: Group,
  zone: ResolvedZone,
  leadMs: number
): string {
  return [
    '📚 Homework reminder',
    '',
    `Group: ${group.name}`,
    `Task: ${homework.description}`,
    `Deadline: ${formatLocalDateTime(homework.deadline, zone)}`,
    `⏰ Less than ${formatLeadTime(leadMs)} left!`,
  ].join('\n');
}

export function classReminderText(
  group: Group,
  meetingLink: string | null,
  startsAt: Date,
  zone: ResolvedZone,
  leadMs: number
): string {
  const lines = [
    `Reminder: ${group.name} starts in ${formatLeadTime(leadMs)}!`,
    `Start: ${formatLocalDateTime(startsAt, zone)}`,
    '',
  ];

  if (meetingLink) {
    lines.push('Join link:', meetingLink, '');
  }

  lines.push('Check that your homework is ready, see you in class! 👋');
  return lines.join('\n');
}
