/**
 * Delivery channels.
 */

export { TelegramNotifier, TelegramError, createTelegramNotifier } from './telegram.js';
export type { TelegramNotifierConfig } from './telegram.js';
export { homeworkReminderText, classReminderText, formatLeadTime } from './messages.js';
