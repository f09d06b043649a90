/**
 * Ports - Hexagonal Architecture Interfaces
 *
 * ┌────────────────────────────────────────────────────────────────┐
 * │ ClassroomStore   - Durable classroom entities (JSON, SQL)      │
 * │ ReminderNotifier - Outbound reminder delivery (Telegram)       │
 * └────────────────────────────────────────────────────────────────┘
 */

export type { ClassroomStore } from './classroom-store.js';
export { StoreCommitError } from './classroom-store.js';
export type { ReminderNotifier } from './notifier.js';
