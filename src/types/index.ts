/**
 * Core type definitions.
 */

export type * from './classroom.js';
export type * from './jobs.js';
export type * from './logger.js';

export { DAYS_OF_WEEK } from './classroom.js';
export { jobKeyId, jobHandlerName } from './jobs.js';
