/**
 * Google API providers used by the scheduler
 *
 * - google-auth: OAuth / service-account credential bootstrap
 * - google-sheets: shift plan lookup and worksheet reads
 * - google-calendar: event inserts
 */

export * from './google-auth/index.js';
export * from './google-sheets/index.js';
export * from './google-calendar/index.js';
