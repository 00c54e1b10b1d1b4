/**
 * Google Calendar provider
 *
 * Inserts workshift events through the Calendar v3 API.
 */

export * from './types.js';
export * from './insert.js';
