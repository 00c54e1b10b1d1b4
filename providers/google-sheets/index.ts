/**
 * Google Sheets provider
 *
 * Finds the shift plan by title through Drive and reads worksheet values
 * through the Sheets API.
 */

export * from './types.js';
export * from './fetch.js';
