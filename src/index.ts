/**
 * Workshift Calendar
 *
 * Main exports for using the scheduler as a library.
 */

// Schema types and validation
export * from '../schemas/index.js';

// Cell normalizers
export * from '../normalizers/index.js';

// Google API providers
export * from '../providers/index.js';

// Extraction, event building and the scheduler run
export * from './extraction.js';
export * from './events.js';
export * from './config.js';
export * from './scheduler.js';
