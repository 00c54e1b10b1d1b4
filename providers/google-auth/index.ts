/**
 * Google credential bootstrap
 *
 * Builds an authorized client from either an OAuth installed-app client
 * secret with a cached token, or a service-account key.
 */

export * from './types.js';
export * from './credentials.js';
