/**
 * Google credential bootstrap types
 */

import type { AuthSettings } from '../../schemas/index.js';

/**
 * OAuth scopes needed to read the shift plan and write calendar events
 */
export const GOOGLE_SCOPES = [
  'https://www.googleapis.com/auth/calendar.events',
  'https://www.googleapis.com/auth/spreadsheets.readonly',
  'https://www.googleapis.com/auth/drive.metadata.readonly',
];

/**
 * Asks the user a question on the console and resolves with the answer
 */
export type PromptFn = (question: string) => Promise<string>;

/**
 * Options for building an authorized Google client
 */
export interface AuthorizeOptions {
  settings: AuthSettings;
  /** Used by the OAuth consent flow to read the authorization code */
  prompt: PromptFn;
  /** Directory relative credential paths are resolved against (default: cwd) */
  baseDir?: string;
}
