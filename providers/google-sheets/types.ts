/**
 * Google Sheets provider types
 */

import type { SheetGrid } from '../../normalizers/index.js';

export const SPREADSHEET_MIME_TYPE = 'application/vnd.google-apps.spreadsheet';

/**
 * Read access to the shift plan spreadsheet
 */
export interface SpreadsheetSource {
  /** Look up a spreadsheet ID by its exact title */
  findSpreadsheetId(title: string): Promise<string>;
  /** Read a whole worksheet as formatted cell strings */
  readWorksheet(spreadsheetId: string, worksheet: string): Promise<SheetGrid>;
}

/**
 * Minimal Drive file entry (files.list with fields=files(id,name))
 */
export interface DriveFileEntry {
  id?: string | null;
  name?: string | null;
}
