/**
 * Google Sheets provider fetch implementation
 *
 * Uses the Drive API to open a spreadsheet by its title and
 * a single Sheets values.get for the whole worksheet.
 */

import { google } from 'googleapis';
import type { Auth } from 'googleapis';
import type { SheetGrid } from '../../normalizers/index.js';
import { SPREADSHEET_MIME_TYPE } from './types.js';
import type { DriveFileEntry, SpreadsheetSource } from './types.js';

/**
 * Escape a value for use inside a quoted Drive query string
 */
export function escapeDriveQueryValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/'/g, "\\'");
}

/**
 * Build the Drive files.list query for a spreadsheet with an exact title
 */
export function buildSpreadsheetQuery(title: string): string {
  return `name = '${escapeDriveQueryValue(title)}' and mimeType = '${SPREADSHEET_MIME_TYPE}' and trashed = false`;
}

/**
 * Quote a worksheet title as an A1 range covering the whole sheet
 */
export function worksheetRange(worksheet: string): string {
  return `'${worksheet.replace(/'/g, "''")}'`;
}

/**
 * Pick the spreadsheet ID from Drive results; the first hit wins
 *
 * @throws Error if no spreadsheet was found
 */
export function pickSpreadsheetId(title: string, files: DriveFileEntry[] | undefined): string {
  const match = (files ?? []).find((file) => file.id);
  if (!match?.id) {
    throw new Error(`Spreadsheet not found: "${title}" (is it shared with this account?)`);
  }

  if ((files ?? []).length > 1) {
    console.error(`[google-sheets] ${files?.length} spreadsheets named "${title}", using ${match.id}`);
  }
  return match.id;
}

/**
 * Convert Sheets API values to a grid of strings
 */
export function toGrid(values: unknown[][] | null | undefined): SheetGrid {
  return (values ?? []).map((row) =>
    row.map((value) => (value === null || value === undefined ? '' : String(value)))
  );
}

/**
 * Create a spreadsheet source backed by the Drive and Sheets APIs
 */
export function createGoogleSheetsSource(auth: Auth.OAuth2Client): SpreadsheetSource {
  const drive = google.drive({ version: 'v3', auth });
  const sheets = google.sheets({ version: 'v4', auth });

  return {
    async findSpreadsheetId(title: string): Promise<string> {
      console.error(`[google-sheets] Looking up "${title}"...`);
      const response = await drive.files.list({
        q: buildSpreadsheetQuery(title),
        fields: 'files(id,name)',
        pageSize: 10,
        includeItemsFromAllDrives: true,
        supportsAllDrives: true,
      });
      return pickSpreadsheetId(title, response.data.files);
    },

    async readWorksheet(spreadsheetId: string, worksheet: string): Promise<SheetGrid> {
      console.error(`[google-sheets] Loading worksheet "${worksheet}"...`);
      const response = await sheets.spreadsheets.values.get({
        spreadsheetId,
        range: worksheetRange(worksheet),
        majorDimension: 'ROWS',
        valueRenderOption: 'FORMATTED_VALUE',
      });
      return toGrid(response.data.values);
    },
  };
}
