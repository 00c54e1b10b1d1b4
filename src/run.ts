#!/usr/bin/env node
/**
 * CLI entrypoint for copying workshifts into Google Calendar
 *
 * Usage:
 *   npx tsx src/run.ts --sheet "Grafik marzec" --name "Jan Kowalski"
 *   npx tsx src/run.ts --spreadsheet-id 1AbC --name "Jan Kowalski" --dry-run
 */

import { writeFile } from 'fs/promises';
import { authorize } from '../providers/google-auth/index.js';
import { createGoogleSheetsSource } from '../providers/google-sheets/index.js';
import { createGoogleCalendarSink } from '../providers/google-calendar/index.js';
import { HELP_TEXT, parseArgs } from './args.js';
import type { CliArgs } from './args.js';
import { DEFAULT_CONFIG_PATH, loadConfig } from './config.js';
import { askIfMissing, promptLine } from './prompt.js';
import { scheduleWorkshifts } from './scheduler.js';
import type { SpreadsheetRef } from './scheduler.js';

function readArgs(): CliArgs {
  try {
    return parseArgs(process.argv.slice(2));
  } catch (error) {
    console.error(`Error: ${(error as Error).message}`);
    console.log(HELP_TEXT);
    process.exit(1);
  }
}

async function main(): Promise<void> {
  const args = readArgs();
  if (args.help) {
    console.log(HELP_TEXT);
    return;
  }

  const configPath = args.config ?? DEFAULT_CONFIG_PATH;
  const config = await loadConfig(configPath, args.config !== undefined);

  const spreadsheet: SpreadsheetRef = args.spreadsheetId
    ? { id: args.spreadsheetId }
    : { title: await askIfMissing(args.sheet, 'Spreadsheet name: ') };
  const fullName = await askIfMissing(args.name, "Person's full name: ");

  console.error(`Workshift Calendar CLI`);
  console.error(`Spreadsheet: ${'id' in spreadsheet ? spreadsheet.id : spreadsheet.title}`);
  console.error(`Worksheet: ${config.worksheet}`);
  console.error(`Worker: ${fullName}`);
  console.error(`Calendar: ${config.event.calendarId}${args.dryRun ? ' (dry run)' : ''}`);
  console.error('');

  const auth = await authorize({ settings: config.auth, prompt: promptLine });
  const report = await scheduleWorkshifts(
    {
      spreadsheet,
      fullName,
      config,
      year: args.year,
      strategy: args.strategy,
      dryRun: args.dryRun,
    },
    {
      source: createGoogleSheetsSource(auth),
      sink: createGoogleCalendarSink(auth),
    }
  );

  // Summary
  if (report.dryRun) {
    console.error(`Dry run: ${report.requests.length} events would be added`);
  } else {
    console.error(`Added ${report.created.length} of ${report.requests.length} events`);
  }
  if (report.failed.length > 0) {
    console.error(`Errors: ${report.failed.length} events failed`);
    process.exitCode = 1;
  }
  console.error('');

  const json = JSON.stringify(report, null, 2);

  if (args.output) {
    await writeFile(args.output, json);
    console.error(`Report written to: ${args.output}`);
  } else {
    console.log(json);
  }
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
