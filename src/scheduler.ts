/**
 * Scheduler run: spreadsheet → workshifts → calendar events
 */

import type {
  CreatedEvent,
  ExtractionStrategy,
  FailedEvent,
  RunReport,
  SchedulerConfig,
} from '../schemas/index.js';
import type { SpreadsheetSource } from '../providers/google-sheets/index.js';
import type { EventSink } from '../providers/google-calendar/index.js';
import { describeGoogleError } from '../providers/google-calendar/index.js';
import { toShortName } from '../normalizers/index.js';
import { extractWorkshifts } from './extraction.js';
import { buildEventRequest, describeRequest } from './events.js';

/**
 * Which spreadsheet to read: by Drive title or by ID
 */
export type SpreadsheetRef = { title: string } | { id: string };

export interface ScheduleOptions {
  spreadsheet: SpreadsheetRef;
  /** Person's full name, e.g. "Jan Kowalski" */
  fullName: string;
  config: SchedulerConfig;
  /** Year of the plan's day labels (default: current year) */
  year?: number;
  /** Overrides config.strategy */
  strategy?: ExtractionStrategy;
  /** Build and report events without inserting them */
  dryRun?: boolean;
}

export interface SchedulerDeps {
  source: SpreadsheetSource;
  sink: EventSink;
}

async function resolveSpreadsheetId(ref: SpreadsheetRef, source: SpreadsheetSource): Promise<string> {
  if ('id' in ref) {
    return ref.id;
  }
  return source.findSpreadsheetId(ref.title);
}

/**
 * Copy a worker's shifts from the shift plan into their calendar
 *
 * Events are inserted one at a time. A failed insert is logged and recorded
 * in the report; the run continues with the next event.
 */
export async function scheduleWorkshifts(options: ScheduleOptions, deps: SchedulerDeps): Promise<RunReport> {
  const { config, fullName, dryRun = false } = options;
  const strategy = options.strategy ?? config.strategy;
  const year = options.year ?? new Date().getFullYear();
  const worker = toShortName(fullName);

  const spreadsheetId = await resolveSpreadsheetId(options.spreadsheet, deps.source);
  const grid = await deps.source.readWorksheet(spreadsheetId, config.worksheet);

  console.error(`[scheduler] Extracting "${worker}" workshifts (${strategy})...`);
  const { workshifts, warnings } = extractWorkshifts(grid, {
    fullName,
    layout: config.layout,
    year,
    strategy,
  });

  for (const warning of warnings) {
    console.error(`[scheduler] ${warning.cell}: ${warning.message}`);
  }
  console.error(`[scheduler] Found ${workshifts.length} workshifts`);

  const requests = workshifts.map((workshift) => buildEventRequest(workshift, config.event));
  const created: CreatedEvent[] = [];
  const failed: FailedEvent[] = [];

  if (dryRun) {
    for (const request of requests) {
      console.error(`[scheduler] (dry run) ${describeRequest(request)}`);
    }
  } else {
    for (const request of requests) {
      try {
        const event = await deps.sink.insertEvent(config.event.calendarId, request);
        created.push({ id: event.id, htmlLink: event.htmlLink, request });
        console.error(`[google-calendar] Added ${describeRequest(request)}`);
      } catch (error) {
        const message = describeGoogleError(error);
        failed.push({ request, error: message });
        console.error(`[google-calendar] Failed to add ${describeRequest(request)}: ${message}`);
      }
    }
  }

  return {
    spreadsheetId,
    worksheet: config.worksheet,
    worker,
    strategy,
    dryRun,
    workshifts,
    requests,
    created,
    failed,
    warnings,
  };
}
