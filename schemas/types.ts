/**
 * Strategies for locating a worker's shifts in the worksheet
 *
 * - columns: walks the day/section grid and compares accent-folded names
 * - search: scans every cell for the exact short name, accents included
 */
export type ExtractionStrategy = 'columns' | 'search';

/**
 * A `[hours column, names column]` pair for one day of the week, in A1 letters
 */
export type DayColumns = [hoursColumn: string, namesColumn: string];

/**
 * Labelled block of rows holding worker/time-range pairs
 */
export interface SheetSection {
  /** Section label, e.g. 'customer-service' */
  label: string;
  /** First row of the section (1-based, inclusive) */
  startRow: number;
  /** Last row of the section (1-based, inclusive) */
  endRow: number;
}

/**
 * Where things live in the shift plan worksheet
 */
export interface SheetLayout {
  /** Row holding the day labels (1-based) */
  dateRow: number;
  /** Column pairs for day 0 … day N */
  dayColumns: DayColumns[];
  sections: SheetSection[];
  /** Annotation tags written next to names, stripped before matching */
  annotationTags: string[];
}

/**
 * Settings applied to every created calendar event
 */
export interface EventSettings {
  summary: string;
  location: string;
  /** IANA time zone of the shift plan */
  timeZone: string;
  /** Popup reminder, minutes before start */
  reminderMinutes: number;
  calendarId: string;
}

/**
 * OAuth installed-app credentials (client secret + cached token)
 */
export interface OAuthAuthSettings {
  mode: 'oauth';
  clientSecretPath: string;
  tokenPath: string;
}

/**
 * Service-account key, optionally impersonating a user
 */
export interface ServiceAccountAuthSettings {
  mode: 'service-account';
  keyFilePath: string;
  /** Email of the user to act as (domain-wide delegation) */
  subject?: string;
}

export type AuthSettings = OAuthAuthSettings | ServiceAccountAuthSettings;

/**
 * Fully resolved configuration
 */
export interface SchedulerConfig {
  /** Worksheet (tab) title inside the spreadsheet */
  worksheet: string;
  layout: SheetLayout;
  event: EventSettings;
  auth: AuthSettings;
  strategy: ExtractionStrategy;
}

/**
 * Start/end hours of a shift
 */
export interface ShiftHours {
  /** HH:mm:ss */
  start: string;
  /** HH:mm:ss */
  end: string;
}

/**
 * One shift worked by the requested person
 */
export interface Workshift extends ShiftHours {
  /** YYYY-MM-DD */
  date: string;
  /** YYYY-MM-DD, the day after `date` for shifts crossing midnight */
  endDate: string;
  /** Section label (columns strategy only) */
  section?: string;
  /** A1 reference of the cell holding the name */
  cell: string;
}

/**
 * Cell that could not be turned into a workshift
 */
export interface ExtractionWarning {
  /** A1 reference of the offending cell */
  cell: string;
  message: string;
}

/**
 * Result of scanning a worksheet for a worker
 */
export interface ExtractionResult {
  workshifts: Workshift[];
  warnings: ExtractionWarning[];
}

/**
 * Start or end of a timed calendar event
 */
export interface EventDateTime {
  /** Local date-time without offset: YYYY-MM-DDTHH:mm:ss */
  dateTime: string;
  timeZone: string;
}

/**
 * Body sent to the Calendar events.insert call
 */
export interface CalendarEventRequest {
  summary: string;
  location?: string;
  description?: string;
  start: EventDateTime;
  end: EventDateTime;
  reminders: {
    useDefault: false;
    overrides: Array<{ method: 'popup' | 'email'; minutes: number }>;
  };
}

/**
 * A created calendar event
 */
export interface CreatedEvent {
  id: string;
  htmlLink?: string;
  request: CalendarEventRequest;
}

/**
 * An event that could not be inserted
 */
export interface FailedEvent {
  request: CalendarEventRequest;
  error: string;
}

/**
 * Report of a single scheduler run
 */
export interface RunReport {
  spreadsheetId: string;
  worksheet: string;
  worker: string;
  strategy: ExtractionStrategy;
  dryRun: boolean;
  workshifts: Workshift[];
  /** Requests built for the run (inserted unless dryRun) */
  requests: CalendarEventRequest[];
  created: CreatedEvent[];
  failed: FailedEvent[];
  warnings: ExtractionWarning[];
}
