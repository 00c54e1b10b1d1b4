/**
 * Google Calendar provider types
 */

import type { CalendarEventRequest } from '../../schemas/index.js';

/**
 * Event created by events.insert (minimal fields)
 */
export interface InsertedEvent {
  id: string;
  htmlLink?: string;
}

/**
 * Write access to the target calendar
 */
export interface EventSink {
  insertEvent(calendarId: string, request: CalendarEventRequest): Promise<InsertedEvent>;
}
