/**
 * Calendar event request construction
 */

import type { CalendarEventRequest, EventSettings, Workshift } from '../schemas/index.js';

/**
 * Build the events.insert body for a workshift
 *
 * Date-times are local to `settings.timeZone`; the Calendar API applies the
 * zone, so no UTC offset is written.
 */
export function buildEventRequest(workshift: Workshift, settings: EventSettings): CalendarEventRequest {
  const request: CalendarEventRequest = {
    summary: settings.summary,
    start: {
      dateTime: `${workshift.date}T${workshift.start}`,
      timeZone: settings.timeZone,
    },
    end: {
      dateTime: `${workshift.endDate}T${workshift.end}`,
      timeZone: settings.timeZone,
    },
    reminders: {
      useDefault: false,
      overrides: [{ method: 'popup', minutes: settings.reminderMinutes }],
    },
  };

  if (settings.location) {
    request.location = settings.location;
  }
  if (workshift.section) {
    request.description = `Section: ${workshift.section}`;
  }

  return request;
}

/**
 * Short human-readable label for logs, e.g. "2024-03-15 08:00-16:00"
 */
export function describeRequest(request: CalendarEventRequest): string {
  const [date, start] = request.start.dateTime.split('T');
  const end = request.end.dateTime.split('T')[1];
  return `${date} ${start.slice(0, 5)}-${end.slice(0, 5)}`;
}
