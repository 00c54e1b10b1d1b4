/**
 * Google Calendar provider insert implementation
 */

import { google } from 'googleapis';
import type { Auth } from 'googleapis';
import type { EventSink, InsertedEvent } from './types.js';

/**
 * Describe a Google API failure as "status: message"
 *
 * googleapis rejects with a GaxiosError carrying the HTTP status in `code`
 * (or `status`); anything else falls back to the plain message.
 */
export function describeGoogleError(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  if (typeof error !== 'object' || error === null) {
    return message;
  }

  let status: number | string | undefined;
  if ('code' in error && (typeof error.code === 'number' || typeof error.code === 'string')) {
    status = error.code;
  } else if ('status' in error && typeof error.status === 'number') {
    status = error.status;
  }

  return status !== undefined ? `${status}: ${message}` : message;
}

/**
 * Create an event sink backed by the Calendar events.insert call
 */
export function createGoogleCalendarSink(auth: Auth.OAuth2Client): EventSink {
  const calendar = google.calendar({ version: 'v3', auth });

  return {
    async insertEvent(calendarId, request): Promise<InsertedEvent> {
      const response = await calendar.events.insert({
        calendarId,
        requestBody: request,
      });

      const id = response.data.id;
      if (!id) {
        throw new Error('Google Calendar API returned an event without an id');
      }
      return { id, htmlLink: response.data.htmlLink ?? undefined };
    },
  };
}
