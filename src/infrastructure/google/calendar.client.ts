import { google, type calendar_v3 } from 'googleapis';
import { DateTime } from 'luxon';

import { config } from '@config/env.config.js';
import { ConfigurationError } from '@core/errors/index.js';
import type {
  BusyInterval,
  CalendarClient,
  CalendarEventInput,
} from '@core/interfaces/calendar.types.js';
import { logger } from '@utils/logger.js';

export function createCalendarApi(keyFile = config.GOOGLE_APPLICATION_CREDENTIALS): calendar_v3.Calendar {
  if (!keyFile) {
    throw new ConfigurationError('GOOGLE_APPLICATION_CREDENTIALS is not configured');
  }
  const auth = new google.auth.GoogleAuth({
    keyFile,
    scopes: ['https://www.googleapis.com/auth/calendar'],
  });
  return google.calendar({ version: 'v3', auth });
}

export function toBusyIntervals(
  busy: calendar_v3.Schema$TimePeriod[] | undefined,
): BusyInterval[] {
  const out: BusyInterval[] = [];
  for (const period of busy ?? []) {
    const start = period.start ? DateTime.fromISO(period.start, { setZone: true }) : null;
    const end = period.end ? DateTime.fromISO(period.end, { setZone: true }) : null;
    if (!start?.isValid || !end?.isValid) {
      logger.warn('[calendar] skipping malformed busy period', { period });
      continue;
    }
    out.push({ start, end });
  }
  return out;
}

/** Google Calendar backed free/busy queries and event inserts. */
export class GoogleCalendarClient implements CalendarClient {
  private api: calendar_v3.Calendar | undefined;

  constructor(private readonly factory: () => calendar_v3.Calendar = () => createCalendarApi()) {}

  private calendar(): calendar_v3.Calendar {
    if (!this.api) this.api = this.factory();
    return this.api;
  }

  async queryFreeBusy(calendarId: string, timeMin: DateTime, timeMax: DateTime): Promise<BusyInterval[]> {
    const res = await this.calendar().freebusy.query({
      requestBody: {
        timeMin: timeMin.toISO() ?? undefined,
        timeMax: timeMax.toISO() ?? undefined,
        items: [{ id: calendarId }],
      },
    });
    return toBusyIntervals(res.data.calendars?.[calendarId]?.busy);
  }

  async insertEvent(calendarId: string, event: CalendarEventInput): Promise<void> {
    const res = await this.calendar().events.insert({
      calendarId,
      requestBody: {
        summary: event.summary,
        description: event.description,
        start: { dateTime: event.start },
        end: { dateTime: event.end },
      },
    });
    logger.info('[calendar] event created', { calendarId, eventId: res.data.id });
  }
}
