import type { DateTime } from 'luxon';

/** 0 = Sunday … 6 = Saturday. */
export type Weekday = 0 | 1 | 2 | 3 | 4 | 5 | 6;

export interface CalendarSettings {
  calendarId: string;
  startHour: number;
  endHour: number;
  workDays: Weekday[];
  timezone: string;
  locale: string;
  eventTitle: string;
  eventDescription: string;
}

export interface BusyInterval {
  start: DateTime;
  end: DateTime;
}

export interface CalendarEventInput {
  summary: string;
  description: string;
  start: string;
  end: string;
}

export interface CalendarClient {
  queryFreeBusy(calendarId: string, timeMin: DateTime, timeMax: DateTime): Promise<BusyInterval[]>;
  insertEvent(calendarId: string, event: CalendarEventInput): Promise<void>;
}

export interface Slot {
  id: string;
  label: string;
  isoStart: string;
}

export interface Attendee {
  name: string;
  phone: string;
}
