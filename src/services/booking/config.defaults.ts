import type { CalendarFile } from '@core/repositories/calendar-config.repo.js';
import type { CalendarSettings, Weekday } from '@core/interfaces/calendar.types.js';

import { config } from '@config/env.config.js';

export const DEFAULT_START_HOUR = 9;
export const DEFAULT_END_HOUR = 17;
/** Monday to Friday. */
export const DEFAULT_WORK_DAYS: Weekday[] = [1, 2, 3, 4, 5];
export const DEFAULT_LOCALE = 'es-AR';
export const DEFAULT_EVENT_TITLE = 'Turno: {{name}}';
export const DEFAULT_EVENT_DESCRIPTION = 'Agendado vía WhatsApp.\nTeléfono: {{phone}}';

const isWeekday = (n: number): n is Weekday => Number.isInteger(n) && n >= 0 && n <= 6;

function readHours(start?: number, end?: number): { startHour: number; endHour: number } {
  const s = start ?? DEFAULT_START_HOUR;
  const e = end ?? DEFAULT_END_HOUR;
  if (s < 0 || s > 23 || e < 1 || e > 24 || e <= s) {
    return { startHour: DEFAULT_START_HOUR, endHour: DEFAULT_END_HOUR };
  }
  return { startHour: s, endHour: e };
}

function readWorkDays(days?: number[]): Weekday[] {
  if (!days || days.length === 0 || !days.every(isWeekday)) return [...DEFAULT_WORK_DAYS];
  return [...new Set(days.filter(isWeekday))].sort((a, b) => a - b);
}

/** Applies defaults to a tenant's calendar file: 9–17, Monday–Friday, the process time zone. */
export function readCalendarSettings(file: CalendarFile & { calendar_id: string }): CalendarSettings {
  return {
    calendarId: file.calendar_id,
    ...readHours(file.start_hour, file.end_hour),
    workDays: readWorkDays(file.work_days),
    timezone: file.timezone || config.TIMEZONE,
    locale: file.locale || DEFAULT_LOCALE,
    eventTitle: file.event_title || DEFAULT_EVENT_TITLE,
    eventDescription: file.event_description || DEFAULT_EVENT_DESCRIPTION,
  };
}
