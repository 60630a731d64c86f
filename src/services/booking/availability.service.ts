import { DateTime } from 'luxon';

import { ConflictError, ParseError } from '@core/errors/index.js';
import type {
  Attendee,
  BusyInterval,
  CalendarClient,
  CalendarSettings,
  Slot,
} from '@core/interfaces/calendar.types.js';
import { renderVars } from '@services/conversation/template.js';
import { logger } from '@utils/logger.js';
import { overlaps, parseOffsetTimestamp, resolveZone } from '@utils/time.js';

/** Busy data is always requested for at least this many days ahead. */
export const LOOKAHEAD_DAYS = 7;
export const SCAN_DAYS = 10;
export const MAX_SLOTS = 3;
export const SLOT_MINUTES = 60;

export type Clock = () => DateTime;

export class AvailabilityService {
  constructor(
    private readonly calendar: CalendarClient,
    private readonly clock: Clock = () => DateTime.now(),
  ) {}

  /**
   * Next free one-hour slots on working days, strictly after now, at most
   * {@link MAX_SLOTS}. Recomputed on every call.
   */
  async availableSlots(settings: CalendarSettings): Promise<Slot[]> {
    const zone = resolveZone(settings.timezone);
    const now = this.clock().setZone(zone);

    const lookahead = now.plus({ days: LOOKAHEAD_DAYS });
    const scanEnd = now.startOf('day').plus({ days: SCAN_DAYS });
    const horizon = scanEnd > lookahead ? scanEnd : lookahead;
    const busy = await this.calendar.queryFreeBusy(settings.calendarId, now, horizon);

    const slots: Slot[] = [];
    for (let d = 0; d < SCAN_DAYS && slots.length < MAX_SLOTS; d++) {
      const day = now.startOf('day').plus({ days: d });
      if (!settings.workDays.some((wd) => wd === weekdayOf(day))) continue;

      for (let h = settings.startHour; h < settings.endHour && slots.length < MAX_SLOTS; h++) {
        const start = day.set({ hour: h, minute: 0, second: 0, millisecond: 0 });
        const end = start.plus({ minutes: SLOT_MINUTES });
        if (start <= now) continue;
        if (isBusy(start, end, busy)) continue;

        slots.push({
          id: `SLOT_${slots.length + 1}`,
          label: start.setLocale(settings.locale).toFormat('ccc dd HH:mm'),
          isoStart: start.toISO({ suppressMilliseconds: true }) ?? start.toString(),
        });
      }
    }

    logger.debug('[availability] slots computed', {
      calendarId: settings.calendarId,
      busy: busy.length,
      slots: slots.map((s) => s.isoStart),
    });
    return slots;
  }

  /**
   * Books a one-hour event starting at `isoStart` for the attendee. The slot
   * must still lie in the future and be free on the calendar.
   */
  async book(settings: CalendarSettings, isoStart: string, attendee: Attendee): Promise<void> {
    const start = parseOffsetTimestamp(isoStart);
    if (!start) {
      throw new ParseError(`invalid slot timestamp: ${JSON.stringify(isoStart)}`);
    }
    const end = start.plus({ minutes: SLOT_MINUTES });
    if (start <= this.clock()) {
      throw new ConflictError(`slot ${isoStart} is no longer in the future`);
    }
    const busy = await this.calendar.queryFreeBusy(settings.calendarId, start, end);
    if (isBusy(start, end, busy)) {
      throw new ConflictError(`slot ${isoStart} is already taken`);
    }
    const vars = { name: attendee.name, phone: attendee.phone };

    await this.calendar.insertEvent(settings.calendarId, {
      summary: renderVars(settings.eventTitle, vars),
      description: renderVars(settings.eventDescription, vars),
      start: start.toISO({ suppressMilliseconds: true }) ?? isoStart,
      end: end.toISO({ suppressMilliseconds: true }) ?? end.toString(),
    });
    logger.info('[availability] appointment booked', {
      calendarId: settings.calendarId,
      start: isoStart,
    });
  }
}

function weekdayOf(day: DateTime): number {
  // luxon: 1 = Monday … 7 = Sunday
  return day.weekday % 7;
}

function isBusy(start: DateTime, end: DateTime, busy: BusyInterval[]): boolean {
  return busy.some((b) => overlaps(start, end, b.start, b.end));
}
