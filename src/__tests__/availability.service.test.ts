import { describe, expect, it } from 'vitest';
import { DateTime } from 'luxon';

import { ConflictError, ParseError } from '@core/errors/index.js';
import { AvailabilityService, MAX_SLOTS } from '@services/booking/availability.service.js';
import { FakeCalendarClient, calendarSettings } from '@test/utils/fakes.js';

const ZONE = 'America/Argentina/Buenos_Aires';
const at = (iso: string) => DateTime.fromISO(iso, { zone: ZONE });
const busy = (start: string, end: string) => ({ start: at(start), end: at(end) });

function service(now: DateTime, calendar = new FakeCalendarClient()) {
  return { svc: new AvailabilityService(calendar, () => now), calendar };
}

describe('AvailabilityService.availableSlots', () => {
  it('offers the first three hours of a free Monday morning', async () => {
    const { svc, calendar } = service(at('2026-10-19T08:00:00'));

    const slots = await svc.availableSlots(calendarSettings());

    expect(slots).toEqual([
      { id: 'SLOT_1', label: 'Mon 19 09:00', isoStart: '2026-10-19T09:00:00-03:00' },
      { id: 'SLOT_2', label: 'Mon 19 10:00', isoStart: '2026-10-19T10:00:00-03:00' },
      { id: 'SLOT_3', label: 'Mon 19 11:00', isoStart: '2026-10-19T11:00:00-03:00' },
    ]);
    expect(calendar.queries).toHaveLength(1);
    expect(calendar.queries[0].calendarId).toBe('test-calendar');
    expect(calendar.queries[0].timeMin.toMillis()).toBe(at('2026-10-19T08:00:00').toMillis());
    expect(calendar.queries[0].timeMax.toMillis()).toBe(at('2026-10-29T00:00:00').toMillis());
  });

  it('excludes exactly the slot overlapping a busy hour', async () => {
    const calendar = new FakeCalendarClient([busy('2026-10-19T10:00:00', '2026-10-19T11:00:00')]);
    const { svc } = service(at('2026-10-19T08:00:00'), calendar);

    const slots = await svc.availableSlots(calendarSettings());

    expect(slots.map((s) => s.isoStart)).toEqual([
      '2026-10-19T09:00:00-03:00',
      '2026-10-19T11:00:00-03:00',
      '2026-10-19T12:00:00-03:00',
    ]);
    expect(slots.map((s) => s.id)).toEqual(['SLOT_1', 'SLOT_2', 'SLOT_3']);
  });

  it('treats a partial overlap as busy', async () => {
    const calendar = new FakeCalendarClient([busy('2026-10-19T09:30:00', '2026-10-19T09:45:00')]);
    const { svc } = service(at('2026-10-19T08:00:00'), calendar);

    const slots = await svc.availableSlots(calendarSettings());

    expect(slots.map((s) => s.label)).toEqual(['Mon 19 10:00', 'Mon 19 11:00', 'Mon 19 12:00']);
  });

  it('skips a slot that starts exactly now', async () => {
    const { svc } = service(at('2026-10-19T10:00:00'));

    const slots = await svc.availableSlots(calendarSettings());

    expect(slots.map((s) => s.label)).toEqual(['Mon 19 11:00', 'Mon 19 12:00', 'Mon 19 13:00']);
  });

  it('moves past the weekend when Friday is over', async () => {
    const { svc } = service(at('2026-10-23T16:30:00'));

    const slots = await svc.availableSlots(calendarSettings());

    expect(slots.map((s) => s.isoStart)).toEqual([
      '2026-10-26T09:00:00-03:00',
      '2026-10-26T10:00:00-03:00',
      '2026-10-26T11:00:00-03:00',
    ]);
  });

  it('honours custom working days and hours within the ten-day scan', async () => {
    const { svc } = service(at('2026-10-19T08:00:00'));

    const slots = await svc.availableSlots(
      calendarSettings({ workDays: [6], startHour: 14, endHour: 16 }),
    );

    expect(slots.map((s) => s.isoStart)).toEqual([
      '2026-10-24T14:00:00-03:00',
      '2026-10-24T15:00:00-03:00',
    ]);
  });

  it('returns fewer than three slots when the scan window runs out', async () => {
    const calendar = new FakeCalendarClient([busy('2026-10-19T00:00:00', '2026-10-28T10:00:00')]);
    const { svc } = service(at('2026-10-19T08:00:00'), calendar);

    const slots = await svc.availableSlots(calendarSettings({ startHour: 9, endHour: 11 }));

    expect(slots).toEqual([
      { id: 'SLOT_1', label: 'Wed 28 10:00', isoStart: '2026-10-28T10:00:00-03:00' },
    ]);
  });

  it('returns nothing when every slot is busy', async () => {
    const calendar = new FakeCalendarClient([busy('2026-10-01T00:00:00', '2026-11-30T00:00:00')]);
    const { svc } = service(at('2026-10-19T08:00:00'), calendar);

    await expect(svc.availableSlots(calendarSettings())).resolves.toEqual([]);
  });

  it('never offers past slots nor more than three', async () => {
    const start = at('2026-10-19T00:00:00');
    for (let h = 0; h < 24 * 7; h += 5) {
      const now = start.plus({ hours: h, minutes: 17 });
      const { svc } = service(now);
      const slots = await svc.availableSlots(calendarSettings());
      expect(slots.length).toBeLessThanOrEqual(MAX_SLOTS);
      for (const slot of slots) {
        expect(DateTime.fromISO(slot.isoStart).toMillis()).toBeGreaterThan(now.toMillis());
      }
    }
  });

  it('falls back to the system zone for an unknown time zone', async () => {
    const now = at('2026-10-19T08:00:00');
    const { svc } = service(now);

    const slots = await svc.availableSlots(calendarSettings({ timezone: 'Mars/Olympus_Mons' }));

    expect(slots).toHaveLength(3);
    for (const slot of slots) {
      expect(DateTime.fromISO(slot.isoStart).toMillis()).toBeGreaterThan(now.toMillis());
    }
  });
});

describe('AvailabilityService.book', () => {
  it('creates a one-hour event at the slot start', async () => {
    const { svc, calendar } = service(at('2026-10-19T08:00:00'));

    await svc.book(calendarSettings(), '2026-10-20T11:00:00-03:00', {
      name: 'Ana',
      phone: '5491100000000',
    });

    expect(calendar.inserted).toEqual([
      {
        calendarId: 'test-calendar',
        event: {
          summary: 'Turno: Ana',
          description: 'Tel: 5491100000000',
          start: '2026-10-20T11:00:00-03:00',
          end: '2026-10-20T12:00:00-03:00',
        },
      },
    ]);
  });

  it.each(['mañana a las 10', '2026-10-20T11:00:00', '2026-13-40T11:00:00-03:00'])(
    'rejects the malformed timestamp %j without booking',
    async (iso) => {
      const { svc, calendar } = service(at('2026-10-19T08:00:00'));
      await expect(svc.book(calendarSettings(), iso, { name: 'Ana', phone: '1' })).rejects.toBeInstanceOf(
        ParseError,
      );
      expect(calendar.inserted).toEqual([]);
    },
  );

  it('checks the slot hour against the calendar right before booking', async () => {
    const { svc, calendar } = service(at('2026-10-19T08:00:00'));

    await svc.book(calendarSettings(), '2026-10-20T11:00:00-03:00', { name: 'Ana', phone: '1' });

    expect(calendar.queries).toHaveLength(1);
    expect(calendar.queries[0].timeMin.toISO()).toBe('2026-10-20T11:00:00.000-03:00');
    expect(calendar.queries[0].timeMax.toISO()).toBe('2026-10-20T12:00:00.000-03:00');
  });

  it('refuses a slot taken since it was offered', async () => {
    const calendar = new FakeCalendarClient([busy('2026-10-20T11:30:00', '2026-10-20T12:30:00')]);
    const { svc } = service(at('2026-10-19T08:00:00'), calendar);

    await expect(
      svc.book(calendarSettings(), '2026-10-20T11:00:00-03:00', { name: 'Ana', phone: '1' }),
    ).rejects.toBeInstanceOf(ConflictError);
    expect(calendar.inserted).toEqual([]);
  });

  it('refuses a slot that is no longer in the future', async () => {
    const { svc, calendar } = service(at('2026-10-20T11:00:00'));

    await expect(
      svc.book(calendarSettings(), '2026-10-20T11:00:00-03:00', { name: 'Ana', phone: '1' }),
    ).rejects.toThrow('slot 2026-10-20T11:00:00-03:00 is no longer in the future');
    expect(calendar.queries).toEqual([]);
    expect(calendar.inserted).toEqual([]);
  });

  it('propagates calendar failures unchanged', async () => {
    const calendar = new FakeCalendarClient();
    const failure = new Error('quota exceeded');
    calendar.insertError = failure;
    const { svc } = service(at('2026-10-19T08:00:00'), calendar);

    await expect(
      svc.book(calendarSettings(), '2026-10-20T11:00:00-03:00', { name: 'Ana', phone: '1' }),
    ).rejects.toBe(failure);
  });
});
