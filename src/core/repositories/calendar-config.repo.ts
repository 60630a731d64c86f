import { readFile } from 'node:fs/promises';

import { z } from 'zod';

import { config } from '@config/env.config.js';
import { readCalendarSettings } from '@services/booking/config.defaults.js';

import { ConfigurationError } from '../errors/index.js';
import type { CalendarSettings } from '../interfaces/calendar.types.js';

import { tenantConfigPath } from './flow.repo.js';

export const CalendarFileSchema = z.object({
  calendar_id: z.string().optional(),
  start_hour: z.number().int().optional(),
  end_hour: z.number().int().optional(),
  work_days: z.array(z.number().int()).optional(),
  timezone: z.string().optional(),
  locale: z.string().optional(),
  event_title: z.string().optional(),
  event_description: z.string().optional(),
});

export type CalendarFile = z.infer<typeof CalendarFileSchema>;

export interface CalendarSettingsSource {
  load(tenant: string): Promise<CalendarSettings>;
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * Reads `<root>/<tenant>/calendar.json`. Without the file, the calendar id
 * comes from GOOGLE_CALENDAR_ID and everything else from defaults.
 */
export class FileCalendarConfigRepository implements CalendarSettingsSource {
  constructor(
    private readonly root = config.CONFIG_ROOT,
    private readonly fallbackCalendarId = config.GOOGLE_CALENDAR_ID,
  ) {}

  async load(tenant: string): Promise<CalendarSettings> {
    const file = tenantConfigPath(this.root, tenant, 'calendar.json');

    let parsed: CalendarFile = { calendar_id: this.fallbackCalendarId };
    try {
      const raw = await readFile(file, 'utf8');
      const result = CalendarFileSchema.safeParse(JSON.parse(raw));
      if (!result.success) {
        const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
        throw new ConfigurationError(`invalid calendar config ${file}: ${issues.join('; ')}`);
      }
      parsed = { ...result.data, calendar_id: result.data.calendar_id || this.fallbackCalendarId };
    } catch (err) {
      if (err instanceof ConfigurationError) throw err;
      if (!isMissingFile(err)) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new ConfigurationError(`cannot read ${file}: ${reason}`);
      }
    }

    if (!parsed.calendar_id) {
      throw new ConfigurationError(`no calendar_id configured for tenant ${tenant}`);
    }
    return readCalendarSettings({ ...parsed, calendar_id: parsed.calendar_id });
  }
}
