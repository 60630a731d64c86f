import { Router } from 'express';

import type { CalendarSettingsSource } from '@core/repositories/calendar-config.repo.js';
import type { AvailabilityService } from '@services/booking/availability.service.js';

export interface DevAvailabilityDeps {
  availability: AvailabilityService;
  calendars: CalendarSettingsSource;
}

/** GET /dev/tenants/:tenant/slots: the slots a user would be offered right now. */
export function createDevAvailabilityRoutes({ availability, calendars }: DevAvailabilityDeps): Router {
  const router = Router();
  router.get('/dev/tenants/:tenant/slots', async (req, res, next) => {
    try {
      const settings = await calendars.load(req.params.tenant);
      const slots = await availability.availableSlots(settings);
      res.json({ tenant: req.params.tenant, calendarId: settings.calendarId, slots });
    } catch (err) {
      next(err);
    }
  });
  return router;
}
