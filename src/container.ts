import { config } from '@config/env.config.js';
import type { CalendarClient } from '@core/interfaces/calendar.types.js';
import type { ChannelFactory } from '@core/interfaces/messaging.types.js';
import {
  FileCalendarConfigRepository,
  type CalendarSettingsSource,
} from '@core/repositories/calendar-config.repo.js';
import { FileFlowRepository, type FlowSource } from '@core/repositories/flow.repo.js';
import { GoogleCalendarClient } from '@infra/google/calendar.client.js';
import { AvailabilityService } from '@services/booking/availability.service.js';
import { FlowConfigCache, FlowResolver } from '@services/cache/flow-config-cache.js';
import { ConversationService } from '@services/conversation/conversation.service.js';
import { Renderer } from '@services/conversation/renderer.js';
import { SessionStore } from '@services/conversation/session.store.js';
import { FlowStateMachine } from '@services/conversation/state-machine.js';
import { WhatsAppService } from '@services/messaging/whatsapp.service.js';
import { TenantResolver } from '@services/tenant/tenant.resolver.js';

export interface ContainerOverrides {
  flowSource?: FlowSource;
  calendars?: CalendarSettingsSource;
  calendarClient?: CalendarClient;
  channels?: ChannelFactory;
  tenants?: TenantResolver;
  sessions?: SessionStore;
}

export interface Container {
  tenants: TenantResolver;
  sessions: SessionStore;
  flows: FlowResolver;
  availability: AvailabilityService;
  calendars: CalendarSettingsSource;
  conversation: ConversationService;
}

export function buildContainer(overrides: ContainerOverrides = {}): Container {
  const tenants = overrides.tenants ?? TenantResolver.fromConfig();
  const sessions =
    overrides.sessions ?? new SessionStore({ idleTtlMs: config.SESSION_IDLE_TTL_MINUTES * 60_000 });
  const flows = new FlowResolver(new FlowConfigCache(), overrides.flowSource ?? new FileFlowRepository());
  const calendars = overrides.calendars ?? new FileCalendarConfigRepository();
  const availability = new AvailabilityService(overrides.calendarClient ?? new GoogleCalendarClient());

  const conversation = new ConversationService({
    tenants,
    sessions,
    flows,
    machine: new FlowStateMachine(flows),
    renderer: new Renderer(flows),
    availability,
    calendars,
    channels: overrides.channels ?? ((phoneNumberId) => WhatsAppService.forPhoneNumber(phoneNumberId)),
    fallbackContactName: config.FALLBACK_CONTACT_NAME,
  });

  return { tenants, sessions, flows, availability, calendars, conversation };
}
