import { ConflictError } from '@core/errors/index.js';
import type { Slot } from '@core/interfaces/calendar.types.js';
import {
  DEFAULT_SLOTS_SECTION_TITLE,
  INITIAL_STATE,
  type InteractiveListState,
  type StateName,
} from '@core/interfaces/flow.types.js';
import type {
  ChannelFactory,
  InboundEvent,
  InboundMessage,
  MessagingChannel,
} from '@core/interfaces/messaging.types.js';
import type { CalendarSettingsSource } from '@core/repositories/calendar-config.repo.js';
import type { AvailabilityService } from '@services/booking/availability.service.js';
import type { FlowResolver } from '@services/cache/flow-config-cache.js';
import type { TenantResolver } from '@services/tenant/tenant.resolver.js';
import { logger } from '@utils/logger.js';

import type { RenderExtras, Renderer } from './renderer.js';
import type { SessionStore } from './session.store.js';
import type { FlowStateMachine } from './state-machine.js';
import { sessionKey, type Session } from './state.types.js';

export const GENERIC_ERROR_TEXT = 'Perdón, hubo un error. Probá de nuevo.';
export const RENDER_ERROR_TEXT = 'Perdón, hubo un problema mostrando el menú.';

export interface ConversationDeps {
  tenants: TenantResolver;
  sessions: SessionStore;
  flows: FlowResolver;
  machine: FlowStateMachine;
  renderer: Renderer;
  availability: AvailabilityService;
  calendars: CalendarSettingsSource;
  channels: ChannelFactory;
  fallbackContactName: string;
  now?: () => Date;
}

interface Step {
  next: StateName;
  offeredSlots?: Slot[];
  extras?: RenderExtras;
}

/**
 * Runs one inbound message through tenant resolution, the flow state machine,
 * scheduling actions and rendering. Never rejects: failures are logged and
 * answered with an apology text.
 */
export class ConversationService {
  private readonly now: () => Date;

  constructor(private readonly deps: ConversationDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  async handleInbound(event: InboundEvent): Promise<void> {
    const { message } = event;
    const tenant = this.deps.tenants.resolve(event.channelAccountId);
    const user = message.from;
    const key = sessionKey(tenant, user);
    const contactName = event.contactName?.trim() ?? '';
    const vars: Record<string, string> = { name: contactName || this.deps.fallbackContactName };

    let session = await this.deps.sessions.get(key);
    if (!session || !session.state) {
      session = { state: INITIAL_STATE, updatedAt: this.now() };
      await this.deps.sessions.set(key, session);
    }

    logger.info('[conversation] inbound message', {
      tenant,
      user,
      state: session.state,
      kind: message.kind,
    });

    let channel: MessagingChannel;
    try {
      channel = this.deps.channels(event.channelAccountId);
    } catch (err) {
      logger.error('[conversation] messaging channel unavailable', { tenant, err });
      return;
    }

    let step: Step;
    try {
      const decision = await this.deps.machine.decide(tenant, session.state, message);
      const next = decision.handled ? decision.next : INITIAL_STATE;
      step = await this.runAction(tenant, next, message, session, {
        name: contactName || user,
        vars,
      });
    } catch (err) {
      logger.error('[conversation] failed to process message', { tenant, user, err });
      await this.sendFallback(channel, user, GENERIC_ERROR_TEXT);
      return;
    }

    await this.deps.sessions.set(key, {
      state: step.next,
      updatedAt: this.now(),
      offeredSlots: step.offeredSlots,
    });

    try {
      await this.deps.renderer.renderAndSend(tenant, step.next, channel, user, vars, step.extras);
    } catch (err) {
      logger.error('[conversation] failed to render state', { tenant, user, state: step.next, err });
      await this.sendFallback(channel, user, RENDER_ERROR_TEXT);
    }
  }

  private async runAction(
    tenant: string,
    next: StateName,
    message: InboundMessage,
    session: Session,
    contact: { name: string; vars: Record<string, string> },
  ): Promise<Step> {
    const flow = await this.deps.flows.resolve(tenant);
    const state = flow.states.get(next);
    if (!state?.action) {
      return { next, offeredSlots: session.offeredSlots };
    }

    if (state.action === 'book_slot') {
      const slot =
        message.kind === 'selection'
          ? session.offeredSlots?.find((s) => s.id === message.selectionId)
          : undefined;
      if (!slot) {
        logger.warn('[conversation] no offered slot matches selection, resetting', { tenant, state: next });
        return { next: INITIAL_STATE };
      }
      const settings = await this.deps.calendars.load(tenant);
      try {
        await this.deps.availability.book(settings, slot.isoStart, {
          name: contact.name,
          phone: message.from,
        });
      } catch (err) {
        if (!(err instanceof ConflictError)) throw err;
        logger.warn('[conversation] offered slot no longer bookable, offering again', {
          tenant,
          slot: slot.isoStart,
          reason: err.message,
        });
        const origin = flow.states.get(session.state);
        if (origin?.type === 'interactive_list' && origin.action === 'offer_slots') {
          return this.offerSlots(tenant, session.state, origin);
        }
        return { next: INITIAL_STATE };
      }
      contact.vars.slot = slot.label;
      return { next };
    }

    if (state.type !== 'interactive_list') {
      return { next, offeredSlots: session.offeredSlots };
    }
    return this.offerSlots(tenant, next, state);
  }

  private async offerSlots(tenant: string, name: StateName, state: InteractiveListState): Promise<Step> {
    const settings = await this.deps.calendars.load(tenant);
    const slots = await this.deps.availability.availableSlots(settings);
    if (slots.length === 0) {
      logger.info('[conversation] no free slots', { tenant, state: name });
      return { next: state.noSlotsNext ?? INITIAL_STATE };
    }
    return {
      next: name,
      offeredSlots: slots,
      extras: {
        sections: [
          {
            title: state.slotsSectionTitle ?? DEFAULT_SLOTS_SECTION_TITLE,
            rows: slots.map((s) => ({ id: s.id, title: s.label, description: '' })),
          },
        ],
      },
    };
  }

  private async sendFallback(channel: MessagingChannel, to: string, text: string): Promise<void> {
    try {
      await channel.sendText(to, text);
    } catch (err) {
      logger.error('[conversation] fallback send failed', { to, err });
    }
  }
}
