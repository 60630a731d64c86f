import type { InboundMessage } from '@core/interfaces/messaging.types.js';
import { INITIAL_STATE, type StateName } from '@core/interfaces/flow.types.js';
import type { FlowResolver } from '@services/cache/flow-config-cache.js';
import { logger } from '@utils/logger.js';

import type { Decision } from './state.types.js';

const MENU_KEYWORD = 'menu';

const reset = (): Decision => ({ next: INITIAL_STATE, handled: false });

export class FlowStateMachine {
  constructor(private readonly flows: FlowResolver) {}

  /**
   * Decides the next state for an inbound message. Rejects only when the
   * tenant's flow cannot be loaded; input that does not fit the current
   * state resolves to the menu with `handled: false`.
   */
  async decide(tenant: string, current: StateName, message: InboundMessage): Promise<Decision> {
    const flow = await this.flows.resolve(tenant);

    const state = flow.states.get(current);
    if (!state) {
      logger.warn('[flow] unknown current state, resetting', { tenant, state: current });
      return reset();
    }

    switch (message.kind) {
      case 'text': {
        const text = message.body.trim();
        if (text.toLowerCase() === MENU_KEYWORD) {
          return { next: INITIAL_STATE, handled: true };
        }
        if (state.onTextNext) {
          return { next: state.onTextNext, handled: true };
        }
        return reset();
      }

      case 'selection': {
        if (state.type !== 'interactive_list') return reset();
        const next = state.onSelectNext[message.selectionId];
        if (next && Object.hasOwn(state.onSelectNext, message.selectionId)) {
          return { next, handled: true };
        }
        return reset();
      }

      default:
        return reset();
    }
  }
}
