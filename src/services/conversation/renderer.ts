import { NotFoundError, ValidationError } from '@core/errors/index.js';
import type {
  FlowState,
  ListSection,
  StateName,
  TemplateVariables,
} from '@core/interfaces/flow.types.js';
import type { MessagingChannel } from '@core/interfaces/messaging.types.js';
import type { FlowResolver } from '@services/cache/flow-config-cache.js';

import { renderVars } from './template.js';

export const DEFAULT_LIST_PROMPT = 'Elegí una opción:';

export interface RenderExtras {
  /** Rows computed at render time, appended after the state's own sections. */
  sections?: ListSection[];
}

function renderSections(sections: ListSection[], vars: TemplateVariables): ListSection[] {
  return sections.map((section) => ({
    title: renderVars(section.title, vars),
    rows: section.rows.map((row) => ({
      id: row.id,
      title: renderVars(row.title, vars),
      description: renderVars(row.description, vars),
    })),
  }));
}

export class Renderer {
  constructor(private readonly flows: FlowResolver) {}

  /**
   * Sends exactly one message for `stateName`: a text for text states, an
   * interactive list for list states. The state must exist.
   */
  async renderAndSend(
    tenant: string,
    stateName: StateName,
    channel: MessagingChannel,
    recipient: string,
    vars: TemplateVariables,
    extras: RenderExtras = {},
  ): Promise<void> {
    const flow = await this.flows.resolve(tenant);
    const state: FlowState | undefined = flow.states.get(stateName);
    if (!state) {
      throw new NotFoundError(`state does not exist: ${stateName} (tenant=${tenant})`);
    }

    switch (state.type) {
      case 'text':
        await channel.sendText(recipient, renderVars(state.body, vars));
        return;

      case 'interactive_list': {
        const body = state.body.trim() === '' ? DEFAULT_LIST_PROMPT : state.body.trim();
        const sections = renderSections([...state.list.sections, ...(extras.sections ?? [])], vars);
        await channel.sendInteractiveList(
          recipient,
          renderVars(state.list.header, vars),
          renderVars(body, vars),
          renderVars(state.list.footer, vars),
          renderVars(state.list.buttonText, vars),
          sections,
        );
        return;
      }

      default: {
        const unsupported: never = state;
        throw new ValidationError(`unsupported state type: ${JSON.stringify(unsupported)}`);
      }
    }
  }
}
