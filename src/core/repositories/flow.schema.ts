import { z } from 'zod';

import type {
  FlowDefinition,
  FlowState,
  InteractiveListState,
  StateName,
} from '../interfaces/flow.types.js';
import { DEFAULT_SLOTS_SECTION_TITLE, INITIAL_STATE } from '../interfaces/flow.types.js';

/** Presentation limits of WhatsApp interactive list messages, in characters. */
export const LIST_LIMITS = {
  header: 60,
  footer: 60,
  buttonText: 20,
  sectionTitle: 24,
  rowTitle: 24,
  rowDescription: 72,
} as const;

const text = z.string().default('');

const RowSchema = z.object({
  id: text,
  title: text,
  description: text,
});

const SectionSchema = z.object({
  title: text,
  rows: z.array(RowSchema).default([]),
});

const ListSchema = z.object({
  header: text,
  footer: text,
  button_text: text,
  sections: z.array(SectionSchema).default([]),
});

const ActionSchema = z.enum(['offer_slots', 'book_slot']);

const TextStateSchema = z.object({
  type: z.literal('text'),
  body: text,
  on_text_next: z.string().optional(),
  action: ActionSchema.optional(),
});

const ListStateSchema = z.object({
  type: z.literal('interactive_list'),
  body: text,
  list: ListSchema,
  on_select_next: z.record(z.string()).default({}),
  on_text_next: z.string().optional(),
  action: ActionSchema.optional(),
  slots_section_title: z.string().optional(),
  no_slots_next: z.string().optional(),
});

type RawState = z.infer<typeof TextStateSchema> | z.infer<typeof ListStateSchema>;

function toFlowState(s: RawState): FlowState {
  if (s.type === 'text') {
    return {
      type: 'text',
      body: s.body,
      onTextNext: s.on_text_next || undefined,
      action: s.action,
    };
  }
  return {
    type: 'interactive_list',
    body: s.body,
    list: {
      header: s.list.header,
      footer: s.list.footer,
      buttonText: s.list.button_text,
      sections: s.list.sections,
    },
    onSelectNext: Object.fromEntries(
      Object.entries(s.on_select_next).filter(([, next]) => next !== ''),
    ),
    onTextNext: s.on_text_next || undefined,
    action: s.action,
    slotsSectionTitle: s.slots_section_title,
    noSlotsNext: s.no_slots_next || undefined,
  };
}

const StateSchema = z
  .discriminatedUnion('type', [TextStateSchema, ListStateSchema])
  .transform(toFlowState);

const FlowFileSchema = z.object({
  version: z.union([z.string(), z.number()]).transform(String).default(''),
  states: z.record(z.unknown()),
});

export interface ParsedFlow {
  definition: FlowDefinition;
  /** Problems that do not block the load, such as dangling transitions. */
  warnings: string[];
}

export type ParseFlowResult =
  | ({ ok: true } & ParsedFlow)
  | { ok: false; issues: string[] };

const charCount = (s: string): number => Array.from(s).length;

function checkListLimits(stateName: StateName, state: InteractiveListState): string[] {
  const errs: string[] = [];
  const over = (field: string, value: string, limit: number) => {
    const n = charCount(value);
    if (n > limit) {
      errs.push(`state=${stateName} ${field} > ${limit} (${n}): ${JSON.stringify(value)}`);
    }
  };

  const { list } = state;
  over('header', list.header, LIST_LIMITS.header);
  over('footer', list.footer, LIST_LIMITS.footer);
  over('button_text', list.buttonText, LIST_LIMITS.buttonText);

  list.sections.forEach((section, si) => {
    over(`sections[${si}].title`, section.title, LIST_LIMITS.sectionTitle);
    section.rows.forEach((row, ri) => {
      const where = `sections[${si}].rows[${ri}]`;
      if (row.id.trim() === '') {
        errs.push(`state=${stateName} ${where}.id is empty (title=${JSON.stringify(row.title)})`);
      }
      over(`${where}.title`, row.title, LIST_LIMITS.rowTitle);
      over(`${where}.description`, row.description, LIST_LIMITS.rowDescription);
    });
  });
  if (state.action === 'offer_slots') {
    over(
      'slots_section_title',
      state.slotsSectionTitle ?? DEFAULT_SLOTS_SECTION_TITLE,
      LIST_LIMITS.sectionTitle,
    );
  }
  return errs;
}

function transitionsOf(state: FlowState): StateName[] {
  if (state.type === 'text') return state.onTextNext ? [state.onTextNext] : [];
  const targets = Object.values(state.onSelectNext);
  if (state.onTextNext) targets.push(state.onTextNext);
  if (state.noSlotsNext) targets.push(state.noSlotsNext);
  return targets;
}

/**
 * Parses and validates a raw flow document. Every problem found is reported,
 * not only the first one.
 */
export function parseFlowDefinition(raw: unknown): ParseFlowResult {
  const file = FlowFileSchema.safeParse(raw);
  if (!file.success) {
    return {
      ok: false,
      issues: file.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`),
    };
  }

  const issues: string[] = [];
  const states = new Map<StateName, FlowState>();

  for (const [name, rawState] of Object.entries(file.data.states)) {
    const parsed = StateSchema.safeParse(rawState);
    if (!parsed.success) {
      for (const i of parsed.error.issues) {
        const field = i.path.length ? ` ${i.path.join('.')}` : '';
        issues.push(`state=${name}${field}: ${i.message}`);
      }
      continue;
    }
    const state = parsed.data;
    if (state.type === 'interactive_list') {
      issues.push(...checkListLimits(name, state));
    } else if (state.action === 'offer_slots') {
      issues.push(`state=${name} action offer_slots requires type interactive_list`);
    }
    states.set(name, state);
  }

  if (Object.keys(file.data.states).length === 0) {
    issues.push('flow has no states');
  }
  if (issues.length > 0) return { ok: false, issues };

  const warnings: string[] = [];
  if (!states.has(INITIAL_STATE)) {
    warnings.push(`initial state ${INITIAL_STATE} is not defined`);
  }
  for (const [name, state] of states) {
    for (const target of transitionsOf(state)) {
      if (!states.has(target)) {
        warnings.push(`state=${name} points at unknown state ${target}`);
      }
    }
  }

  return { ok: true, definition: { version: file.data.version, states }, warnings };
}
