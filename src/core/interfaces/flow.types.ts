export type StateName = string;

export const INITIAL_STATE: StateName = 'MENU';

/** Title of the list section that carries offered slots when a state names none. */
export const DEFAULT_SLOTS_SECTION_TITLE = 'Turnos';

export interface ListRow {
  id: string;
  title: string;
  description: string;
}

export interface ListSection {
  title: string;
  rows: ListRow[];
}

export interface ListPresentation {
  header: string;
  footer: string;
  buttonText: string;
  sections: ListSection[];
}

/**
 * Side operations a state can ask for when the conversation enters it.
 * `offer_slots` lists bookable slots as extra rows; `book_slot` books the
 * slot the user just picked.
 */
export type FlowAction = 'offer_slots' | 'book_slot';

export interface TextState {
  type: 'text';
  body: string;
  onTextNext?: StateName;
  action?: FlowAction;
}

export interface InteractiveListState {
  type: 'interactive_list';
  body: string;
  list: ListPresentation;
  onSelectNext: Record<string, StateName>;
  onTextNext?: StateName;
  action?: FlowAction;
  slotsSectionTitle?: string;
  noSlotsNext?: StateName;
}

export type FlowState = TextState | InteractiveListState;

export interface FlowDefinition {
  version: string;
  states: ReadonlyMap<StateName, FlowState>;
}

export type TemplateVariables = Readonly<Record<string, string>>;
