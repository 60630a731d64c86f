interface BasePayload {
  messaging_product: 'whatsapp';
  recipient_type: 'individual';
  to: string;
}

export interface TextPayload extends BasePayload {
  type: 'text';
  text: { body: string; preview_url: false };
}

export interface ListRowPayload {
  id: string;
  title: string;
  description?: string;
}

export interface ListSectionPayload {
  title: string;
  rows: ListRowPayload[];
}

export interface InteractiveListPayload extends BasePayload {
  type: 'interactive';
  interactive: {
    type: 'list';
    header?: { type: 'text'; text: string };
    body: { text: string };
    footer?: { text: string };
    action: { button: string; sections: ListSectionPayload[] };
  };
}

export type OutboundPayload = TextPayload | InteractiveListPayload;
