import type { ListSection } from './flow.types.js';

export interface TextMessage {
  kind: 'text';
  id: string;
  from: string;
  body: string;
}

export interface SelectionMessage {
  kind: 'selection';
  id: string;
  from: string;
  source: 'list' | 'button';
  selectionId: string;
  title: string;
}

export interface UnsupportedMessage {
  kind: 'unsupported';
  id: string;
  from: string;
  type: string;
}

export type InboundMessage = TextMessage | SelectionMessage | UnsupportedMessage;

/** One message of a webhook delivery, with the context it arrived in. */
export interface InboundEvent {
  channelAccountId: string;
  contactName?: string;
  message: InboundMessage;
}

export interface MessagingChannel {
  sendText(to: string, body: string): Promise<void>;
  sendInteractiveList(
    to: string,
    header: string,
    body: string,
    footer: string,
    buttonText: string,
    sections: ListSection[],
  ): Promise<void>;
}

export type ChannelFactory = (channelAccountId: string) => MessagingChannel;
