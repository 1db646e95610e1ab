/**
 * Engine-facing message types. The webhook controller maps WhatsApp payloads
 * into InboundEvent and the transport turns OutboundInstruction into API calls.
 */

export type InboundKind = 'text' | 'button_reply';

export interface InboundEvent {
  senderId: string;
  kind: InboundKind;
  payload: string;
  messageId?: string;
}

export interface MenuOption {
  id: string;
  title: string;
  description?: string;
}

export interface TextContent {
  body: string;
}

export interface ButtonMenuContent {
  body: string;
  /** Label of the list opener when the menu is sent as a list */
  buttonText: string;
  options: MenuOption[];
}

export interface DocumentLinkContent {
  url: string;
  caption: string;
}

export type OutboundMessage =
  | { kind: 'text'; content: TextContent }
  | { kind: 'button_menu'; content: ButtonMenuContent }
  | { kind: 'document_link'; content: DocumentLinkContent };

export type OutboundInstruction = OutboundMessage & { recipientId: string };

/**
 * Outbound collaborator. Delivery and retry belong to the provider.
 */
export interface MessageTransport {
  deliver(instruction: OutboundInstruction): Promise<void>;
  markAsRead(messageId: string): Promise<void>;
}
