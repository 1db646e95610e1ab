import { Request, Response } from 'express';
import logger from '../config/logger';
import { InboundEvent, MessageTransport } from '../types/conversation';
import { errorMessage } from '../utils/AppError';
import { maskPhone } from '../utils/phoneNormalizer';
import { WaMessage, WaWebhookPayload } from '../types/whatsapp';

export interface InboundEventHandler {
  handleEvent(event: InboundEvent): Promise<void>;
}

function isWebhookPayload(body: unknown): body is WaWebhookPayload {
  return typeof body === 'object' && body !== null && 'entry' in body && Array.isArray(body.entry);
}

/**
 * Maps one WhatsApp message to an engine event. Button and list replies
 * both carry the tapped option id. Other message types map to null.
 */
export function toInboundEvent(message: WaMessage): InboundEvent | null {
  const base = { senderId: message.from, messageId: message.id };

  if (message.type === 'text' && message.text) {
    return { ...base, kind: 'text', payload: message.text.body };
  }

  if (message.type === 'interactive' && message.interactive) {
    const reply = message.interactive.button_reply ?? message.interactive.list_reply;
    return reply ? { ...base, kind: 'button_reply', payload: reply.id } : null;
  }

  // Quick-reply buttons on template messages
  if (message.type === 'button' && message.button) {
    return { ...base, kind: 'button_reply', payload: message.button.payload || message.button.text };
  }

  return null;
}

/**
 * Flattens a webhook delivery into engine events, skipping status updates
 */
export function extractEvents(payload: WaWebhookPayload): InboundEvent[] {
  const events: InboundEvent[] = [];
  for (const entry of payload.entry) {
    for (const change of entry.changes ?? []) {
      for (const message of change.value?.messages ?? []) {
        const event = toInboundEvent(message);
        if (event) {
          events.push(event);
        } else {
          logger.info(`Ignoring unsupported WhatsApp message type: ${message.type}`, { messageId: message.id });
        }
      }
    }
  }
  return events;
}

/**
 * WhatsAppController handles webhook verification and incoming messages
 */
export class WhatsAppController {
  constructor(
    private readonly handler: InboundEventHandler,
    private readonly transport: Pick<MessageTransport, 'markAsRead'>,
    private readonly verifyToken: string
  ) {}

  /**
   * Verifies the webhook with Meta
   * GET /webhook?hub.mode=subscribe&hub.verify_token=...&hub.challenge=...
   */
  verifyWebhook(req: Request, res: Response): void {
    const mode = req.query['hub.mode'];
    const token = req.query['hub.verify_token'];
    const challenge = req.query['hub.challenge'];

    logger.info('Webhook verification attempt:', {
      mode,
      verifyToken: token ? '***' : 'missing',
      challenge: challenge ? 'present' : 'missing',
    });

    // Meta requires: mode === 'subscribe' AND verify_token matches
    if (mode === 'subscribe' && this.verifyToken.length > 0 && token === this.verifyToken && typeof challenge === 'string') {
      logger.info('Webhook verification: Success');
      res.status(200).send(challenge);
      return;
    }

    logger.warn('Webhook verification: Failed - Invalid token or mode');
    res.status(403).send('Forbidden');
  }

  /**
   * Receives incoming webhooks from Meta
   * POST /webhook
   */
  async receiveWebhook(req: Request, res: Response): Promise<void> {
    // Always return 200 OK immediately (Meta requirement)
    res.status(200).send('OK');

    if (!isWebhookPayload(req.body)) {
      logger.warn('WhatsApp webhook: Invalid payload structure (no entries)');
      return;
    }

    const events = extractEvents(req.body);
    if (events.length === 0) {
      logger.debug('WhatsApp webhook: no messages (status update)');
      return;
    }

    for (const event of events) {
      logger.info('WhatsApp message received:', {
        messageId: event.messageId,
        from: maskPhone(event.senderId),
        kind: event.kind,
      });

      if (event.messageId) {
        await this.transport.markAsRead(event.messageId);
      }

      try {
        await this.handler.handleEvent(event);
      } catch (error) {
        logger.error('WhatsApp webhook processing error:', {
          messageId: event.messageId,
          error: errorMessage(error),
        });
      }
    }
  }
}
