import axios, { AxiosInstance } from 'axios';
import logger from '../config/logger';
import { MessageTransport, OutboundInstruction } from '../types/conversation';
import { AppError } from '../utils/AppError';
import { maskPhone, normalizePhoneNumber } from '../utils/phoneNormalizer';
import { truncate } from '../utils/format';
import {
  WaApiResponse,
  WaButton,
  WaErrorBody,
  WaListSection,
  WaOutboundPayload,
  WaServiceResponse,
} from '../types/whatsapp';

const MAX_BUTTONS = 3;
const MAX_LIST_ROWS = 10;

export interface WhatsAppCredentials {
  apiVersion: string;
  phoneNumberId: string;
  accessToken: string;
}

/**
 * WhatsAppService handles communication with WhatsApp Cloud API
 */
export class WhatsAppService implements MessageTransport {
  private readonly http: AxiosInstance;

  constructor(
    private readonly credentials: WhatsAppCredentials,
    http?: AxiosInstance
  ) {
    this.http =
      http ??
      axios.create({
        baseURL: `https://graph.facebook.com/${credentials.apiVersion}/${credentials.phoneNumberId}`,
        headers: {
          'Content-Type': 'application/json',
        },
      });
  }

  /**
   * Validates that required configuration is present
   * @throws AppError if configuration is missing
   */
  private validateConfig(): void {
    if (!this.credentials.phoneNumberId || !this.credentials.accessToken) {
      throw new AppError('WhatsApp credentials not configured. Set WA_PHONE_NUMBER_ID and WA_ACCESS_TOKEN', 500);
    }
  }

  /**
   * Sends a request to the messages endpoint and extracts Meta's error
   * details when it fails
   */
  private async sendRequest(payload: WaOutboundPayload): Promise<WaApiResponse> {
    try {
      const response = await this.http.post<WaApiResponse>('/messages', payload, {
        headers: {
          Authorization: `Bearer ${this.credentials.accessToken}`,
        },
      });
      return response.data;
    } catch (error) {
      if (axios.isAxiosError<WaErrorBody>(error)) {
        const metaError = error.response?.data?.error;
        if (metaError) {
          logger.error('WhatsApp API error details:', {
            code: metaError.code,
            type: metaError.type,
            message: metaError.message,
            subcode: metaError.error_subcode,
            fbtrace_id: metaError.fbtrace_id,
          });
          throw new AppError(
            `WhatsApp API error (${metaError.type ?? 'UNKNOWN'}): ${metaError.message ?? 'WhatsApp API error'}`,
            502
          );
        }
      }

      const message = error instanceof Error ? error.message : 'Unknown error';
      throw new AppError(`WhatsApp API request failed: ${message}`, 502);
    }
  }

  private async sendMessage(payload: WaOutboundPayload, what: string): Promise<WaServiceResponse> {
    this.validateConfig();
    const response = await this.sendRequest(payload);

    const messageId = response.messages?.[0]?.id;
    if (!messageId) {
      throw new AppError('WhatsApp API returned no message ID', 502);
    }
    logger.debug(`WhatsApp ${what} sent: messageId=${messageId}`);
    return { messageId };
  }

  /**
   * Sends a simple text message. With previewUrl the first link in the
   * body is rendered as a preview card.
   */
  async sendText(to: string, body: string, previewUrl = false): Promise<WaServiceResponse> {
    const normalizedTo = normalizePhoneNumber(to);
    return this.sendMessage(
      {
        messaging_product: 'whatsapp',
        to: normalizedTo,
        type: 'text',
        text: previewUrl ? { body, preview_url: true } : { body },
      },
      'text'
    );
  }

  /**
   * Sends an interactive message with reply buttons (max 3)
   */
  async sendButtons(to: string, body: string, buttons: WaButton[]): Promise<WaServiceResponse> {
    if (buttons.length === 0 || buttons.length > MAX_BUTTONS) {
      throw new AppError(`Between 1 and ${MAX_BUTTONS} buttons allowed, got ${buttons.length}`, 500);
    }

    return this.sendMessage(
      {
        messaging_product: 'whatsapp',
        to: normalizePhoneNumber(to),
        type: 'interactive',
        interactive: {
          type: 'button',
          body: { text: body },
          action: {
            buttons: buttons.map((button) => ({
              type: 'reply',
              // Button titles max 20 chars
              reply: { id: button.id, title: truncate(button.title, 20) },
            })),
          },
        },
      },
      'buttons'
    );
  }

  /**
   * Sends an interactive list (max 10 rows across all sections)
   */
  async sendList(to: string, body: string, buttonText: string, sections: WaListSection[]): Promise<WaServiceResponse> {
    const totalRows = sections.reduce((sum, section) => sum + section.rows.length, 0);
    if (totalRows === 0 || totalRows > MAX_LIST_ROWS) {
      throw new AppError(`Between 1 and ${MAX_LIST_ROWS} list rows allowed, got ${totalRows}`, 500);
    }

    // WhatsApp limits: section/row title 24 chars, description 72, button 20
    const formattedSections = sections.map((section) => ({
      title: truncate(section.title, 24),
      rows: section.rows.map((row) => ({
        id: row.id,
        title: truncate(row.title, 24),
        description: truncate(row.description ?? '', 72),
      })),
    }));

    return this.sendMessage(
      {
        messaging_product: 'whatsapp',
        to: normalizePhoneNumber(to),
        type: 'interactive',
        interactive: {
          type: 'list',
          body: { text: body },
          action: {
            button: truncate(buttonText, 20),
            sections: formattedSections,
          },
        },
      },
      'list'
    );
  }

  /**
   * Renders one engine instruction. Menus of up to three options become
   * reply buttons, longer ones a list.
   */
  async deliver(instruction: OutboundInstruction): Promise<void> {
    const to = instruction.recipientId;
    logger.info(`Delivering ${instruction.kind} to ${maskPhone(to)}`);

    switch (instruction.kind) {
      case 'text':
        await this.sendText(to, instruction.content.body);
        return;
      case 'button_menu': {
        const { body, buttonText, options } = instruction.content;
        if (options.length <= MAX_BUTTONS) {
          await this.sendButtons(to, body, options);
        } else {
          await this.sendList(to, body, buttonText, [{ title: 'Options', rows: options }]);
        }
        return;
      }
      case 'document_link': {
        const { caption, url } = instruction.content;
        await this.sendText(to, `${caption}\n\n🔗 ${url}`, true);
        return;
      }
    }
  }

  /**
   * Marks a message as read. Best effort: failures are only logged.
   */
  async markAsRead(messageId: string): Promise<void> {
    if (!this.credentials.phoneNumberId || !this.credentials.accessToken) {
      logger.warn('Cannot mark message as read: WhatsApp credentials not configured');
      return;
    }

    try {
      await this.sendRequest({ messaging_product: 'whatsapp', status: 'read', message_id: messageId });
      logger.debug(`WhatsApp message marked as read: messageId=${messageId}`);
    } catch (error) {
      logger.warn(`Failed to mark WhatsApp message as read: messageId=${messageId}`, {
        error: error instanceof Error ? error.message : 'Unknown error',
      });
    }
  }
}
