import axios from 'axios';
import { extractEvents, toInboundEvent } from '../controllers/whatsapp.controller';
import { WhatsAppService } from '../services/whatsapp.service';
import { OutboundInstruction } from '../types/conversation';
import { WaMessage, WaWebhookPayload } from '../types/whatsapp';
import { AppError } from '../utils/AppError';

const CREDENTIALS = { apiVersion: 'v18.0', phoneNumberId: 'test-phone-id', accessToken: 'test-secret' };

function message(overrides: Partial<WaMessage>): WaMessage {
  return { from: '923001234567', id: 'wamid.test', timestamp: '1767261600', type: 'text', ...overrides };
}

describe('toInboundEvent', () => {
  it('maps text messages', () => {
    expect(toInboundEvent(message({ text: { body: 'Book' } }))).toEqual({
      senderId: '923001234567',
      messageId: 'wamid.test',
      kind: 'text',
      payload: 'Book',
    });
  });

  it('maps list and button replies to the tapped id', () => {
    expect(
      toInboundEvent(
        message({ type: 'interactive', interactive: { type: 'list_reply', list_reply: { id: 'route_multan', title: 'Multan' } } })
      )
    ).toMatchObject({ kind: 'button_reply', payload: 'route_multan' });
    expect(
      toInboundEvent(
        message({ type: 'interactive', interactive: { type: 'button_reply', button_reply: { id: 'faq', title: 'FAQ' } } })
      )
    ).toMatchObject({ kind: 'button_reply', payload: 'faq' });
  });

  it('ignores media', () => {
    expect(toInboundEvent(message({ type: 'image' }))).toBeNull();
  });
});

describe('extractEvents', () => {
  const metadata = { display_phone_number: '15550000000', phone_number_id: 'test-phone-id' };

  it('returns every message in the delivery', () => {
    const payload: WaWebhookPayload = {
      object: 'whatsapp_business_account',
      entry: [
        {
          id: 'entry-1',
          changes: [
            {
              field: 'messages',
              value: {
                messaging_product: 'whatsapp',
                metadata,
                messages: [message({ id: 'wamid.1', text: { body: 'hi' } }), message({ id: 'wamid.2', type: 'audio' })],
              },
            },
          ],
        },
      ],
    };

    expect(extractEvents(payload).map((event) => event.messageId)).toEqual(['wamid.1']);
  });

  it('skips status updates', () => {
    const payload: WaWebhookPayload = {
      object: 'whatsapp_business_account',
      entry: [
        {
          id: 'entry-1',
          changes: [
            {
              field: 'messages',
              value: {
                messaging_product: 'whatsapp',
                metadata,
                statuses: [{ id: 'wamid.1', status: 'read', timestamp: '1767261600', recipient_id: '923001234567' }],
              },
            },
          ],
        },
      ],
    };

    expect(extractEvents(payload)).toEqual([]);
  });
});

describe('WhatsAppService', () => {
  function createService(responseData: unknown = { messages: [{ id: 'wamid.sent' }] }) {
    const sent: unknown[] = [];
    const http = axios.create({
      adapter: async (config) => {
        sent.push(JSON.parse(config.data));
        return { data: responseData, status: 200, statusText: 'OK', headers: {}, config };
      },
    });
    return { service: new WhatsAppService(CREDENTIALS, http), sent };
  }

  const recipientId = '03001234567';

  it('sends short menus as reply buttons with normalized recipients', async () => {
    const { service, sent } = createService();
    const instruction: OutboundInstruction = {
      recipientId,
      kind: 'button_menu',
      content: {
        body: 'Pick one',
        buttonText: 'Select',
        options: [
          { id: 'confirm_booking', title: '✅ Confirm & Pay' },
          { id: 'cancel_booking', title: 'Cancel this booking please' },
        ],
      },
    };

    await service.deliver(instruction);

    expect(sent).toEqual([
      {
        messaging_product: 'whatsapp',
        to: '923001234567',
        type: 'interactive',
        interactive: {
          type: 'button',
          body: { text: 'Pick one' },
          action: {
            buttons: [
              { type: 'reply', reply: { id: 'confirm_booking', title: '✅ Confirm & Pay' } },
              { type: 'reply', reply: { id: 'cancel_booking', title: 'Cancel this booki...' } },
            ],
          },
        },
      },
    ]);
  });

  it('sends longer menus as a list', async () => {
    const { service, sent } = createService();

    await service.deliver({
      recipientId,
      kind: 'button_menu',
      content: {
        body: 'Routes',
        buttonText: 'Select Route',
        options: ['a', 'b', 'c', 'd'].map((id) => ({ id, title: id.toUpperCase() })),
      },
    });

    expect(sent[0]).toMatchObject({
      type: 'interactive',
      interactive: {
        type: 'list',
        action: {
          button: 'Select Route',
          sections: [
            {
              title: 'Options',
              rows: [
                { id: 'a', title: 'A', description: '' },
                { id: 'b', title: 'B', description: '' },
                { id: 'c', title: 'C', description: '' },
                { id: 'd', title: 'D', description: '' },
              ],
            },
          ],
        },
      },
    });
  });

  it('sends document links as previewed text', async () => {
    const { service, sent } = createService();

    await service.deliver({
      recipientId,
      kind: 'document_link',
      content: { url: 'https://example.com/upload/BK-0000ABCD', caption: 'Upload here' },
    });

    expect(sent).toEqual([
      {
        messaging_product: 'whatsapp',
        to: '923001234567',
        type: 'text',
        text: { body: 'Upload here\n\n🔗 https://example.com/upload/BK-0000ABCD', preview_url: true },
      },
    ]);
  });

  it('fails when the API returns no message id', async () => {
    const { service } = createService({});

    const delivery = service.deliver({ recipientId, kind: 'text', content: { body: 'hello' } });

    await expect(delivery).rejects.toBeInstanceOf(AppError);
    await expect(delivery).rejects.toThrow('WhatsApp API returned no message ID');
  });

  it('refuses to send without credentials', async () => {
    const service = new WhatsAppService({ ...CREDENTIALS, accessToken: '' });

    await expect(service.deliver({ recipientId, kind: 'text', content: { body: 'hello' } })).rejects.toThrow(
      'WhatsApp credentials not configured'
    );
  });

  it('only logs a failed read receipt', async () => {
    const service = new WhatsAppService({ ...CREDENTIALS, accessToken: '' });

    await expect(service.markAsRead('wamid.test')).resolves.toBeUndefined();
  });
});
