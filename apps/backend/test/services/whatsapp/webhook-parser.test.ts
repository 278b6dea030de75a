import { parseWebhookPayload } from '../../../src/services/whatsapp/webhook-parser';

const delivery = (message: Record<string, unknown>) => ({
  object: 'whatsapp_business_account',
  entry: [
    {
      id: 'waba-1',
      changes: [{ field: 'messages', value: { messaging_product: 'whatsapp', messages: [message] } }]
    }
  ]
});

describe('parseWebhookPayload', () => {
  it('parses text messages', () => {
    expect(
      parseWebhookPayload(delivery({ id: 'wamid.1', from: '15551234567', type: 'text', text: { body: 'hi' } }))
    ).toEqual({ type: 'text', from: '15551234567', body: 'hi', messageId: 'wamid.1' });
  });

  it('parses images with captions', () => {
    expect(
      parseWebhookPayload(
        delivery({
          id: 'wamid.2',
          from: '15551234567',
          type: 'image',
          image: { id: 'media-1', caption: 'Lamp $20', mime_type: 'image/jpeg' }
        })
      )
    ).toEqual({ type: 'image', from: '15551234567', mediaRef: 'media-1', caption: 'Lamp $20', messageId: 'wamid.2' });
  });

  it('parses button and list replies', () => {
    const button = parseWebhookPayload(
      delivery({
        from: '15551234567',
        type: 'interactive',
        interactive: { type: 'button_reply', button_reply: { id: 'confirm_add_1', title: '✅ Add' } }
      })
    );
    const list = parseWebhookPayload(
      delivery({
        from: '15551234567',
        type: 'interactive',
        interactive: { type: 'list_reply', list_reply: { id: 'cancel_add_1' } }
      })
    );

    expect(button).toEqual({ type: 'button_tap', from: '15551234567', buttonId: 'confirm_add_1', messageId: undefined });
    expect(list).toMatchObject({ type: 'button_tap', buttonId: 'cancel_add_1' });
  });

  it('ignores status updates', () => {
    expect(
      parseWebhookPayload({
        entry: [{ changes: [{ value: { statuses: [{ id: 'wamid.1', status: 'delivered' }] } }] }]
      })
    ).toBeNull();
  });

  it('ignores unsupported message types and malformed bodies', () => {
    expect(parseWebhookPayload(delivery({ from: '15551234567', type: 'sticker' }))).toBeNull();
    expect(parseWebhookPayload({ entry: 'nope' })).toBeNull();
    expect(parseWebhookPayload(null)).toBeNull();
    expect(parseWebhookPayload({})).toBeNull();
  });
});
