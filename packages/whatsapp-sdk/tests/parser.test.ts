import { describe, expect, it } from 'vitest';

import { PayloadError, parseUnixTime, parseWebhookPayload } from '../src/parser';

const BUSINESS_NUMBER_ID = '1234567890';

function buildPayload(value: Record<string, unknown>) {
  return {
    object: 'whatsapp_business_account',
    entry: [{ id: 'waba-1', changes: [{ field: 'messages', value }] }],
  };
}

function textMessagePayload(overrides: Record<string, unknown> = {}) {
  return buildPayload({
    messaging_product: 'whatsapp',
    metadata: { display_phone_number: '15550000000', phone_number_id: BUSINESS_NUMBER_ID },
    contacts: [{ wa_id: '15551234567', profile: { name: 'Test User' } }],
    messages: [
      {
        from: '15551234567',
        id: 'wamid.TEST1',
        timestamp: '1700000000',
        type: 'text',
        text: { body: 'Hello there' },
        ...overrides,
      },
    ],
  });
}

describe('parseWebhookPayload', () => {
  it('extracts a text message', () => {
    expect(parseWebhookPayload(textMessagePayload(), BUSINESS_NUMBER_ID)).toEqual({
      kind: 'message',
      isTargetBusinessNumber: true,
      isStatus: false,
      message: {
        senderPhone: '15551234567',
        messageId: 'wamid.TEST1',
        messageType: 'text',
        messageBody: { body: 'Hello there' },
        text: 'Hello there',
        messageUnixTime: 1700000000,
      },
    });
  });

  it('reports webhooks addressed to another business number', () => {
    const payload = buildPayload({ metadata: { phone_number_id: '999' }, messages: [] });

    expect(parseWebhookPayload(payload, BUSINESS_NUMBER_ID)).toEqual({
      kind: 'foreign',
      isTargetBusinessNumber: false,
      isStatus: false,
      phoneNumberId: '999',
    });
  });

  it('accepts a numeric phone_number_id', () => {
    const payload = buildPayload({
      metadata: { phone_number_id: Number(BUSINESS_NUMBER_ID) },
      statuses: [{ id: 'wamid.X', status: 'delivered' }],
    });

    expect(parseWebhookPayload(payload, BUSINESS_NUMBER_ID).kind).toBe('status');
  });

  it('flags status receipts', () => {
    const payload = buildPayload({
      metadata: { phone_number_id: BUSINESS_NUMBER_ID },
      statuses: [{ id: 'wamid.X', status: 'read' }],
    });

    expect(parseWebhookPayload(payload, BUSINESS_NUMBER_ID)).toEqual({
      kind: 'status',
      isTargetBusinessNumber: true,
      isStatus: true,
    });
  });

  it('maps a type without a matching key to errors', () => {
    const result = parseWebhookPayload(
      textMessagePayload({ type: 'unsupported', text: undefined, errors: [{ code: 131051 }] }),
      BUSINESS_NUMBER_ID,
    );

    expect(result.kind).toBe('message');
    if (result.kind === 'message') {
      expect(result.message.messageType).toBe('errors');
      expect(result.message.messageBody).toEqual([{ code: 131051 }]);
      expect(result.message.text).toBeUndefined();
    }
  });

  it('keeps media bodies untouched', () => {
    const result = parseWebhookPayload(
      textMessagePayload({ type: 'image', text: undefined, image: { id: 'media-1' } }),
      BUSINESS_NUMBER_ID,
    );

    expect(result).toMatchObject({
      kind: 'message',
      message: { messageType: 'image', messageBody: { id: 'media-1' } },
    });
  });

  it.each([
    ['a non-object', 'nope', 'Malformed webhook payload'],
    ['an empty entry list', { object: 'whatsapp_business_account', entry: [] }, 'Malformed webhook payload'],
    ['an empty value', buildPayload({}), 'Malformed webhook payload'],
    ['missing metadata', buildPayload({ messages: [] }), 'Missing metadata in webhook payload'],
    [
      'metadata without a phone number id',
      buildPayload({ metadata: { display_phone_number: '1555' } }),
      'Missing phone_number_id in webhook metadata',
    ],
    [
      'no messages',
      buildPayload({ metadata: { phone_number_id: BUSINESS_NUMBER_ID } }),
      'Unsupported message shape',
    ],
    ['a text message without body', textMessagePayload({ text: {} }), 'Text message without a body'],
  ])('rejects %s', (_label, payload, message) => {
    expect(() => parseWebhookPayload(payload, BUSINESS_NUMBER_ID)).toThrowError(
      new PayloadError(message),
    );
  });
});

describe('parseUnixTime', () => {
  it('reads decimal strings and integers', () => {
    expect(parseUnixTime('1700000000')).toBe(1700000000);
    expect(parseUnixTime(1700000000)).toBe(1700000000);
  });

  it('ignores anything else', () => {
    expect(parseUnixTime(undefined)).toBeUndefined();
    expect(parseUnixTime('17e8')).toBeUndefined();
    expect(parseUnixTime(1.5)).toBeUndefined();
  });
});
