import { z } from 'zod';

import type { InboundMessage, InboundWebhook } from './types';

/** Raised when a webhook body does not have the shape Meta documents. */
export class PayloadError extends Error {
  constructor(
    message: string,
    readonly payload?: unknown,
  ) {
    super(message);
    this.name = 'PayloadError';
  }
}

/**
 * Only the path down to `entry[0].changes[0].value` is checked here; the value
 * itself is inspected step by step below so each failure gets its own message.
 */
const envelopeSchema = z
  .object({
    object: z.string().min(1),
    entry: z
      .array(
        z
          .object({
            changes: z
              .array(z.object({ value: z.record(z.unknown()) }).passthrough())
              .min(1),
          })
          .passthrough(),
      )
      .min(1),
  })
  .passthrough();

const metadataSchema = z
  .object({
    phone_number_id: z.union([z.string().min(1), z.number()]).transform(String),
  })
  .passthrough();

const messageSchema = z
  .object({
    id: z.string().min(1),
    from: z.string().min(1),
    type: z.string().min(1),
    timestamp: z.unknown().optional(),
  })
  .passthrough();

const textBodySchema = z.object({ body: z.string() }).passthrough();

/**
 * Reduce a Meta webhook body to the one thing the relay acts on. Webhooks for
 * another business number and status receipts are returned as signals rather
 * than errors; anything else that cannot be read raises {@link PayloadError}.
 */
export function parseWebhookPayload(payload: unknown, businessPhoneNumberId: string): InboundWebhook {
  const envelope = envelopeSchema.safeParse(payload);
  if (!envelope.success) {
    throw new PayloadError('Malformed webhook payload', payload);
  }

  const value = envelope.data.entry[0].changes[0].value;
  if (Object.keys(value).length === 0) {
    throw new PayloadError('Malformed webhook payload', payload);
  }

  if (value.metadata === undefined) {
    throw new PayloadError('Missing metadata in webhook payload', payload);
  }

  const metadata = metadataSchema.safeParse(value.metadata);
  if (!metadata.success) {
    throw new PayloadError('Missing phone_number_id in webhook metadata', payload);
  }

  const phoneNumberId = metadata.data.phone_number_id;
  if (phoneNumberId !== businessPhoneNumberId) {
    return { kind: 'foreign', isTargetBusinessNumber: false, isStatus: false, phoneNumberId };
  }

  if ('statuses' in value) {
    return { kind: 'status', isTargetBusinessNumber: true, isStatus: true };
  }

  const messages = z.array(messageSchema).min(1).safeParse(value.messages);
  if (!messages.success) {
    throw new PayloadError('Unsupported message shape', payload);
  }

  return {
    kind: 'message',
    isTargetBusinessNumber: true,
    isStatus: false,
    message: toInboundMessage(messages.data[0], payload),
  };
}

function toInboundMessage(
  raw: z.infer<typeof messageSchema>,
  payload: unknown,
): InboundMessage {
  // Meta reports message kinds the sender's client supports but the Cloud API
  // does not (polls, video notes, GIF stickers) as a `type` with no matching
  // key, alongside an `errors` array.
  const messageType = Object.prototype.hasOwnProperty.call(raw, raw.type) ? raw.type : 'errors';
  const messageBody: unknown = raw[messageType];

  const message: InboundMessage = {
    senderPhone: raw.from,
    messageId: raw.id,
    messageType,
    messageBody,
    messageUnixTime: parseUnixTime(raw.timestamp),
  };

  if (messageType === 'text') {
    const body = textBodySchema.safeParse(messageBody);
    if (!body.success) {
      throw new PayloadError('Text message without a body', payload);
    }
    message.text = body.data.body;
  }

  return message;
}

/** Meta sends seconds since the epoch as a decimal string. */
export function parseUnixTime(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isSafeInteger(value) ? value : undefined;
  }

  if (typeof value === 'string' && /^\s*\d+\s*$/.test(value)) {
    const parsed = Number.parseInt(value, 10);
    return Number.isSafeInteger(parsed) ? parsed : undefined;
  }

  return undefined;
}
