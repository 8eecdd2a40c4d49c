/** Normalised view of an inbound user message. */
export interface InboundMessage {
  senderPhone: string;
  messageId: string;
  /** Message kind; `errors` when Meta could not represent what the sender used. */
  messageType: string;
  messageBody?: unknown;
  /** Present for `text` messages. */
  text?: string;
  messageUnixTime?: number;
}

/** Webhook addressed to a phone number other than the configured one. */
export interface ForeignNumberWebhook {
  kind: 'foreign';
  isTargetBusinessNumber: false;
  isStatus: false;
  phoneNumberId: string;
}

/** Delivery or read receipt for a message we sent. */
export interface StatusWebhook {
  kind: 'status';
  isTargetBusinessNumber: true;
  isStatus: true;
}

export interface MessageWebhook {
  kind: 'message';
  isTargetBusinessNumber: true;
  isStatus: false;
  message: InboundMessage;
}

export type InboundWebhook = ForeignNumberWebhook | StatusWebhook | MessageWebhook;

export interface WhatsAppTypingIndicatorRequest {
  messaging_product: 'whatsapp';
  status: 'read';
  message_id: string;
  typing_indicator: { type: 'text' };
}

export interface WhatsAppTextMessageRequest {
  messaging_product: 'whatsapp';
  recipient_type: 'individual';
  to: string;
  type: 'text';
  text: { body: string; preview_url?: boolean };
}

export type WhatsAppSendApiRequest = WhatsAppTypingIndicatorRequest | WhatsAppTextMessageRequest;

export interface WhatsAppSendApiSuccess {
  messaging_product?: string;
  contacts?: Array<{ input: string; wa_id: string }>;
  messages?: Array<{ id: string }>;
  success?: boolean;
}

export interface WhatsAppSendResult {
  recipientId?: string;
  messageId?: string;
}

export interface HttpResponseLike {
  ok: boolean;
  status: number;
  json(): Promise<unknown>;
  text(): Promise<string>;
}

export interface HttpRequestInitLike {
  method?: string;
  headers?: Record<string, string>;
  body?: string;
  signal?: AbortSignal;
}

export type HttpClient = (url: string, init?: HttpRequestInitLike) => Promise<HttpResponseLike>;

export interface WhatsAppCloudAgentConfig {
  /** HMAC secrets tried in order when verifying webhook signatures. */
  appSecrets: readonly string[];
  accessToken: string;
  phoneNumberId: string;
  graphApiVersion?: string;
  graphApiBaseUrl?: string;
  httpClient?: HttpClient;
}
