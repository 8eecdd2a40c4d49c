import { z } from 'zod';

import { parseWebhookPayload } from './parser';
import {
  createSignatureHeader,
  verifyRequestSignature,
  type SignatureVerification,
} from './signature';
import type {
  HttpClient,
  HttpRequestInitLike,
  HttpResponseLike,
  InboundWebhook,
  WhatsAppCloudAgentConfig,
  WhatsAppSendApiRequest,
  WhatsAppSendApiSuccess,
  WhatsAppSendResult,
} from './types';

const DEFAULT_GRAPH_API_BASE_URL = 'https://graph.facebook.com';
const DEFAULT_GRAPH_API_VERSION = 'v22.0';

export interface SendOptions {
  signal?: AbortSignal;
}

/**
 * Client for the WhatsApp Cloud API side of a business phone number: webhook
 * authentication and parsing on the way in, the Graph `/messages` endpoint on
 * the way out.
 */
export class WhatsAppCloudAgent {
  private readonly appSecrets: readonly string[];
  private readonly accessToken: string;
  private readonly phoneNumberId: string;
  private readonly graphApiBaseUrl: string;
  private readonly graphApiVersion: string;
  private readonly httpClient: HttpClient;

  constructor(config: WhatsAppCloudAgentConfig) {
    if (!config?.appSecrets?.some((secret) => secret.length > 0)) {
      throw new Error('WhatsAppCloudAgent requires at least one app secret.');
    }

    if (!config.accessToken) {
      throw new Error('WhatsAppCloudAgent requires an accessToken.');
    }

    if (!config.phoneNumberId) {
      throw new Error('WhatsAppCloudAgent requires a phoneNumberId.');
    }

    this.appSecrets = [...config.appSecrets];
    this.accessToken = config.accessToken;
    this.phoneNumberId = config.phoneNumberId;
    this.graphApiBaseUrl = config.graphApiBaseUrl ?? DEFAULT_GRAPH_API_BASE_URL;
    this.graphApiVersion = config.graphApiVersion ?? DEFAULT_GRAPH_API_VERSION;
    this.httpClient = config.httpClient ?? defaultHttpClient;
  }

  verifySignature(
    signatureHeader: string | undefined,
    payload: string | Buffer,
  ): SignatureVerification {
    return verifyRequestSignature({ appSecrets: this.appSecrets, signatureHeader, payload });
  }

  /** Sign with the first configured secret; used by tests and local tooling. */
  signPayload(payload: string | Buffer): string {
    const secret = this.appSecrets.find((candidate) => candidate.length > 0) ?? '';
    return createSignatureHeader(secret, payload);
  }

  parseWebhook(payload: unknown): InboundWebhook {
    return parseWebhookPayload(payload, this.phoneNumberId);
  }

  /**
   * Mark the user's message as read and show the typing indicator. WhatsApp
   * hides the indicator after roughly 25 seconds or when a reply arrives.
   */
  async sendTypingIndicator(messageId: string, options: SendOptions = {}): Promise<void> {
    if (!messageId) {
      throw new Error('sendTypingIndicator requires a messageId.');
    }

    await this.post(
      {
        messaging_product: 'whatsapp',
        status: 'read',
        message_id: messageId,
        typing_indicator: { type: 'text' },
      },
      options,
    );
  }

  async sendText(to: string, body: string, options: SendOptions = {}): Promise<WhatsAppSendResult> {
    if (!to) {
      throw new Error('sendText requires a recipient.');
    }

    const response = await this.post(
      {
        messaging_product: 'whatsapp',
        recipient_type: 'individual',
        to,
        type: 'text',
        text: { body },
      },
      options,
    );

    return normalizeSendResult(response);
  }

  private async post(
    request: WhatsAppSendApiRequest,
    options: SendOptions,
  ): Promise<WhatsAppSendApiSuccess> {
    const response = await this.httpClient(this.buildMessagesEndpoint(), {
      method: 'POST',
      headers: {
        Authorization: `Bearer ${this.accessToken}`,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify(request),
      signal: options.signal,
    });

    if (!response.ok) {
      await this.raiseApiError(response);
    }

    const parsed = sendSuccessSchema.safeParse(await response.json());
    return parsed.success ? parsed.data : {};
  }

  private buildMessagesEndpoint(): string {
    const baseUrl = this.graphApiBaseUrl.replace(/\/$/, '');
    const version = this.graphApiVersion.replace(/^\//, '');
    return `${baseUrl}/${version}/${encodeURIComponent(this.phoneNumberId)}/messages`;
  }

  private async raiseApiError(response: HttpResponseLike): Promise<never> {
    const fallbackMessage = `WhatsApp Cloud API request failed with status ${response.status}.`;
    const text = await safeReadText(response);

    let body: unknown = text;
    try {
      body = text ? JSON.parse(text) : undefined;
    } catch {
      // Non-JSON error bodies are kept verbatim in `details`.
    }

    const graphError = extractErrorPayload(body);
    throw new WhatsAppApiError(
      graphError?.message ?? fallbackMessage,
      response.status,
      body,
      graphError,
    );
  }
}

interface GraphErrorPayload {
  message?: string;
  type?: string;
  code?: number;
  error_subcode?: number;
  fbtrace_id?: string;
}

export class WhatsAppApiError extends Error {
  readonly status: number;
  readonly details?: unknown;
  readonly code?: number;
  readonly type?: string;
  readonly errorSubcode?: number;
  readonly fbtraceId?: string;

  constructor(
    message: string,
    status: number,
    details?: unknown,
    graphError?: GraphErrorPayload | null,
  ) {
    super(message);
    this.name = 'WhatsAppApiError';
    this.status = status;
    this.details = details;

    if (graphError) {
      this.code = graphError.code;
      this.type = graphError.type;
      this.errorSubcode = graphError.error_subcode;
      this.fbtraceId = graphError.fbtrace_id;
    }
  }
}

function extractErrorPayload(body: unknown): GraphErrorPayload | null {
  const candidate = isRecord(body) ? body.error : undefined;
  if (!isRecord(candidate)) {
    return null;
  }

  const { message, type, code, error_subcode, fbtrace_id } = candidate;
  return {
    message: typeof message === 'string' ? message : undefined,
    type: typeof type === 'string' ? type : undefined,
    code: typeof code === 'number' ? code : undefined,
    error_subcode: typeof error_subcode === 'number' ? error_subcode : undefined,
    fbtrace_id: typeof fbtrace_id === 'string' ? fbtrace_id : undefined,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

const sendSuccessSchema = z
  .object({
    messaging_product: z.string().optional(),
    contacts: z.array(z.object({ input: z.string(), wa_id: z.string() })).optional(),
    messages: z.array(z.object({ id: z.string() })).optional(),
    success: z.boolean().optional(),
  })
  .passthrough();

function normalizeSendResult(body: WhatsAppSendApiSuccess): WhatsAppSendResult {
  return {
    recipientId: body.contacts?.[0]?.wa_id,
    messageId: body.messages?.[0]?.id,
  };
}

async function safeReadText(response: HttpResponseLike): Promise<string> {
  try {
    return await response.text();
  } catch {
    return '';
  }
}

const defaultHttpClient: HttpClient = async (url, init?: HttpRequestInitLike) => {
  const response = await fetch(url, {
    method: init?.method,
    headers: init?.headers,
    body: init?.body,
    signal: init?.signal,
  });

  const textClone = response.clone();

  return {
    ok: response.ok,
    status: response.status,
    json: () => response.json(),
    text: () => textClone.text(),
  };
};
