import { z } from 'zod';

import type {
  BackendClient,
  CreateThreadResult,
  LastThreadInfo,
  LoggerLike,
  ProcessMessageOptions,
  RegisterUserResult,
  ThreadHistory,
} from './client';
import { BACKEND_ERRORS, BackendClientError, type BackendOperation } from './errors';

export const API_KEY_HEADER = 'X-Whatsapp-Api-Key';

const DEFAULT_TIMEOUT_MS = 60_000;

/** Ids arrive as strings or integers; anything else is a malformed reply. */
const identifierSchema = z.union([z.string().min(1), z.number()]).transform(String);

const registerUserSchema = z
  .object({ status: z.string(), user_id: identifierSchema.optional() })
  .passthrough();

const userExistsSchema = z.object({ exists: z.boolean().optional() }).passthrough();

const createThreadSchema = z.object({ thread_id: identifierSchema }).passthrough();

const lastThreadInfoSchema = z
  .object({
    thread_id: identifierSchema.nullish(),
    last_message_time: z.string().nullish(),
  })
  .passthrough();

const threadHistorySchema = z
  .object({
    thread_id: identifierSchema,
    messages: z.array(z.object({ role: z.string(), content: z.string() }).passthrough()).default([]),
  })
  .passthrough();

export interface HttpBackendClientOptions {
  baseUrl: string;
  apiKey: string;
  /** Applied to every request, including the whole of a streamed reply. */
  timeoutMs?: number;
  fetch?: typeof fetch;
}

interface RequestOptions {
  method: 'GET' | 'POST';
  path: string;
  query?: Record<string, string>;
  body?: Record<string, string>;
  signal?: AbortSignal;
}

/** Backend client speaking the `/whatsapp/v2` REST API over fetch. */
export class HttpBackendClient implements BackendClient {
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(
    private readonly logger: LoggerLike,
    options: HttpBackendClientOptions,
  ) {
    if (!options.baseUrl) {
      throw new Error('HttpBackendClient requires a baseUrl.');
    }

    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetch ?? globalThis.fetch;
  }

  async registerUser(phoneNumber: string, preferredLanguage: string): Promise<RegisterUserResult> {
    const body = await this.requestJson('registerUser', {
      method: 'POST',
      path: '/whatsapp/v2/users/register',
      body: { phone_num: phoneNumber, preferred_language: preferredLanguage },
    });

    return this.parse('registerUser', registerUserSchema, body);
  }

  async checkUserExists(phoneNumber: string): Promise<boolean> {
    const body = await this.requestJson('checkUserExists', {
      method: 'GET',
      path: '/whatsapp/v2/users/exists',
      query: { phone_num: phoneNumber },
    });

    return this.parse('checkUserExists', userExistsSchema, body).exists ?? false;
  }

  async createThread(phoneNumber: string, title: string): Promise<CreateThreadResult> {
    const body = await this.requestJson('createThread', {
      method: 'POST',
      path: '/whatsapp/v2/threads',
      body: { phone_num: phoneNumber, title },
    });

    return this.parse('createThread', createThreadSchema, body);
  }

  async getLastThreadInfo(phoneNumber: string): Promise<LastThreadInfo> {
    const body = await this.requestJson('getLastThreadInfo', {
      method: 'GET',
      path: '/whatsapp/v2/threads/last',
      query: { phone_num: phoneNumber },
    });

    const info = this.parse('getLastThreadInfo', lastThreadInfoSchema, body);
    return {
      thread_id: info.thread_id ?? null,
      last_message_time: info.last_message_time ?? null,
    };
  }

  async getThreadHistory(phoneNumber: string, threadId: string): Promise<ThreadHistory> {
    const body = await this.requestJson('getThreadHistory', {
      method: 'GET',
      path: `/whatsapp/v2/threads/${encodeURIComponent(threadId)}/history`,
      query: { phone_num: phoneNumber },
    });

    return this.parse('getThreadHistory', threadHistorySchema, body);
  }

  async processMessage(
    phoneNumber: string,
    threadId: string,
    message: string,
    options: ProcessMessageOptions = {},
  ): Promise<string> {
    return this.withTimeout('processMessage', options.signal, async (signal) => {
      const response = await this.send({
        method: 'POST',
        path: '/whatsapp/v2/messages/process',
        body: { phone_num: phoneNumber, thread_id: threadId, message },
        signal,
      });

      if (!response.ok) {
        const detail = await response.text().catch(() => '');
        throw new BACKEND_ERRORS.processMessage(
          `Backend returned HTTP ${response.status}: ${detail}`,
          { status: response.status },
        );
      }

      const reply = await readTextStream(response);
      if (!reply) {
        this.logger.warn?.({ phoneNumber, threadId }, 'Received empty response from backend');
      }

      return reply;
    });
  }

  private async requestJson(operation: BackendOperation, request: RequestOptions): Promise<unknown> {
    return this.withTimeout(operation, request.signal, async (signal) => {
      const response = await this.send({ ...request, signal });

      if (!response.ok) {
        throw new BACKEND_ERRORS[operation](`Backend returned HTTP ${response.status}`, {
          status: response.status,
        });
      }

      return response.json();
    });
  }

  private send(request: RequestOptions): Promise<Response> {
    const url = new URL(`${this.baseUrl}${request.path}`);
    for (const [key, value] of Object.entries(request.query ?? {})) {
      url.searchParams.set(key, value);
    }

    return this.fetchImpl(url, {
      method: request.method,
      headers: {
        [API_KEY_HEADER]: this.apiKey,
        'Content-Type': 'application/json',
      },
      body: request.body ? JSON.stringify(request.body) : undefined,
      signal: request.signal,
    });
  }

  /**
   * Run `task` with a signal that aborts on the caller's signal or after the
   * configured timeout, whichever comes first, and map every failure onto the
   * operation's named error.
   */
  private async withTimeout<T>(
    operation: BackendOperation,
    callerSignal: AbortSignal | undefined,
    task: (signal: AbortSignal) => Promise<T>,
  ): Promise<T> {
    const controller = new AbortController();
    let timedOut = false;

    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const onCallerAbort = () => controller.abort();

    if (callerSignal?.aborted) {
      controller.abort();
    } else {
      callerSignal?.addEventListener('abort', onCallerAbort, { once: true });
    }

    try {
      return await task(controller.signal);
    } catch (error) {
      if (error instanceof BackendClientError) {
        this.logger.error?.({ operation, status: error.status }, error.message);
        throw error;
      }

      const message = timedOut
        ? `Backend request timed out after ${this.timeoutMs}ms`
        : controller.signal.aborted
          ? 'Backend request was cancelled'
          : `Network error during ${operation}`;

      this.logger.error?.({ operation, err: error }, message);
      throw new BACKEND_ERRORS[operation](message, { cause: error });
    } finally {
      clearTimeout(timer);
      callerSignal?.removeEventListener('abort', onCallerAbort);
    }
  }

  private parse<T>(operation: BackendOperation, schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown): T {
    const result = schema.safeParse(body);
    if (!result.success) {
      throw new BACKEND_ERRORS[operation]('Unexpected response from backend', {
        cause: result.error,
      });
    }

    return result.data;
  }
}

/** Concatenate a streamed text body chunk by chunk. */
async function readTextStream(response: Response): Promise<string> {
  if (!response.body) {
    return response.text();
  }

  const reader = response.body.getReader();
  const decoder = new TextDecoder();
  let text = '';

  for (;;) {
    const { value, done } = await reader.read();
    if (done) {
      break;
    }
    text += decoder.decode(value, { stream: true });
  }

  return text + decoder.decode();
}
