import { HttpBackendClient } from './http-client';
import { SimulatedBackendClient, type SimulatedBackendOptions } from './simulated-client';

/**
 * Minimal logging contract used by the backend clients. A pino logger
 * satisfies this interface out of the box.
 */
export interface LoggerLike {
  debug?(payload?: unknown, message?: string): void;
  info?(payload?: unknown, message?: string): void;
  warn?(payload?: unknown, message?: string): void;
  error?(payload?: unknown, message?: string): void;
}

export interface RegisterUserResult {
  status: string;
  user_id?: string;
}

export interface CreateThreadResult {
  thread_id: string;
}

/** Both fields are null when the user has no thread yet. */
export interface LastThreadInfo {
  thread_id: string | null;
  last_message_time: string | null;
}

export interface ThreadMessage {
  role: string;
  content: string;
}

export interface ThreadHistory {
  thread_id: string;
  messages: ThreadMessage[];
}

export interface ProcessMessageOptions {
  /** Aborting cancels the request; the call then fails with `MessageProcessingError`. */
  signal?: AbortSignal;
}

/**
 * Port to the chat backend that owns users, threads and the assistant. Every
 * method raises the named subclass of `BackendClientError` for its operation.
 */
export interface BackendClient {
  registerUser(phoneNumber: string, preferredLanguage: string): Promise<RegisterUserResult>;
  checkUserExists(phoneNumber: string): Promise<boolean>;
  createThread(phoneNumber: string, title: string): Promise<CreateThreadResult>;
  getLastThreadInfo(phoneNumber: string): Promise<LastThreadInfo>;
  getThreadHistory(phoneNumber: string, threadId: string): Promise<ThreadHistory>;
  /** Resolves with the full reply once the backend has finished streaming it. */
  processMessage(
    phoneNumber: string,
    threadId: string,
    message: string,
    options?: ProcessMessageOptions,
  ): Promise<string>;
}

export type BackendClientOptions =
  | {
      mode: 'http';
      baseUrl: string;
      apiKey: string;
      timeoutMs?: number;
      fetch?: typeof fetch;
    }
  | ({ mode: 'simulated' } & SimulatedBackendOptions);

/** Factory that chooses the backend client implementation for the provided options. */
export function createBackendClient(logger: LoggerLike, options: BackendClientOptions): BackendClient {
  if (options.mode === 'simulated') {
    return new SimulatedBackendClient(logger, options);
  }

  return new HttpBackendClient(logger, options);
}
