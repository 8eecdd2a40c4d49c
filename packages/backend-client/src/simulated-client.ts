import type {
  BackendClient,
  CreateThreadResult,
  LastThreadInfo,
  LoggerLike,
  ProcessMessageOptions,
  RegisterUserResult,
  ThreadHistory,
  ThreadMessage,
} from './client';
import { BACKEND_ERRORS, type BackendOperation } from './errors';

export interface SimulatedBackendOptions {
  minLatencyMs?: number;
  maxLatencyMs?: number;
  /** Probability (0-1) that a call fails with its operation's named error. */
  errorRates?: Partial<Record<BackendOperation, number>>;
  /** Reply used when the user's message mentions "long"; exercises message splitting. */
  longResponse?: string;
  random?: () => number;
  now?: () => Date;
}

interface SimulatedUser {
  userId: string;
  preferredLanguage: string;
}

interface SimulatedThread {
  threadId: string;
  phoneNumber: string;
  title: string;
  messages: ThreadMessage[];
  lastMessageTime: string | null;
}

/**
 * In-memory stand-in for the chat backend. Keeps users and threads for the
 * lifetime of the process and replies with a canned message.
 */
export class SimulatedBackendClient implements BackendClient {
  private readonly users = new Map<string, SimulatedUser>();
  private readonly threads = new Map<string, SimulatedThread>();
  private userCounter = 0;
  private threadCounter = 0;

  private readonly minLatencyMs: number;
  private readonly maxLatencyMs: number;
  private readonly errorRates: Partial<Record<BackendOperation, number>>;
  private readonly longResponse?: string;
  private readonly random: () => number;
  private readonly now: () => Date;

  constructor(
    private readonly logger: LoggerLike,
    options: SimulatedBackendOptions = {},
  ) {
    this.minLatencyMs = options.minLatencyMs ?? 1000;
    this.maxLatencyMs = Math.max(options.maxLatencyMs ?? 2000, this.minLatencyMs);
    this.errorRates = options.errorRates ?? {};
    this.longResponse = options.longResponse;
    this.random = options.random ?? Math.random;
    this.now = options.now ?? (() => new Date());

    this.logger.info?.({ minLatencyMs: this.minLatencyMs, maxLatencyMs: this.maxLatencyMs }, 'Using simulated backend client');
  }

  async registerUser(phoneNumber: string, preferredLanguage: string): Promise<RegisterUserResult> {
    await this.simulate('registerUser');

    if (this.users.has(phoneNumber)) {
      throw new BACKEND_ERRORS.registerUser('User already registered');
    }

    this.userCounter += 1;
    const userId = `sim_user_${this.userCounter}`;
    this.users.set(phoneNumber, { userId, preferredLanguage });

    this.logger.info?.({ phoneNumber, userId }, 'Simulated backend registered user');
    return { status: 'success', user_id: userId };
  }

  async checkUserExists(phoneNumber: string): Promise<boolean> {
    await this.simulate('checkUserExists');
    return this.users.has(phoneNumber);
  }

  async createThread(phoneNumber: string, title: string): Promise<CreateThreadResult> {
    await this.simulate('createThread');

    if (!this.users.has(phoneNumber)) {
      throw new BACKEND_ERRORS.createThread('User not found');
    }

    this.threadCounter += 1;
    const threadId = `sim_thread_${this.threadCounter}`;
    this.threads.set(threadId, { threadId, phoneNumber, title, messages: [], lastMessageTime: null });

    return { thread_id: threadId };
  }

  async getLastThreadInfo(phoneNumber: string): Promise<LastThreadInfo> {
    await this.simulate('getLastThreadInfo');

    let latest: SimulatedThread | undefined;
    for (const thread of this.threads.values()) {
      if (thread.phoneNumber !== phoneNumber) {
        continue;
      }
      if (!latest || (thread.lastMessageTime ?? '') >= (latest.lastMessageTime ?? '')) {
        latest = thread;
      }
    }

    return {
      thread_id: latest?.threadId ?? null,
      last_message_time: latest?.lastMessageTime ?? null,
    };
  }

  async getThreadHistory(phoneNumber: string, threadId: string): Promise<ThreadHistory> {
    await this.simulate('getThreadHistory');

    const thread = this.ownedThread('getThreadHistory', phoneNumber, threadId);
    return { thread_id: threadId, messages: [...thread.messages] };
  }

  async processMessage(
    phoneNumber: string,
    threadId: string,
    message: string,
    options: ProcessMessageOptions = {},
  ): Promise<string> {
    await this.simulate('processMessage', options.signal);

    const thread = this.ownedThread('processMessage', phoneNumber, threadId);
    thread.messages.push({ role: 'user', content: message });

    const reply =
      this.longResponse && message.toLowerCase().includes('long')
        ? this.longResponse
        : `This is a *simulated assistant* running in test mode. Write 'long' to see a bigger reply.\n\nYour message: ${message.slice(0, 100)}`;

    thread.messages.push({ role: 'assistant', content: reply });
    thread.lastMessageTime = this.now().toISOString();

    return reply;
  }

  private ownedThread(operation: BackendOperation, phoneNumber: string, threadId: string): SimulatedThread {
    const thread = this.threads.get(threadId);
    if (!thread) {
      throw new BACKEND_ERRORS[operation]('Thread not found');
    }

    if (thread.phoneNumber !== phoneNumber) {
      throw new BACKEND_ERRORS[operation]('Thread access denied');
    }

    return thread;
  }

  private async simulate(operation: BackendOperation, signal?: AbortSignal): Promise<void> {
    const latency = this.minLatencyMs + this.random() * (this.maxLatencyMs - this.minLatencyMs);
    await sleep(latency, signal).catch((error: unknown) => {
      throw new BACKEND_ERRORS[operation]('Backend request was cancelled', { cause: error });
    });

    const errorRate = this.errorRates[operation] ?? 0;
    if (errorRate > 0 && this.random() < errorRate) {
      this.logger.warn?.({ operation }, 'Simulated backend injecting an error');
      throw new BACKEND_ERRORS[operation](`Simulated error in ${operation}`);
    }
  }
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    function onAbort() {
      clearTimeout(timer);
      reject(signal?.reason);
    }

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
