import {
  BackendClientError,
  MessageProcessingError,
  ThreadCreationError,
  ThreadInfoError,
  UserRegistrationError,
  type BackendClient,
} from '@wa-relay/backend-client';
import { detectLanguage, formatForWhatsApp, splitMessage } from '@wa-relay/whatsapp-sdk';

import type { AppLogger } from '../../telemetry/logger';
import type { RelayMetrics } from '../../telemetry/metrics';
import type { MessagingClient } from '../messaging';
import type { BackgroundTasks, TaskSpawner } from '../tasks/background-tasks';
import { USER_MESSAGES, unsupportedMediaMessage } from './messages';
import {
  formatTimeDelta,
  parseLastMessageTime,
  secondsSince,
  shouldStartNewThread,
  threadTitleFrom,
} from './retention';
import { TypingIndicatorLoop } from './typing-indicator';

/** The inbound message a manager is created for. */
export interface ConversationContext {
  senderPhone: string;
  messageId: string;
  messageType: string;
  /** Present for text messages. */
  text?: string;
  messageUnixTime?: number;
}

export interface ConversationSettings {
  retentionHours: number;
  typingIntervalMs: number;
  typingMaxDurationMs: number;
  processingTimeoutMs: number;
}

export interface ConversationDependencies {
  backend: BackendClient;
  messaging: MessagingClient;
  spawner: TaskSpawner;
  logger: AppLogger;
  metrics?: Pick<RelayMetrics, 'backendFailures'>;
  now?: () => Date;
}

export type ConversationManagerFactory = (
  context: ConversationContext,
  tasks: BackgroundTasks,
) => ConversationManager;

/**
 * Drives one inbound WhatsApp message through registration, thread
 * resolution, backend processing and the reply. Failures are reported to
 * the user as a short notice and never thrown to the caller.
 */
export class ConversationManager {
  private readonly logger: AppLogger;
  private readonly typing: TypingIndicatorLoop;
  private readonly now: () => Date;
  private notifiedUser = false;

  constructor(
    private readonly context: ConversationContext,
    private readonly tasks: BackgroundTasks,
    private readonly deps: ConversationDependencies,
    private readonly settings: ConversationSettings,
  ) {
    this.logger = deps.logger.child({ phone: context.senderPhone, messageId: context.messageId });
    this.now = deps.now ?? (() => new Date());
    this.typing = new TypingIndicatorLoop(
      (signal) => deps.messaging.sendTypingIndicator(context.senderPhone, context.messageId, { signal }),
      deps.spawner,
      this.logger,
      {
        intervalMs: settings.typingIntervalMs,
        maxDurationMs: settings.typingMaxDurationMs,
        now: () => this.now().getTime(),
      },
    );
  }

  /** True once this manager has scheduled a notice about a failed registration. */
  get hasNotifiedUser(): boolean {
    return this.notifiedUser;
  }

  startTypingIndicator(): Promise<void> {
    return this.typing.start();
  }

  stopTypingIndicator(): Promise<void> {
    return this.typing.stop();
  }

  /**
   * Make sure the sender is known to the backend, registering them on first
   * contact. Resolves false when either backend call fails; a failed
   * registration also schedules a notice to the user.
   */
  async checkAndRegisterUser(): Promise<boolean> {
    const phone = this.context.senderPhone;

    try {
      if (await this.deps.backend.checkUserExists(phone)) {
        return true;
      }

      const language = this.context.messageType === 'text' ? detectLanguage(this.context.text) : 'en';
      await this.deps.backend.registerUser(phone, language);
      this.logger.info({ language }, 'Registered new WhatsApp user');
      return true;
    } catch (error) {
      this.recordBackendFailure(error);

      if (error instanceof UserRegistrationError) {
        this.logger.error({ err: error }, 'Failed to register user');
        this.notifiedUser = true;
        this.tasks.add('registration-failure-notice', () =>
          this.notifyUser(USER_MESSAGES.registrationFailed),
        );
        return false;
      }

      this.logger.error({ err: error }, 'Failed to check whether the user exists');
      return false;
    }
  }

  /** Relay a text message to the backend and send the formatted reply back. */
  async handleTextMessage(): Promise<void> {
    const text = this.context.text;
    if (text === undefined) {
      this.logger.error({ messageType: this.context.messageType }, 'Cannot process a message without text');
      await this.stopTypingIndicator();
      return;
    }

    try {
      const threadId = await this.resolveThread(text);
      if (!threadId) {
        return;
      }

      let response: string;
      try {
        response = await this.processWithDeadline(threadId, text);
      } catch (error) {
        if (!(error instanceof MessageProcessingError)) {
          throw error;
        }
        this.recordBackendFailure(error);
        this.logger.error({ err: error, threadId }, 'Failed to process message');
        await this.notifyUser(USER_MESSAGES.processingFailed);
        return;
      }

      await this.stopTypingIndicator();

      if (!response) {
        this.logger.warn({ threadId }, 'Received an empty response from the backend');
        await this.sendWhatsAppMessage(USER_MESSAGES.emptyResponse);
        return;
      }

      const formatted = formatForWhatsApp(response);
      if (!formatted.trim()) {
        this.logger.warn({ threadId }, 'Response was empty after formatting');
        await this.sendWhatsAppMessage(USER_MESSAGES.emptyResponse);
        return;
      }

      await this.sendWhatsAppMessage(formatted);
    } catch (error) {
      this.recordBackendFailure(error);
      this.logger.error({ err: error }, 'Unexpected error while handling text message');
      await this.notifyUser(USER_MESSAGES.unexpectedFailure);
    }
  }

  async handleUnsupportedMessage(): Promise<void> {
    await this.notifyUser(unsupportedMediaMessage(this.context.messageType));
  }

  /** Split `text` into WhatsApp-sized parts and send them in order. Send failures are logged only. */
  async sendWhatsAppMessage(text: string): Promise<void> {
    const parts = splitMessage(text);

    try {
      await this.deps.messaging.sendMessage(this.context.senderPhone, parts);
    } catch (error) {
      this.logger.error({ err: error, parts: parts.length }, 'Failed to send WhatsApp message');
    }
  }

  /** Stop the typing indicator, then send `text`. */
  async notifyUser(text: string): Promise<void> {
    await this.stopTypingIndicator();
    await this.sendWhatsAppMessage(text);
  }

  /**
   * Reuse the user's last thread unless it has been idle longer than the
   * retention window. Resolves undefined after notifying the user when the
   * backend cannot provide one.
   */
  private async resolveThread(text: string): Promise<string | undefined> {
    const phone = this.context.senderPhone;

    let threadId: string | null;
    let lastMessageTime: Date | null;
    try {
      const info = await this.deps.backend.getLastThreadInfo(phone);
      threadId = info.thread_id;
      lastMessageTime = parseLastMessageTime(info.last_message_time);
    } catch (error) {
      if (!(error instanceof ThreadInfoError)) {
        throw error;
      }
      this.recordBackendFailure(error);
      this.logger.error({ err: error }, 'Failed to get last thread info');
      await this.notifyUser(USER_MESSAGES.historyUnavailable);
      return undefined;
    }

    const now = this.now();
    this.logger.debug(
      { sinceLastMessage: formatTimeDelta(secondsSince(lastMessageTime, now)) },
      'Time since the last message in the thread',
    );

    if (threadId !== null && !shouldStartNewThread(threadId, lastMessageTime, this.settings.retentionHours, now)) {
      return threadId;
    }

    try {
      const created = await this.deps.backend.createThread(phone, threadTitleFrom(text));
      this.logger.info({ threadId: created.thread_id }, 'Created a new thread');
      return created.thread_id;
    } catch (error) {
      if (!(error instanceof ThreadCreationError)) {
        throw error;
      }
      this.recordBackendFailure(error);
      this.logger.error({ err: error }, 'Failed to create thread');
      await this.notifyUser(USER_MESSAGES.threadCreationFailed);
      return undefined;
    }
  }

  /**
   * Call the backend under a hard deadline. A reply that only arrives after
   * the deadline is discarded.
   */
  private async processWithDeadline(threadId: string, text: string): Promise<string> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.settings.processingTimeoutMs);

    try {
      const reply = await this.deps.backend.processMessage(this.context.senderPhone, threadId, text, {
        signal: controller.signal,
      });

      if (controller.signal.aborted) {
        throw new MessageProcessingError('Reply arrived after the processing deadline');
      }

      return reply;
    } finally {
      clearTimeout(timer);
    }
  }

  private recordBackendFailure(error: unknown): void {
    if (error instanceof BackendClientError) {
      this.deps.metrics?.backendFailures.inc({ operation: error.operation });
    }
  }
}
