import { PayloadError, type InboundMessage, type WhatsAppCloudAgent } from '@wa-relay/whatsapp-sdk';

import { SignatureVerificationError } from '../../errors';
import type { AppLogger } from '../../telemetry/logger';
import type { RelayMetrics } from '../../telemetry/metrics';
import { USER_MESSAGES } from '../conversation/messages';
import type { ConversationManagerFactory } from '../conversation/conversation-manager';
import { isMessageTooOld } from '../conversation/retention';
import type { DeliveryLedger } from '../deliveries';
import { BackgroundTasks } from '../tasks/background-tasks';
import { OUTCOMES, type WebhookOutcome } from './meta-response';
import type { MessageFilter } from './message-filters';

export interface WhatsAppWebhookServiceOptions {
  underMaintenance: boolean;
  messageAgeThresholdSeconds: number;
  filters: readonly MessageFilter[];
  now?: () => Date;
}

export interface HandleWebhookInput {
  rawBody: Buffer;
  signatureHeader?: string;
}

export interface HandleWebhookResult {
  outcome: WebhookOutcome;
  /** Work to run once the response has been written. */
  tasks: BackgroundTasks;
}

type WebhookAgent = Pick<WhatsAppCloudAgent, 'verifySignature' | 'parseWebhook'>;

/**
 * Decides what to answer Meta for one webhook delivery and which follow-up
 * work the delivery needs. Only signature failures are thrown; everything
 * else becomes an outcome.
 */
export class WhatsAppWebhookService {
  private readonly now: () => Date;

  constructor(
    private readonly agent: WebhookAgent,
    private readonly createConversation: ConversationManagerFactory,
    private readonly deliveries: DeliveryLedger,
    private readonly metrics: Pick<RelayMetrics, 'webhookOutcomes'>,
    private readonly logger: AppLogger,
    private readonly options: WhatsAppWebhookServiceOptions,
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async handleWebhook(input: HandleWebhookInput): Promise<HandleWebhookResult> {
    const verification = this.agent.verifySignature(input.signatureHeader, input.rawBody);

    if (!verification.valid) {
      this.logger.warn(
        {
          reason: verification.reason,
          signaturePreview: input.signatureHeader?.slice(0, 12),
        },
        'Rejected WhatsApp webhook due to invalid signature',
      );
      throw new SignatureVerificationError();
    }

    this.logger.debug({ secretIndex: verification.secretIndex }, 'Verified WhatsApp webhook signature');

    const tasks = new BackgroundTasks();
    const outcome = await this.decide(input.rawBody, tasks);

    this.metrics.webhookOutcomes.inc({ outcome: outcome.errorCode ?? (outcome.success ? 'OK' : 'ERROR') });
    return { outcome, tasks };
  }

  private async decide(rawBody: Buffer, tasks: BackgroundTasks): Promise<WebhookOutcome> {
    let message: InboundMessage;
    try {
      const parsed = this.agent.parseWebhook(JSON.parse(rawBody.toString('utf8')));

      if (parsed.kind === 'foreign') {
        this.logger.debug({ phoneNumberId: parsed.phoneNumberId }, 'Webhook is for another business number');
        return OUTCOMES.notTargetNumber();
      }

      if (parsed.kind === 'status') {
        return OUTCOMES.statusMessage();
      }

      message = parsed.message;
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.error(
        {
          err: error,
          payload: error instanceof PayloadError ? error.payload : rawBody.toString('utf8'),
        },
        'Failed to parse WhatsApp webhook payload',
      );
      return OUTCOMES.invalidPayload(reason);
    }

    if (!(await this.isFirstDelivery(message.messageId))) {
      this.logger.info({ messageId: message.messageId }, 'Ignoring redelivered WhatsApp message');
      return OUTCOMES.duplicate();
    }

    const manager = this.createConversation(
      {
        senderPhone: message.senderPhone,
        messageId: message.messageId,
        messageType: message.messageType,
        text: message.text,
        messageUnixTime: message.messageUnixTime,
      },
      tasks,
    );

    if (this.options.underMaintenance) {
      tasks.add('maintenance-notice', () => manager.sendWhatsAppMessage(USER_MESSAGES.maintenance));
      return OUTCOMES.maintenance();
    }

    if (this.options.filters.some((filter) => filter(message))) {
      this.logger.debug({ messageId: message.messageId }, 'Message left for a local development instance');
      return OUTCOMES.devFilter();
    }

    tasks.add('typing-indicator', () => manager.startTypingIndicator());

    if (isMessageTooOld(message.messageUnixTime, this.options.messageAgeThresholdSeconds, this.now())) {
      this.logger.info(
        { messageId: message.messageId, messageUnixTime: message.messageUnixTime },
        'Ignoring message older than the age threshold',
      );
      return OUTCOMES.tooOld();
    }

    if (!(await manager.checkAndRegisterUser())) {
      if (!manager.hasNotifiedUser) {
        tasks.add('registration-unavailable-notice', () =>
          manager.notifyUser(USER_MESSAGES.registrationUnavailable),
        );
      }
      return OUTCOMES.registrationFailed();
    }

    if (message.messageType !== 'text') {
      tasks.add('unsupported-message', () => manager.handleUnsupportedMessage());
      return OUTCOMES.unsupportedType();
    }

    tasks.add('text-message', () => manager.handleTextMessage());
    return OUTCOMES.processed();
  }

  private async isFirstDelivery(messageId: string): Promise<boolean> {
    try {
      return await this.deliveries.markIfNew(messageId);
    } catch (error) {
      this.logger.warn({ err: error, messageId }, 'Delivery ledger unavailable; treating message as new');
      return true;
    }
  }
}
