import type { SendOptions, WhatsAppCloudAgent } from '@wa-relay/whatsapp-sdk';

import type { AppLogger } from '../../telemetry/logger';
import type { RelayMetrics } from '../../telemetry/metrics';

/** Outbound side of the relay: what the conversation flow sends back to users. */
export interface MessagingClient {
  sendTypingIndicator(recipientPhone: string, messageId: string, options?: SendOptions): Promise<void>;
  /** Send each part as its own message, strictly in order. */
  sendMessage(recipientPhone: string, parts: readonly string[]): Promise<void>;
}

/** Messaging client backed by the WhatsApp Cloud API. */
export class CloudMessagingClient implements MessagingClient {
  constructor(
    private readonly agent: WhatsAppCloudAgent,
    private readonly logger: AppLogger,
    private readonly metrics: Pick<RelayMetrics, 'outboundMessages'>,
  ) {}

  async sendTypingIndicator(
    recipientPhone: string,
    messageId: string,
    options?: SendOptions,
  ): Promise<void> {
    try {
      await this.agent.sendTypingIndicator(messageId, options);
      this.metrics.outboundMessages.inc({ kind: 'typing', status: 'success' });
      this.logger.debug({ recipientPhone, messageId }, 'Sent typing indicator');
    } catch (error) {
      this.metrics.outboundMessages.inc({ kind: 'typing', status: 'error' });
      throw error;
    }
  }

  async sendMessage(recipientPhone: string, parts: readonly string[]): Promise<void> {
    for (const [index, part] of parts.entries()) {
      try {
        const result = await this.agent.sendText(recipientPhone, part);
        this.metrics.outboundMessages.inc({ kind: 'text', status: 'success' });
        this.logger.debug(
          { recipientPhone, part: index + 1, parts: parts.length, messageId: result.messageId },
          'Sent WhatsApp message',
        );
      } catch (error) {
        this.metrics.outboundMessages.inc({ kind: 'text', status: 'error' });
        throw error;
      }
    }
  }
}

export interface SimulatedMessagingOptions {
  delayMs?: number;
}

/** Logs what would have been sent instead of calling Meta. */
export class SimulatedMessagingClient implements MessagingClient {
  private readonly delayMs: number;

  constructor(
    private readonly logger: AppLogger,
    options: SimulatedMessagingOptions = {},
  ) {
    this.delayMs = options.delayMs ?? 100;
    this.logger.info('Using simulated WhatsApp messaging client');
  }

  async sendTypingIndicator(recipientPhone: string, messageId: string): Promise<void> {
    await pause(this.delayMs);
    this.logger.info({ recipientPhone, messageId }, 'Simulated typing indicator');
  }

  async sendMessage(recipientPhone: string, parts: readonly string[]): Promise<void> {
    for (const [index, part] of parts.entries()) {
      await pause(this.delayMs);
      this.logger.info(
        { recipientPhone, part: index + 1, parts: parts.length, length: part.length, preview: part.slice(0, 80) },
        'Simulated WhatsApp message',
      );
    }
  }
}

function pause(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
