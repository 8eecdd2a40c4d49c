import { Redis } from 'ioredis';

import { DEFAULT_DELIVERY_TTL_SECONDS, type DeliveryLedger, type DeliveryLedgerContext } from './ledger';

/** Options used to configure the Redis-backed delivery ledger. */
export interface RedisDeliveryLedgerOptions extends DeliveryLedgerContext {
  url?: string;
  client?: Redis;
}

/** Delivery ledger shared across instances through Redis `SET NX`. */
export class RedisDeliveryLedger implements DeliveryLedger {
  private readonly redis: Redis;
  private readonly prefix: string;
  private readonly ttlSeconds: number;
  private readonly ownsClient: boolean;

  constructor(options: RedisDeliveryLedgerOptions = {}) {
    if (options.client) {
      this.redis = options.client;
      this.ownsClient = false;
    } else if (options.url) {
      // Managed Redis offerings often resolve to IPv6 only; `family=0` lets
      // ioredis pick whichever address family answers.
      const redisUrl = new URL(options.url);
      if (!redisUrl.searchParams.has('family')) {
        redisUrl.searchParams.set('family', '0');
      }

      this.redis = new Redis(redisUrl.toString(), { lazyConnect: true });
      this.ownsClient = true;
    } else {
      throw new Error('RedisDeliveryLedger requires either a client or a url.');
    }

    this.prefix = options.prefix ?? 'delivery:';
    this.ttlSeconds = options.ttlSeconds ?? DEFAULT_DELIVERY_TTL_SECONDS;
  }

  async markIfNew(messageId: string): Promise<boolean> {
    await this.ensureConnected();
    const result = await this.redis.set(`${this.prefix}${messageId}`, '1', 'EX', this.ttlSeconds, 'NX');
    return result === 'OK';
  }

  async close(): Promise<void> {
    if (this.ownsClient) {
      await this.redis.quit();
    }
  }

  private async ensureConnected(): Promise<void> {
    if (this.ownsClient && this.redis.status === 'wait') {
      await this.redis.connect();
    }
  }
}
