import { DEFAULT_DELIVERY_TTL_SECONDS, type DeliveryLedger, type DeliveryLedgerContext } from './ledger';

export interface InMemoryDeliveryLedgerOptions extends DeliveryLedgerContext {
  now?: () => number;
}

/** Map-based ledger used for single-instance deployments and tests. */
export class InMemoryDeliveryLedger implements DeliveryLedger {
  private readonly seen = new Map<string, number>();
  private readonly prefix: string;
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(options: InMemoryDeliveryLedgerOptions = {}) {
    this.prefix = options.prefix ?? 'delivery:';
    this.ttlMs = (options.ttlSeconds ?? DEFAULT_DELIVERY_TTL_SECONDS) * 1000;
    this.now = options.now ?? Date.now;
  }

  async markIfNew(messageId: string): Promise<boolean> {
    const now = this.now();
    this.evictExpired(now);

    const key = `${this.prefix}${messageId}`;
    if (this.seen.has(key)) {
      return false;
    }

    this.seen.set(key, now + this.ttlMs);
    return true;
  }

  get size(): number {
    return this.seen.size;
  }

  private evictExpired(now: number): void {
    // Entries are inserted in expiry order, so the scan stops at the first live one.
    for (const [key, expiresAt] of this.seen) {
      if (expiresAt > now) {
        break;
      }
      this.seen.delete(key);
    }
  }
}
