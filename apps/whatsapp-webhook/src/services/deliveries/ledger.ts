/**
 * Remembers which inbound message ids have already been accepted so that a
 * webhook Meta redelivers is not answered twice.
 */
export interface DeliveryLedger {
  /** Record the id; resolves false when it was already recorded and has not expired. */
  markIfNew(messageId: string): Promise<boolean>;
  close?(): Promise<void>;
}

export interface DeliveryLedgerContext {
  prefix?: string;
  ttlSeconds?: number;
}

/** Matches the default stale-message threshold: older redeliveries are rejected by age anyway. */
export const DEFAULT_DELIVERY_TTL_SECONDS = 24 * 60 * 60;
