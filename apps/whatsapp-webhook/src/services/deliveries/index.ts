export * from './ledger';
export * from './in-memory-ledger';
export * from './redis-ledger';
