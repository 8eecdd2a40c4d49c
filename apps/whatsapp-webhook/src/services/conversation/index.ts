export * from './conversation-manager';
export * from './messages';
export * from './retention';
export * from './typing-indicator';
