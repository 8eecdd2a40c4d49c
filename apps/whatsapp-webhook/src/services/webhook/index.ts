export * from './message-filters';
export * from './meta-response';
export * from './webhook-service';
