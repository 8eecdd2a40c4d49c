export * from './client';
export * from './errors';
export * from './http-client';
export * from './simulated-client';
