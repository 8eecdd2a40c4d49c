export * from './create-server';
export type * from './types';
