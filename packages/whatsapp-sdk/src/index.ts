export * from './agent';
export * from './formatter';
export * from './parser';
export * from './signature';
export * from './splitter';
export * from './text-direction';
export type * from './types';
