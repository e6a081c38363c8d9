// packages/core/src/index.ts
export * from './types';
export * from './schemas';
export * from './errors';
export * from './logger';
export * from './rows';
export * from './abort';
