export * from './errors';
export * from './types';
export * from './hash';
export * from './connection';
export * from './client';
export * from './resources';
export { Provider } from './provider';
export type { ProviderOpts, ProviderProps } from './provider';
export type { Logger } from './logger';
export { NullLogger, toLogger } from './logger';
export { HashSet, sameElements } from './utils/hash-set';
export { deepEqual } from './utils/deep-equal';
