export * from './settings';
export * from './resolve';
