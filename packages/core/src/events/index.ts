export * from './types';
export * from './eventLog';
