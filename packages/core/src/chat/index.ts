export * from './types';
export * from './contextBuilder';
export * from './fallback';
export * from './chatResponder';
