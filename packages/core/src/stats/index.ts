export * from './types';
export * from './statSet';
export * from './random';
