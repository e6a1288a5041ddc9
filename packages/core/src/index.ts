export * from './errors';
export * from './logger';
export * from './stats';
export * from './items';
export * from './events';
export * from './reply';
export * from './engine';
export * from './persistence';
export * from './chat';
