export * from './types';
export * from './petEngine';
export * from './timeOfDay';
