export * from './responseContract';
