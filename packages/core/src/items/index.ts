export * from './types';
export * from './itemFormat';
export * from './itemCatalog';
