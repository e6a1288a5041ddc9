export * from './app/petSession';
export * from './config/petConfig';
export * from './config/itemSource';
export * from './providers';
export * from './store/petStore';
