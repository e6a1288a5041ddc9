export * from './snapshotFormat';
export * from './persistenceManager';
