export * from './IStoreWriter';
