export * from './module/MongoStorageModule.js';

export * from './storage/storage-index.js';
export * as storage from './storage/storage-index.js';

export * from './types/types.js';
export * as types from './types/types.js';
