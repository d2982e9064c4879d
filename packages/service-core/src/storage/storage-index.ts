export * from './ControlPlaneStorage.js';
export * from './MemoryControlPlaneStorage.js';
export * from './MemoryStorageProvider.js';
export * from './model.js';
export * from './StorageEngine.js';
export * from './StorageProvider.js';
