export * from './AbstractLockManager.js';
export * from './LockManager.js';
export * from './MemoryLockManager.js';
