export * from './MongoLockManager.js';
