export * from './config.js';
export * from './config/config-index.js';
export * from './env.js';
export * from './Mutex.js';
export * from './version.js';
