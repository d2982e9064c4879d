export * from './db/db-index.js';
export * as db from './db/db-index.js';

export * from './locks/locks-index.js';
export * as locks from './locks/locks-index.js';

export * from './types/types.js';
export * as types from './types/types.js';

// Re-export mongodb which can avoid using multiple versions of Mongo in a project
export * as mongo from 'mongodb';
