export * from './errors.js';
export * from './mongo.js';
