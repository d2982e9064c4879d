export * from './changefeeds.js';
export * from './cluster.js';
export * from './probes.js';
export * from './system.js';
export * from './tables.js';
