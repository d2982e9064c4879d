export * from './probes/memory-probes.js';
export * from './probes/probes.js';
export * from './termination-handler.js';
