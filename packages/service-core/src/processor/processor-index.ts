export * from './ProcessorManager.js';
