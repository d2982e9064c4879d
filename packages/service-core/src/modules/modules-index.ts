export * from './AbstractModule.js';
export * from './ModuleManager.js';
