export * from './ServiceContext.js';
