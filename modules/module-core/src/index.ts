export * from './CoreModule.js';
