export * from './BaseObserver.js';
export * from './environment-variables.js';
