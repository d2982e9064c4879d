export * from '@changeplane/service-errors';
export * from './utils.js';
