export * from './endpoint.js';
export * from './router-definitions.js';
export * from './router-response.js';
