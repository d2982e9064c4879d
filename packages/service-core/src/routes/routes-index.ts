export * from './configure-fastify.js';
export * as endpoints from './endpoints/route-endpoints-index.js';
export * as hooks from './hooks.js';
export * from './route-register.js';
export * from './router.js';
export * from './RouterEngine.js';
