export * from './container.js';

export * from './errors/errors-index.js';
export * as errors from './errors/errors-index.js';

export * from './logger/logger-index.js';

export * from './locks/locks-index.js';
export * as locks from './locks/locks-index.js';

export * from './schema/schema-index.js';
export * as schema from './schema/schema-index.js';

export * from './signals/signals-index.js';
export * as signals from './signals/signals-index.js';

export * from './router/router-index.js';
export * as router from './router/router-index.js';

export * from './system/LifeCycledSystem.js';
export * as system from './system/system-index.js';

export * from './utils/utils-index.js';
export * as utils from './utils/utils-index.js';
