// Provides global and namespaced exports

export * from './api/api-index.js';
export * as api from './api/api-index.js';

export * from './capture/capture-index.js';
export * as capture from './capture/capture-index.js';

export * from './changefeed/changefeed-index.js';
export * as changefeed from './changefeed/changefeed-index.js';

export * from './election/election-index.js';
export * as election from './election/election-index.js';

export * from './entry/entry-index.js';
export * as entry from './entry/entry-index.js';

// Re-export framework for easy use of Container API
export * as framework from '@changeplane/lib-services-framework';

export * from './modules/modules-index.js';
export * as modules from './modules/modules-index.js';

export * from './pipeline/pipeline-index.js';
export * as pipeline from './pipeline/pipeline-index.js';

export * from './processor/processor-index.js';
export * as processor from './processor/processor-index.js';

export * from './routes/routes-index.js';
export * as routes from './routes/routes-index.js';

export * from './scheduler/scheduler-index.js';
export * as scheduler from './scheduler/scheduler-index.js';

export * from './sink/sink-index.js';
export * as sink from './sink/sink-index.js';

export * from './source/source-index.js';
export * as source from './source/source-index.js';

export * from './storage/storage-index.js';
export * as storage from './storage/storage-index.js';

export * from './system/system-index.js';
export * as system from './system/system-index.js';

export * from './util/util-index.js';
export * as utils from './util/util-index.js';
