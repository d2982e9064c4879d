export * from './collectors/config-collector.js';
export * from './collectors/impl/base64-config-collector.js';
export * from './collectors/impl/default-config-collector.js';
export * from './collectors/impl/fallback-config-collector.js';
export * from './collectors/impl/filesystem-config-collector.js';
export * from './collectors/impl/yaml-env.js';
export * from './compound-config-collector.js';
export * from './types.js';
