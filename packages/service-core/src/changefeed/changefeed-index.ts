export * from './changefeed-state.js';
export * from './consistent-config.js';
