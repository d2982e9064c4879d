export * from './sink-uri.js';
export * from './SinkValidator.js';
