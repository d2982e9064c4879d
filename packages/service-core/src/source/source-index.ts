export * from './SourceSchema.js';
