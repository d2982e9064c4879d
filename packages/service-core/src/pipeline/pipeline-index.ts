export * from './TablePipeline.js';
