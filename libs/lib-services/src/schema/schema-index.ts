export * from './definitions.js';
export * from './validators/schema-validator.js';
export * from './validators/ts-codec-validator.js';
