export * from './AdminJobProcessor.js';
export * from './compute-schedule.js';
export * from './Owner.js';
export * from './TableScheduler.js';
