export * from './LifeCycledSystem.js';
