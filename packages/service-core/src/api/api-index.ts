export * from './ControlAPI.js';
export * as serialize from './serialize.js';
