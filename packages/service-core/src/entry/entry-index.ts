export * from './cli-entry.js';
export * from './commands/config-command.js';
export * from './commands/start-action.js';
