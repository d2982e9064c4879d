import { Command } from 'commander';

import { logger } from '@changeplane/lib-services-framework';
import * as utils from '../util/util-index.js';
import { registerStartAction } from './commands/start-action.js';

/**
 * Generates a Commander program which serves as the entry point
 * for the control plane service.
 */
export function generateEntryProgram(startHandler: utils.Runner) {
  const entryProgram = new Command();
  entryProgram.name('changeplane').description('CLI to start a change data capture control plane server');

  registerStartAction(entryProgram, startHandler);

  return {
    program: entryProgram,
    /**
     * Executes the main program. Ends the NodeJS process if an exception was caught.
     */
    execute: async function runProgram(argv?: string[]) {
      try {
        await entryProgram.parseAsync(argv);
      } catch (e) {
        logger.error('Fatal error', e);
        process.exit(1);
      }
    }
  };
}
