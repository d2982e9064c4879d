import { Command } from 'commander';

import * as utils from '../../util/util-index.js';
import { extractRunnerOptions, wrapConfigCommand } from './config-command.js';

const COMMAND_NAME = 'start';

export function registerStartAction(program: Command, handler: utils.Runner) {
  const startCommand = program.command(COMMAND_NAME);

  wrapConfigCommand(startCommand);

  return startCommand
    .description('Starts a capture server which serves the Control API.')
    .action(async (options: Record<string, unknown>) => {
      await handler(extractRunnerOptions(options));
    });
}
