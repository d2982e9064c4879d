import { Command, InvalidArgumentError } from 'commander';

import * as util from '../../util/util-index.js';

/**
 * Wraps a Command with the standard config options
 */
export function wrapConfigCommand(command: Command) {
  return command
    .option(
      `-c, --config-path [path]`,
      'Path to YAML or JSON config file. Defaults to process.env.CP_CONFIG_PATH',
      util.env.CP_CONFIG_PATH
    )
    .option(
      `-c64, --config-base64 [base64]`,
      'Base64 encoded YAML or JSON config file. Defaults to process.env.CP_CONFIG_B64',
      util.env.CP_CONFIG_B64
    )
    .option(`--port <port>`, 'Port to serve the Control API on. Overrides the config file.', parsePort);
}

export function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    throw new InvalidArgumentError(`Not a valid port: ${value}`);
  }
  return port;
}

const optionalString = (value: unknown) => (typeof value == 'string' ? value : undefined);

/**
 * Extracts runner configuration params from Command options.
 */
export function extractRunnerOptions(options: Record<string, unknown>): util.RunnerConfig {
  return {
    config_path: optionalString(options.configPath),
    config_base64: optionalString(options.configBase64),
    port: typeof options.port == 'number' ? options.port : undefined
  };
}
