import { ErrorCode, logger, ServiceError } from '@changeplane/lib-services-framework';
import * as fs from 'fs/promises';
import * as path from 'path';

import { RunnerConfig } from '../../types.js';
import { ConfigCollector, ConfigFileFormat } from '../config-collector.js';

const FORMAT_BY_EXTENSION: Record<string, ConfigFileFormat> = {
  '.yaml': ConfigFileFormat.YAML,
  '.yml': ConfigFileFormat.YAML,
  '.json': ConfigFileFormat.JSON
};

export class FileSystemConfigCollector extends ConfigCollector {
  get name(): string {
    return 'FileSystem';
  }

  async collectSerialized(runnerConfig: RunnerConfig) {
    const { config_path } = runnerConfig;
    if (!config_path) {
      return null;
    }

    const resolvedPath = path.resolve(process.cwd(), config_path);

    let content: string;
    try {
      content = await fs.readFile(resolvedPath, 'utf-8');
    } catch (ex) {
      throw new ServiceError(
        ErrorCode.ErrConfigInvalid,
        `Config file path ${resolvedPath} was specified, but the file could not be read: ${ex}`
      );
    }
    logger.info(`Collected configuration from file: ${resolvedPath}`);

    // Unknown extensions are tried as YAML, then JSON
    return this.parseContent(content, FORMAT_BY_EXTENSION[path.extname(resolvedPath).toLowerCase()]);
  }
}
