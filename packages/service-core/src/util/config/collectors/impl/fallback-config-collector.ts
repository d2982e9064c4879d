import * as fs from 'fs/promises';
import * as path from 'path';

import { RunnerConfig } from '../../types.js';
import { FileSystemConfigCollector } from './filesystem-config-collector.js';

export const DEFAULT_CONFIG_LOCATION = 'changeplane.yaml';

/**
 * Reads `changeplane.yaml` from the working directory, if present.
 */
export class FallbackConfigCollector extends FileSystemConfigCollector {
  get name(): string {
    return `Fallback ${DEFAULT_CONFIG_LOCATION}`;
  }

  async collectSerialized(runnerConfig: RunnerConfig) {
    const exists = await fs
      .access(path.resolve(process.cwd(), DEFAULT_CONFIG_LOCATION), fs.constants.F_OK)
      .then(() => true)
      .catch(() => false);
    if (!exists) {
      return null;
    }
    return super.collectSerialized({
      ...runnerConfig,
      config_path: DEFAULT_CONFIG_LOCATION
    });
  }
}
