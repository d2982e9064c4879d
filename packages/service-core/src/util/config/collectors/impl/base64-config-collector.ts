import { ErrorCode, ServiceError } from '@changeplane/lib-services-framework';

import { RunnerConfig } from '../../types.js';
import { ConfigCollector } from '../config-collector.js';

/**
 * Config passed inline with `-c64` or `CP_CONFIG_B64`.
 */
export class Base64ConfigCollector extends ConfigCollector {
  get name(): string {
    return 'Base64';
  }

  async collectSerialized({ config_base64 }: RunnerConfig) {
    if (!config_base64) {
      return null;
    }

    const content = Buffer.from(config_base64, 'base64').toString('utf-8');
    if (content.trim() == '') {
      throw new ServiceError(ErrorCode.ErrConfigInvalid, 'Base64 config is empty after decoding');
    }
    // Could be JSON or YAML at this point
    return this.parseContent(content);
  }
}
