import { ConfigCollector } from '../config-collector.js';

/**
 * Last resort: an empty configuration, meaning every default applies.
 */
export class DefaultConfigCollector extends ConfigCollector {
  get name(): string {
    return 'Defaults';
  }

  async collectSerialized() {
    return {};
  }
}
