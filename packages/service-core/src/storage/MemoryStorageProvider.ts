import { logger } from '@changeplane/lib-services-framework';
import { MemoryControlPlaneStorage } from './MemoryControlPlaneStorage.js';
import { ActiveStorage, GetStorageOptions, StorageProvider } from './StorageProvider.js';

export const MEMORY_STORAGE_TYPE = 'memory';

/**
 * Provides an in-process coordination store. Every capture of a cluster must share it,
 * so it only supports single-process deployments.
 */
export class MemoryStorageProvider implements StorageProvider {
  get type() {
    return MEMORY_STORAGE_TYPE;
  }

  async getStorage(options: GetStorageOptions): Promise<ActiveStorage> {
    logger.info(`Using in-memory coordination store`, { capture_ttl_ms: options.resolvedConfig.capture.capture_ttl_ms });
    const storage = new MemoryControlPlaneStorage();
    return {
      storage,
      shutDown: async () => {}
    };
  }
}
