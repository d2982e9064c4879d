import { ServiceError } from '@changeplane/lib-services-framework';
import * as util from '../util/util-index.js';
import { ControlPlaneStorage } from './ControlPlaneStorage.js';

export interface ActiveStorage {
  storage: ControlPlaneStorage;
  shutDown(): Promise<void>;

  onFatalError?(callback: (error: ServiceError) => void): void;
}

export interface GetStorageOptions {
  resolvedConfig: util.ResolvedControlPlaneConfig;
}

/**
 * Represents a provider that can create a storage instance for a specific storage type from configuration.
 */
export interface StorageProvider {
  /**
   *  The storage type that this provider provides.
   *  The type should match the `type` field in the config.
   */
  type: string;

  getStorage(options: GetStorageOptions): Promise<ActiveStorage>;
}
