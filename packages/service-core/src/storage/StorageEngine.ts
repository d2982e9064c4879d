import { BaseObserver, logger, ServiceAssertionError, ServiceError } from '@changeplane/lib-services-framework';
import { ResolvedControlPlaneConfig } from '../util/util-index.js';
import { ControlPlaneStorage } from './ControlPlaneStorage.js';
import { ActiveStorage, StorageProvider } from './StorageProvider.js';

export type StorageEngineOptions = {
  configuration: ResolvedControlPlaneConfig;
};

export interface StorageEngineListener {
  storageActivated: (storage: ControlPlaneStorage) => void;
  storageFatalError: (error: ServiceError) => void;
}

export class StorageEngine extends BaseObserver<StorageEngineListener> {
  private storageProviders: Map<string, StorageProvider> = new Map();
  private currentActiveStorage: ActiveStorage | null = null;

  constructor(private options: StorageEngineOptions) {
    super();
  }

  get activeStorage(): ActiveStorage {
    if (!this.currentActiveStorage) {
      throw new ServiceAssertionError(`No storage provider has been initialized yet.`);
    }

    return this.currentActiveStorage;
  }

  get storage(): ControlPlaneStorage {
    return this.activeStorage.storage;
  }

  /**
   * Register a provider which generates a {@link ControlPlaneStorage}
   * given the matching config specified in the loaded {@link ResolvedControlPlaneConfig}
   */
  registerProvider(provider: StorageProvider) {
    this.storageProviders.set(provider.type, provider);
  }

  public async start(): Promise<void> {
    logger.info('Starting Storage Engine...');
    const { configuration } = this.options;
    const provider = this.storageProviders.get(configuration.storage.type);
    if (!provider) {
      throw new ServiceAssertionError(`No storage provider registered for type: ${configuration.storage.type}`);
    }
    const active = await provider.getStorage({
      resolvedConfig: configuration
    });
    this.currentActiveStorage = active;
    active.onFatalError?.((error) => {
      this.iterateListeners((cb) => cb.storageFatalError?.(error));
    });
    this.iterateListeners((cb) => cb.storageActivated?.(active.storage));
    logger.info(`Successfully activated storage: ${configuration.storage.type}.`);
    logger.info('Successfully started Storage Engine.');
  }

  /**
   *  Shutdown the storage engine, safely shutting down any activated storage providers.
   */
  public async shutDown(): Promise<void> {
    logger.info('Shutting down Storage Engine...');
    await this.currentActiveStorage?.shutDown();
    this.currentActiveStorage = null;
    logger.info('Successfully shut down Storage Engine.');
  }
}
