import * as core from '@changeplane/service-core';

interface DynamicModuleMap {
  [key: string]: () => Promise<core.AbstractModule>;
}

/**
 * Storage types backed by a module outside of core. The in-memory store ships with the core module.
 */
export const STORAGE_MODULE_MAP: DynamicModuleMap = {
  mongodb: () =>
    import('@changeplane/module-mongodb-storage').then((module) => new module.MongoStorageModule())
};

/**
 * Loads the modules needed by the configured storage.
 */
export async function loadModules(config: Pick<core.utils.ResolvedControlPlaneConfig, 'storage'>) {
  const storageType = config.storage.type;
  if (storageType == core.storage.MEMORY_STORAGE_TYPE) {
    return [];
  }

  const loader = STORAGE_MODULE_MAP[storageType];
  if (loader === undefined) {
    throw new Error(`Invalid storage type: "${storageType}"`);
  }
  return [await loader()];
}
