import * as lib_mongo from '@changeplane/lib-service-mongodb';
import { logger, ServiceAssertionError, StorageUnavailableError } from '@changeplane/lib-services-framework';
import { CONTROL_PLANE_VERSION, storage } from '@changeplane/service-core';

import { isMongoStorageConfig, MongoStorageConfig } from '../../types/types.js';
import { MongoControlPlaneStorage } from '../MongoControlPlaneStorage.js';
import { ControlPlaneMongo } from './db.js';

export class MongoStorageProvider implements storage.StorageProvider {
  get type() {
    return lib_mongo.MONGO_CONNECTION_TYPE;
  }

  async getStorage(options: storage.GetStorageOptions): Promise<storage.ActiveStorage> {
    const { resolvedConfig } = options;

    const { storage } = resolvedConfig;
    if (!isMongoStorageConfig(storage)) {
      // This should not be reached since the provider is selected by type.
      throw new ServiceAssertionError(
        `Cannot create MongoDB coordination store with provided config ${storage.type} !== ${this.type}`
      );
    }

    const decodedConfig = MongoStorageConfig.decode(storage);
    const normalized = lib_mongo.normalizeMongoConfig(decodedConfig);
    const client = lib_mongo.db.createMongoClient(decodedConfig, {
      serviceVersion: CONTROL_PLANE_VERSION,
      maxPoolSize: storage.max_pool_size ?? 8
    });

    let shuttingDown = false;

    // Explicitly connect on startup.
    // Connection errors during startup are typically not recoverable - we get topologyClosed.
    // This catches the error early, before the capture registers or the API is served.
    await client.connect();

    const database = new ControlPlaneMongo(client, { database: normalized.database });
    await lib_mongo.db.waitForAuth(database.db);
    await database.createIndexes();
    logger.info(`Using MongoDB coordination store: ${database.db.namespace}`);

    return {
      storage: new MongoControlPlaneStorage(database),
      shutDown: async () => {
        shuttingDown = true;
        await client.close();
      },
      onFatalError: (callback) => {
        client.addListener('topologyClosed', () => {
          // If we're shutting down, this is expected and we can ignore it.
          if (!shuttingDown) {
            // It most commonly happens when the process fails to _ever_ connect - connection issues after
            // the initial connection are usually recoverable.
            callback(new StorageUnavailableError('MongoDB topology closed - failed to connect to MongoDB storage.'));
          }
        });
      }
    } satisfies storage.ActiveStorage;
  }
}
