import * as core from '@changeplane/service-core';

import { MongoStorageProvider } from '../storage/storage-index.js';

/**
 * Adds the `mongodb` coordination store, shared by every capture of a cluster.
 */
export class MongoStorageModule extends core.modules.AbstractModule {
  constructor() {
    super({
      name: 'MongoDB Storage'
    });
  }

  async initialize(context: core.system.ServiceContextContainer): Promise<void> {
    context.storageEngine.registerProvider(new MongoStorageProvider());
  }
}
