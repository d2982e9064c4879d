import { container, ContainerImplementation } from '@changeplane/lib-services-framework';
import { modules, storage, system, utils } from '@changeplane/service-core';
import { describe, expect, it } from 'vitest';

import { CoreModule } from '../../src/CoreModule.js';

const createTestContext = async (yamlConfig: string) => {
  const moduleManager = new modules.ModuleManager();
  moduleManager.register([new CoreModule()]);

  const configuration = await new utils.CompoundConfigCollector().collectConfig({
    config_base64: Buffer.from(yamlConfig).toString('base64')
  });
  const serviceContext = new system.ServiceContextContainer({ configuration });
  await moduleManager.initialize(serviceContext);
  return serviceContext;
};

describe('CoreModule', () => {
  it('registers the Control API and HTTP probes by default', async () => {
    const { routerEngine } = await createTestContext(/* yaml */ `
      # Test config
      storage:
        type: memory
    `);

    const paths = routerEngine.routes.api_routes.map((r) => `${r.method} ${r.path}`);
    expect(paths).toContain('POST /api/v1/changefeeds');
    expect(paths).toContain('POST /api/v1/changefeeds/:changefeed_id/tables/move_table');
    expect(paths).toContain('POST /api/v1/owner/resign');
    expect(routerEngine.routes.probe_routes.map((r) => r.path)).toEqual([
      '/probes/startup',
      '/probes/liveness',
      '/probes/readiness'
    ]);
    expect(container.getOptional(ContainerImplementation.PROBES)).not.toBeNull();
  });

  it('does not expose probes over HTTP when disabled', async () => {
    const { routerEngine } = await createTestContext(/* yaml */ `
      healthcheck:
        probes:
          use_http: false
    `);

    expect(routerEngine.routes.probe_routes).toEqual([]);
    expect(routerEngine.routes.api_routes.length).toBeGreaterThan(0);
  });

  it('provides the in-memory coordination store', async () => {
    const { storageEngine } = await createTestContext(/* yaml */ `
      storage:
        type: memory
    `);

    await storageEngine.start();
    expect(storageEngine.storage).toBeInstanceOf(storage.MemoryControlPlaneStorage);
    await storageEngine.storage.ping();
    await storageEngine.shutDown();
  });
});
