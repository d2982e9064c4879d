import { container, logger, setLogLevel } from '@changeplane/lib-services-framework';
import * as core from '@changeplane/service-core';

import { loadModules } from '../util/module-loader.js';
import { logBooting } from '../util/version.js';

/**
 * Starts a capture server: the capture loops and the Control API.
 */
export async function startServer(runnerConfig: core.utils.RunnerConfig, moduleManager: core.modules.ModuleManager) {
  logBooting('Capture Server');

  const config = await core.utils.loadConfig(runnerConfig);
  setLogLevel(config.log_level);

  const modules = await loadModules(config);
  if (modules.length > 0) {
    moduleManager.register(modules);
  }

  const serviceContext = new core.system.ServiceContextContainer({
    configuration: config
  });

  await moduleManager.initialize(serviceContext);

  logger.info('Starting service...');
  await serviceContext.lifeCycleEngine.start();
  logger.info('Service started.');

  await container.probes.ready();
}
