import { CompoundConfigCollector, ResolvedControlPlaneConfig, RunnerConfig } from './config/config-index.js';

/**
 * Loads the resolved config using the registered config collectors
 */
export async function loadConfig(runnerConfig: RunnerConfig): Promise<ResolvedControlPlaneConfig> {
  const collector = new CompoundConfigCollector();
  return collector.collectConfig(runnerConfig);
}
