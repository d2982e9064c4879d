import { ErrorCode, isLogLevel, logger, ServiceError } from '@changeplane/lib-services-framework';
import { configFile } from '@changeplane/service-types';
import { CaptureTiming, DEFAULT_CAPTURE_TIMING } from '../../capture/CaptureNode.js';
import { MEMORY_STORAGE_TYPE } from '../../storage/MemoryStorageProvider.js';
import { ConfigCollector } from './collectors/config-collector.js';
import { Base64ConfigCollector } from './collectors/impl/base64-config-collector.js';
import { DefaultConfigCollector } from './collectors/impl/default-config-collector.js';
import { FallbackConfigCollector } from './collectors/impl/fallback-config-collector.js';
import { FileSystemConfigCollector } from './collectors/impl/filesystem-config-collector.js';
import { ResolvedControlPlaneConfig, RunnerConfig } from './types.js';

export type CompoundConfigCollectorOptions = {
  /**
   * The configuration from first collector to provide a configuration
   * is used. The order of the collectors specifies precedence
   */
  configCollectors: ConfigCollector[];
};

export const DEFAULT_PORT = 8300;

const DEFAULT_COLLECTOR_OPTIONS: CompoundConfigCollectorOptions = {
  configCollectors: [
    new Base64ConfigCollector(),
    new FileSystemConfigCollector(),
    new FallbackConfigCollector(),
    new DefaultConfigCollector()
  ]
};

export class CompoundConfigCollector {
  constructor(protected options: CompoundConfigCollectorOptions = DEFAULT_COLLECTOR_OPTIONS) {}

  /**
   * Collects and resolves base config
   */
  async collectConfig(runnerConfig: RunnerConfig = {}): Promise<ResolvedControlPlaneConfig> {
    const baseConfig = await this.collectBaseConfig(runnerConfig);

    const log_level = baseConfig.log_level ?? 'info';
    if (!isLogLevel(log_level)) {
      throw new ServiceError(ErrorCode.ErrConfigInvalid, `Invalid log_level ${JSON.stringify(log_level)}`);
    }

    const port = runnerConfig.port ?? baseConfig.port ?? DEFAULT_PORT;
    const configured = baseConfig.capture;
    const capture: CaptureTiming = {
      heartbeat_interval_ms: configured?.heartbeat_interval_ms ?? DEFAULT_CAPTURE_TIMING.heartbeat_interval_ms,
      capture_ttl_ms: configured?.capture_ttl_ms ?? DEFAULT_CAPTURE_TIMING.capture_ttl_ms,
      owner_lease_ttl_ms: configured?.owner_lease_ttl_ms ?? DEFAULT_CAPTURE_TIMING.owner_lease_ttl_ms,
      owner_tick_interval_ms: configured?.owner_tick_interval_ms ?? DEFAULT_CAPTURE_TIMING.owner_tick_interval_ms,
      processor_tick_interval_ms:
        configured?.processor_tick_interval_ms ?? DEFAULT_CAPTURE_TIMING.processor_tick_interval_ms,
      removed_gc_grace_ms: configured?.removed_gc_grace_ms ?? DEFAULT_CAPTURE_TIMING.removed_gc_grace_ms
    };
    if (capture.capture_ttl_ms <= capture.heartbeat_interval_ms) {
      throw new ServiceError(
        ErrorCode.ErrConfigInvalid,
        `capture.capture_ttl_ms (${capture.capture_ttl_ms}) must be larger than capture.heartbeat_interval_ms (${capture.heartbeat_interval_ms})`
      );
    }

    return {
      base_config: baseConfig,
      port,
      advertise_address: baseConfig.advertise_address ?? `127.0.0.1:${port}`,
      log_level,
      storage: baseConfig.storage ?? { type: MEMORY_STORAGE_TYPE },
      capture,
      source: {
        tables: (baseConfig.source?.tables ?? []).map((table) => ({
          table_id: table.table_id,
          schema: table.schema,
          name: table.name,
          eligible: table.eligible ?? true
        }))
      },
      api_parameters: {
        max_concurrent_requests: baseConfig.api_parameters?.max_concurrent_requests ?? 10,
        max_queue_depth: baseConfig.api_parameters?.max_queue_depth ?? 20
      },
      healthcheck: {
        probes: {
          use_http: baseConfig.healthcheck?.probes?.use_http ?? true
        }
      }
    };
  }

  /**
   * Collects the base config from the registered collectors.
   * @throws if no collector could return a configuration.
   */
  protected async collectBaseConfig(runner_config: RunnerConfig): Promise<configFile.ControlPlaneConfig> {
    for (const collector of this.options.configCollectors) {
      try {
        const baseConfig = await collector.collect(runner_config);
        if (baseConfig) {
          return baseConfig;
        }
        logger.debug(`Could not collect config with ${collector.name} method. Moving on to next method if available.`);
      } catch (ex) {
        // An error in a collector is a hard stop
        throw new ServiceError(
          ErrorCode.ErrConfigInvalid,
          `Could not collect config using ${collector.name} method. Caught exception: ${ex}`
        );
      }
    }
    throw new ServiceError(ErrorCode.ErrConfigInvalid, 'Config could not be collected using any of the registered config collectors.');
  }
}
