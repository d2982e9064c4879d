import { LogLevel } from '@changeplane/lib-services-framework';
import { configFile } from '@changeplane/service-types';
import { CaptureTiming } from '../../capture/CaptureNode.js';
import { SourceTable } from '../../source/SourceSchema.js';

export type RunnerConfig = {
  config_path?: string;
  config_base64?: string;
  /**
   * Overrides the port of the configuration file.
   */
  port?: number;
};

export type Runner = (config: RunnerConfig) => Promise<void>;

export type ResolvedControlPlaneConfig = {
  base_config: configFile.ControlPlaneConfig;
  port: number;
  advertise_address: string;
  log_level: LogLevel;
  storage: configFile.GenericStorageConfig;
  capture: CaptureTiming;
  source: {
    tables: SourceTable[];
  };
  api_parameters: {
    max_concurrent_requests: number;
    max_queue_depth: number;
  };
  healthcheck: {
    probes: {
      use_http: boolean;
    };
  };
};
