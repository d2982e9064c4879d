import {
  container,
  ContainerImplementation,
  LifeCycledSystem,
  logger,
  ServiceAssertionError
} from '@changeplane/lib-services-framework';

import { ControlAPI } from '../api/ControlAPI.js';
import { CaptureNode } from '../capture/CaptureNode.js';
import { IdleTablePipelineFactory, TablePipelineFactory } from '../pipeline/TablePipeline.js';
import * as routes from '../routes/routes-index.js';
import { SinkValidator } from '../sink/SinkValidator.js';
import { SourceSchema, StaticSourceSchema } from '../source/SourceSchema.js';
import * as storage from '../storage/storage-index.js';
import * as utils from '../util/util-index.js';

export interface ServiceContext {
  configuration: utils.ResolvedControlPlaneConfig;
  lifeCycleEngine: LifeCycledSystem;
  routerEngine: routes.RouterEngine;
  storageEngine: storage.StorageEngine;
  source: SourceSchema;
  sinks: SinkValidator;
  pipelines: TablePipelineFactory;
  capture: CaptureNode;
  controlAPI: ControlAPI;
}

export interface ServiceContextOptions {
  configuration: utils.ResolvedControlPlaneConfig;
}

/**
 * Holds the engines of one control plane process and controls their lifecycle.
 *
 * Storage is started first, then the capture registers and starts its loops. Routes are served
 * once modules have registered them. Stopping runs in reverse: the HTTP server closes, then the
 * capture deregisters, then storage is shut down.
 */
export class ServiceContextContainer implements ServiceContext {
  configuration: utils.ResolvedControlPlaneConfig;
  lifeCycleEngine: LifeCycledSystem;
  storageEngine: storage.StorageEngine;
  routerEngine: routes.RouterEngine;
  readonly source: SourceSchema;
  sinks: SinkValidator;
  readonly pipelines: TablePipelineFactory;

  private captureNode: CaptureNode | null = null;
  private api: ControlAPI | null = null;

  constructor(options: ServiceContextOptions) {
    const { configuration } = options;
    this.configuration = configuration;

    this.lifeCycleEngine = new LifeCycledSystem({
      terminationHandler: container.getOptional(ContainerImplementation.TERMINATION_HANDLER) ?? undefined
    });

    this.source = new StaticSourceSchema(configuration.source.tables);
    this.sinks = new SinkValidator();
    this.pipelines = new IdleTablePipelineFactory(this.source);

    this.storageEngine = new storage.StorageEngine({
      configuration
    });
    this.storageEngine.registerListener({
      storageFatalError: (error) => {
        // Propagate the error to the lifecycle engine
        void this.lifeCycleEngine.stopWithError(error);
      }
    });

    this.lifeCycleEngine.withLifecycle(this.storageEngine, {
      start: (storageEngine) => storageEngine.start(),
      stop: (storageEngine) => storageEngine.shutDown()
    });

    this.lifeCycleEngine.withLifecycle(this, {
      start: (context) => context.startCapture(),
      stop: (context) => context.stopCapture()
    });

    this.routerEngine = new routes.RouterEngine();
    this.lifeCycleEngine.withLifecycle(this.routerEngine, {
      stop: (routerEngine) => routerEngine.shutDown()
    });
  }

  get capture(): CaptureNode {
    if (!this.captureNode) {
      throw new ServiceAssertionError('The capture has not been started yet.');
    }
    return this.captureNode;
  }

  get controlAPI(): ControlAPI {
    if (!this.api) {
      throw new ServiceAssertionError('The Control API is only available after the capture has started.');
    }
    return this.api;
  }

  protected async startCapture() {
    const { configuration } = this;
    const capture = new CaptureNode({
      storage: this.storageEngine.storage,
      pipelines: this.pipelines,
      address: configuration.advertise_address,
      version: utils.CONTROL_PLANE_VERSION,
      timing: configuration.capture
    });
    capture.registerListener({
      reincarnated: (previous_id, id) => {
        logger.warn(`Capture ${previous_id} lost its registration, continuing as ${id}`);
      }
    });
    await capture.start();
    capture.run();

    this.captureNode = capture;
    this.api = new ControlAPI({
      storage: this.storageEngine.storage,
      capture,
      source: this.source,
      sinks: this.sinks,
      version: utils.CONTROL_PLANE_VERSION,
      git_hash: utils.env.CP_GIT_HASH
    });
    logger.info(`Capture ${capture.id} started at ${capture.address}`);
  }

  protected async stopCapture() {
    await this.captureNode?.stop();
    this.captureNode = null;
    this.api = null;
  }
}
