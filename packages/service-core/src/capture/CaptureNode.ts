import { BaseObserver, container, ContainerImplementation, Logger, logger } from '@changeplane/lib-services-framework';
import { LeaseElector } from '../election/LeaseElector.js';
import { LockLeaseElector } from '../election/LockLeaseElector.js';
import { OwnerElection } from '../election/OwnerElection.js';
import { TablePipelineFactory } from '../pipeline/TablePipeline.js';
import { ProcessorManager } from '../processor/ProcessorManager.js';
import { ControlPlaneStorage } from '../storage/ControlPlaneStorage.js';
import { Mutex } from '../util/Mutex.js';
import { CaptureSession } from './CaptureSession.js';
import { TickLoop } from './TickLoop.js';

export type CaptureTiming = {
  heartbeat_interval_ms: number;
  capture_ttl_ms: number;
  owner_lease_ttl_ms: number;
  owner_tick_interval_ms: number;
  processor_tick_interval_ms: number;
  removed_gc_grace_ms: number;
};

export const DEFAULT_CAPTURE_TIMING: CaptureTiming = {
  heartbeat_interval_ms: 1_000,
  capture_ttl_ms: 10_000,
  owner_lease_ttl_ms: 10_000,
  owner_tick_interval_ms: 500,
  processor_tick_interval_ms: 500,
  removed_gc_grace_ms: 0
};

export type CaptureNodeOptions = {
  storage: ControlPlaneStorage;
  pipelines: TablePipelineFactory;
  address: string;
  version: string;
  timing: CaptureTiming;
  /**
   * Defaults to the lock based elector over the store.
   */
  elector?: LeaseElector;
};

export interface CaptureNodeListener {
  /**
   * The capture lost its registration and continues under a new id.
   */
  reincarnated: (previous_id: string, id: string) => void;
}

/**
 * Everything that belongs to one capture id.
 */
type Incarnation = {
  session: CaptureSession;
  election: OwnerElection;
  processors: ProcessorManager;
  logger: Logger;
};

/**
 * One capture: its registration, its bid for ownership and its processors.
 *
 * The three loops (heartbeat, owner, processor) are serialized, so a tick never observes
 * a half-replaced incarnation. Tests drive the loops through {@link tick} instead of {@link run}.
 */
export class CaptureNode extends BaseObserver<CaptureNodeListener> {
  private incarnation: Incarnation | null = null;
  private elector: LeaseElector;
  private mutex = new Mutex();
  private loops: TickLoop[] = [];

  constructor(private options: CaptureNodeOptions) {
    super();
    this.elector =
      options.elector ??
      new LockLeaseElector({ storage: options.storage, lease_ttl_ms: options.timing.owner_lease_ttl_ms });
  }

  get storage() {
    return this.options.storage;
  }

  get address() {
    return this.options.address;
  }

  get leaseElector() {
    return this.elector;
  }

  get id(): string {
    return this.current.session.id;
  }

  get isOwner() {
    return this.incarnation?.election.isOwner ?? false;
  }

  get processors(): ProcessorManager {
    return this.current.processors;
  }

  get election(): OwnerElection {
    return this.current.election;
  }

  private get current(): Incarnation {
    if (this.incarnation == null) {
      throw new Error('Capture has not been started');
    }
    return this.incarnation;
  }

  /**
   * Registers the capture. Does not start the loops.
   */
  async start() {
    await this.mutex.exclusiveLock(async () => {
      this.incarnation = await this.incarnate();
    });
  }

  /**
   * Starts the heartbeat, owner and processor loops.
   */
  run() {
    const { timing } = this.options;
    this.loops = [
      new TickLoop({
        name: 'Capture heartbeat',
        interval_ms: timing.heartbeat_interval_ms,
        tick: async () => {
          await container.getOptional(ContainerImplementation.PROBES)?.touch();
          await this.heartbeat();
        },
        logger
      }),
      new TickLoop({ name: 'Owner tick', interval_ms: timing.owner_tick_interval_ms, tick: () => this.ownerTick(), logger }),
      new TickLoop({
        name: 'Processor tick',
        interval_ms: timing.processor_tick_interval_ms,
        tick: () => this.processorTick(),
        logger
      })
    ];
    for (const loop of this.loops) {
      loop.start();
    }
  }

  /**
   * Stops the loops and every table, resigns and deregisters.
   */
  async stop() {
    await Promise.all(this.loops.map((loop) => loop.stop()));
    this.loops = [];
    await this.mutex.exclusiveLock(async () => {
      const incarnation = this.incarnation;
      if (incarnation == null) {
        return;
      }
      this.incarnation = null;
      await this.retire(incarnation);
      await incarnation.session.deregister();
      incarnation.logger.info('Capture stopped');
    });
  }

  async heartbeat() {
    await this.mutex.exclusiveLock(async () => {
      const incarnation = this.current;
      if (await incarnation.session.heartbeat()) {
        return;
      }
      incarnation.logger.warn('Capture registration lost, stopping all tables and registering again');
      await this.retire(incarnation);
      this.incarnation = await this.incarnate();
      this.iterateListeners((l) => l.reincarnated?.(incarnation.session.id, this.id));
    });
  }

  async ownerTick() {
    await this.mutex.exclusiveLock(() => this.current.election.tick());
  }

  async processorTick() {
    await this.mutex.exclusiveLock(() => this.current.processors.tick());
  }

  /**
   * Heartbeat, owner round and processor round, in that order.
   */
  async tick() {
    await this.heartbeat();
    await this.ownerTick();
    await this.processorTick();
  }

  async resign() {
    await this.mutex.exclusiveLock(async () => {
      await this.incarnation?.election.resign();
    });
  }

  private async incarnate(): Promise<Incarnation> {
    const { storage, timing, address, version, pipelines } = this.options;
    const session = new CaptureSession({ storage, address, version, capture_ttl_ms: timing.capture_ttl_ms });
    const captureLogger = logger.child({ prefix: `[capture ${session.id.slice(0, 8)}] ` });
    await session.register();
    captureLogger.info(`Registered capture ${session.id} at ${address}`);
    return {
      session,
      logger: captureLogger,
      election: new OwnerElection({
        capture_id: session.id,
        storage,
        elector: this.elector,
        election_interval_ms: timing.owner_tick_interval_ms,
        removed_gc_grace_ms: timing.removed_gc_grace_ms,
        logger: captureLogger
      }),
      processors: new ProcessorManager({ capture_id: session.id, storage, pipelines, logger: captureLogger })
    };
  }

  private async retire(incarnation: Incarnation) {
    await incarnation.processors.stopAll();
    await incarnation.election.stop();
  }
}
