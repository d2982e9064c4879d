import { ControlAPI } from '../../src/api/ControlAPI.js';
import { CaptureNode, CaptureTiming } from '../../src/capture/CaptureNode.js';
import {
  CreateTablePipelineOptions,
  IdleTablePipeline,
  TablePipeline,
  TablePipelineFactory,
  TablePipelineStatus
} from '../../src/pipeline/TablePipeline.js';
import { SinkValidator } from '../../src/sink/SinkValidator.js';
import { SourceTable, StaticSourceSchema } from '../../src/source/SourceSchema.js';
import { MemoryControlPlaneStorage } from '../../src/storage/MemoryControlPlaneStorage.js';

export const TEST_TIMING: CaptureTiming = {
  heartbeat_interval_ms: 1_000,
  capture_ttl_ms: 3_000,
  owner_lease_ttl_ms: 3_000,
  owner_tick_interval_ms: 500,
  processor_tick_interval_ms: 500,
  removed_gc_grace_ms: 0
};

export const sourceTables = (...table_ids: number[]): SourceTable[] =>
  table_ids.map((table_id) => ({ table_id, schema: 'test', name: `t${table_id}`, eligible: true }));

/**
 * Pipeline that can be told to fail once for a table.
 */
export class TestPipelineFactory implements TablePipelineFactory {
  readonly failOnce = new Set<number>();
  readonly started: CreateTablePipelineOptions[] = [];

  constructor(private source: StaticSourceSchema) {}

  create(options: CreateTablePipelineOptions): TablePipeline {
    this.started.push(options);
    const pipeline = new IdleTablePipeline(options.table_id, options.start_ts, this.source);
    if (!this.failOnce.delete(options.table_id)) {
      return pipeline;
    }
    return {
      table_id: options.table_id,
      start: () => pipeline.start(),
      stop: () => pipeline.stop(),
      status: async (): Promise<TablePipelineStatus> => ({
        checkpoint_ts: options.start_ts,
        resolved_ts: options.start_ts,
        error: new Error('boom')
      })
    };
  }
}

/**
 * Sink validation without network access: only the URI is checked.
 */
export const offlineSinks = () => new SinkValidator({ connectMySQL: async () => {} });

export type TestClusterOptions = {
  captures?: number;
  tables?: SourceTable[];
  timing?: Partial<CaptureTiming>;
};

/**
 * Several captures over one in-memory store. Nothing runs in the background:
 * tests drive the loops through {@link tick}.
 */
export class TestCluster {
  readonly storage = new MemoryControlPlaneStorage();
  readonly source: StaticSourceSchema;
  readonly pipelines: TestPipelineFactory;
  readonly timing: CaptureTiming;
  nodes: CaptureNode[] = [];

  constructor(options: TestClusterOptions = {}) {
    this.source = new StaticSourceSchema(options.tables ?? sourceTables(1, 2, 3, 4));
    this.pipelines = new TestPipelineFactory(this.source);
    this.timing = { ...TEST_TIMING, ...options.timing };
  }

  static async start(options: TestClusterOptions = {}) {
    const cluster = new TestCluster(options);
    for (let i = 0; i < (options.captures ?? 2); i++) {
      await cluster.addCapture();
    }
    return cluster;
  }

  async addCapture() {
    const node = new CaptureNode({
      storage: this.storage,
      pipelines: this.pipelines,
      address: `127.0.0.1:${8300 + this.nodes.length}`,
      version: 'test',
      timing: this.timing
    });
    await node.start();
    this.nodes.push(node);
    return node;
  }

  /**
   * Stops ticking a capture without deregistering it, as if the process died.
   */
  crash(node: CaptureNode) {
    this.nodes = this.nodes.filter((n) => n != node);
  }

  api(node: CaptureNode = this.nodes[0]) {
    return new ControlAPI({
      storage: this.storage,
      capture: node,
      source: this.source,
      sinks: offlineSinks(),
      version: 'test',
      git_hash: 'test-hash'
    });
  }

  get owner() {
    return this.nodes.find((n) => n.isOwner) ?? null;
  }

  /**
   * Runs the given number of rounds. Each round heartbeats every capture, then runs the
   * owner loops, then the processor loops.
   */
  async tick(rounds = 1) {
    for (let i = 0; i < rounds; i++) {
      for (const node of this.nodes) {
        await node.heartbeat();
      }
      for (const node of this.nodes) {
        await node.ownerTick();
      }
      for (const node of this.nodes) {
        await node.processorTick();
      }
    }
  }

  /**
   * Table ids per capture id, for one changefeed, as reported by the processor records.
   */
  async reportedTables(changefeed_id: string) {
    const processors = await this.storage.listProcessors({ changefeed_id });
    return Object.fromEntries(processors.map((p) => [p.capture_id, p.table_ids]));
  }

  async stop() {
    for (const node of this.nodes) {
      await node.stop();
    }
  }
}
