import { ChangefeedInfo } from '../storage/model.js';
import { SourceSchema } from '../source/SourceSchema.js';

export type TablePipelineStatus = {
  checkpoint_ts: number;
  resolved_ts: number;
  /**
   * Set once the pipeline failed unrecoverably. The pipeline does not recover by itself.
   */
  error?: Error;
};

/**
 * Moves the change events of one table of one changefeed to its sink.
 */
export interface TablePipeline {
  readonly table_id: number;
  start(): Promise<void>;
  /**
   * Polled on every processor tick.
   */
  status(): Promise<TablePipelineStatus>;
  stop(): Promise<void>;
}

export type CreateTablePipelineOptions = {
  changefeed: ChangefeedInfo;
  table_id: number;
  capture_id: string;
  /**
   * Progress to resume from.
   */
  start_ts: number;
};

export interface TablePipelineFactory {
  create(options: CreateTablePipelineOptions): TablePipeline;
}

/**
 * A pipeline without a transport: it reports the upstream timestamp as its progress.
 */
export class IdleTablePipeline implements TablePipeline {
  private checkpoint_ts: number;

  constructor(
    readonly table_id: number,
    start_ts: number,
    private source: SourceSchema
  ) {
    this.checkpoint_ts = start_ts;
  }

  async start() {}

  /**
   * Progress follows the upstream timestamp and never goes backwards.
   */
  async status(): Promise<TablePipelineStatus> {
    this.checkpoint_ts = Math.max(this.checkpoint_ts, await this.source.currentTs());
    return { checkpoint_ts: this.checkpoint_ts, resolved_ts: this.checkpoint_ts };
  }

  async stop() {}
}

export class IdleTablePipelineFactory implements TablePipelineFactory {
  constructor(private source: SourceSchema) {}

  create(options: CreateTablePipelineOptions): TablePipeline {
    return new IdleTablePipeline(options.table_id, options.start_ts, this.source);
  }
}
