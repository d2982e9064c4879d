import { Logger, ProcessorFatalError } from '@changeplane/lib-services-framework';
import _ from 'lodash';
import { TablePipeline, TablePipelineFactory, TablePipelineStatus } from '../pipeline/TablePipeline.js';
import { ControlPlaneStorage } from '../storage/ControlPlaneStorage.js';
import {
  ChangefeedState,
  ProcessorStatus,
  RunningError,
  TableAckState,
  TablePhase,
  TableTask,
  toRunningError
} from '../storage/model.js';

export type ProcessorManagerOptions = {
  capture_id: string;
  storage: ControlPlaneStorage;
  pipelines: TablePipelineFactory;
  logger: Logger;
};

/**
 * Local state of the processor of one changefeed on this capture.
 */
type LocalProcessor = {
  changefeed_id: string;
  tables: Map<number, TablePipeline>;
  error: RunningError | null;
  error_reported: boolean;
  record_written: boolean;
};

const toErrorPayload = (description: string, cause: unknown) => {
  const error = new ProcessorFatalError(description, cause);
  return toRunningError(error.code, cause instanceof Error ? `${description}: ${cause.message}` : description);
};

/**
 * Runs the table tasks assigned to one capture.
 *
 * Only starts a table after winning the compare-and-set claim on its task, and only
 * acknowledges a release after the table stopped.
 */
export class ProcessorManager {
  private processors = new Map<string, LocalProcessor>();

  constructor(private options: ProcessorManagerOptions) {}

  get capture_id() {
    return this.options.capture_id;
  }

  /**
   * Tables running on this capture, by changefeed.
   */
  get runningTables(): Record<string, number[]> {
    return Object.fromEntries(
      [...this.processors.values()]
        .filter((p) => p.tables.size > 0)
        .map((p) => [p.changefeed_id, _.sortBy([...p.tables.keys()])])
    );
  }

  async tick() {
    const { storage, capture_id } = this.options;
    const tasks = await storage.listTableTasks({ capture_id });

    const keep = new Set<string>();
    const releases: TableTask[] = [];
    for (const task of tasks) {
      const local = this.processors.get(task.changefeed_id);
      const pipeline = local?.tables.get(task.table_id);

      if (task.phase == TablePhase.RELEASING) {
        if (local && pipeline) {
          await this.stopTable(local, task.table_id, pipeline);
        }
        if (task.state != TableAckState.STOPPED) {
          releases.push(task);
        }
        continue;
      }

      if (pipeline) {
        keep.add(`${task.changefeed_id}/${task.table_id}`);
        continue;
      }
      if (local?.error) {
        // A failed processor starts nothing until its changefeed is revoked.
        continue;
      }
      if (task.state == TableAckState.PENDING) {
        const claimed = await storage.ackTableTask({
          changefeed_id: task.changefeed_id,
          table_id: task.table_id,
          capture_id,
          phase: TablePhase.ASSIGNED,
          from: [TableAckState.PENDING],
          to: TableAckState.RUNNING
        });
        if (!claimed) {
          continue;
        }
      }
      if (await this.startTable(task)) {
        keep.add(`${task.changefeed_id}/${task.table_id}`);
      }
    }

    // Tables whose task vanished or moved away without a release.
    for (const local of this.processors.values()) {
      for (const [table_id, pipeline] of local.tables) {
        if (!keep.has(`${local.changefeed_id}/${table_id}`)) {
          await this.stopTable(local, table_id, pipeline);
        }
      }
    }

    const statuses = await this.pollTables();
    await this.writeProcessors(statuses, new Set(tasks.map((t) => t.changefeed_id)));

    for (const task of releases) {
      await storage.ackTableTask({
        changefeed_id: task.changefeed_id,
        table_id: task.table_id,
        capture_id,
        phase: TablePhase.RELEASING,
        from: [TableAckState.PENDING, TableAckState.RUNNING],
        to: TableAckState.STOPPED
      });
    }
  }

  /**
   * Stops every table and removes the processor records of this capture.
   */
  async stopAll() {
    for (const local of this.processors.values()) {
      for (const [table_id, pipeline] of local.tables) {
        await this.stopTable(local, table_id, pipeline);
      }
      if (local.record_written) {
        await this.options.storage.deleteProcessor(local.changefeed_id, this.capture_id);
      }
    }
    this.processors.clear();
  }

  private localProcessor(changefeed_id: string): LocalProcessor {
    let local = this.processors.get(changefeed_id);
    if (local == null) {
      local = { changefeed_id, tables: new Map(), error: null, error_reported: false, record_written: false };
      this.processors.set(changefeed_id, local);
    }
    return local;
  }

  private async startTable(task: TableTask): Promise<boolean> {
    const { storage, pipelines, logger, capture_id } = this.options;
    const changefeed = await storage.getChangefeed(task.changefeed_id);
    if (changefeed == null || changefeed.state != ChangefeedState.NORMAL) {
      // The owner revokes the task on its next round.
      return false;
    }
    const local = this.localProcessor(task.changefeed_id);
    const pipeline = pipelines.create({
      changefeed,
      table_id: task.table_id,
      capture_id,
      start_ts: changefeed.checkpoint_ts
    });
    try {
      await pipeline.start();
    } catch (e) {
      logger.error(`Failed to start table ${task.table_id} of ${task.changefeed_id}`, e);
      local.error = toErrorPayload(`table ${task.table_id} failed to start`, e);
      return false;
    }
    local.tables.set(task.table_id, pipeline);
    logger.info(`Started table ${task.table_id} of ${task.changefeed_id} at ${changefeed.checkpoint_ts}`);
    return true;
  }

  private async stopTable(local: LocalProcessor, table_id: number, pipeline: TablePipeline) {
    local.tables.delete(table_id);
    await pipeline.stop();
    this.options.logger.info(`Stopped table ${table_id} of ${local.changefeed_id}`);
  }

  private async pollTables() {
    const statuses = new Map<string, TablePipelineStatus[]>();
    for (const local of this.processors.values()) {
      const reported: TablePipelineStatus[] = [];
      for (const [table_id, pipeline] of local.tables) {
        const status = await pipeline.status();
        if (status.error) {
          this.options.logger.error(`Table ${table_id} of ${local.changefeed_id} failed`, status.error);
          local.error ??= toErrorPayload(`table ${table_id} failed`, status.error);
          await this.stopTable(local, table_id, pipeline);
          continue;
        }
        reported.push(status);
      }
      statuses.set(local.changefeed_id, reported);
    }
    return statuses;
  }

  private async writeProcessors(statuses: Map<string, TablePipelineStatus[]>, assigned: Set<string>) {
    const { storage, capture_id } = this.options;
    for (const local of [...this.processors.values()]) {
      const reported = statuses.get(local.changefeed_id) ?? [];
      const record = {
        changefeed_id: local.changefeed_id,
        capture_id,
        table_ids: _.sortBy([...local.tables.keys()]),
        checkpoint_ts: _.min(reported.map((s) => s.checkpoint_ts)) ?? 0,
        resolved_ts: _.min(reported.map((s) => s.resolved_ts)) ?? 0,
        updated_at: new Date()
      };

      if (local.error) {
        if (!local.error_reported) {
          await storage.putProcessor({ ...record, status: ProcessorStatus.ERROR, error: local.error });
          local.error_reported = true;
          local.record_written = true;
        } else if (local.tables.size == 0 && !assigned.has(local.changefeed_id)) {
          // Revoked. The owner clears the error report.
          this.processors.delete(local.changefeed_id);
        }
      } else if (local.tables.size > 0) {
        await storage.putProcessor({ ...record, status: ProcessorStatus.RUNNING, error: null });
        local.record_written = true;
      } else {
        if (local.record_written) {
          await storage.deleteProcessor(local.changefeed_id, capture_id);
        }
        this.processors.delete(local.changefeed_id);
      }
    }
  }
}
