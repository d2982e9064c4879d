import {
  CaptureNotFoundError,
  ChangefeedAlreadyExistsError,
  ChangefeedNotFoundError,
  ChangefeedUpdateRefusedError,
  errors,
  isLogLevel,
  logger,
  setLogLevel,
  StorageUnavailableError,
  TableHandOffInProgressError,
  TableIneligibleError,
  TableNotFoundError,
  ValidationError
} from '@changeplane/lib-services-framework';
import * as types from '@changeplane/service-types';
import * as uuid from 'uuid';
import { CaptureNode } from '../capture/CaptureNode.js';
import { isValidChangefeedId, isValidTs, MAX_TS } from '../changefeed/changefeed-state.js';
import { resolveConsistentConfig } from '../changefeed/consistent-config.js';
import { SinkValidator } from '../sink/SinkValidator.js';
import { qualifiedTableName, SourceSchema } from '../source/SourceSchema.js';
import { ControlPlaneStorage } from '../storage/ControlPlaneStorage.js';
import {
  AdminJob,
  AdminJobType,
  ChangefeedInfo,
  ChangefeedState,
  ProcessorStatus,
  TablePhase
} from '../storage/model.js';
import * as serialize from './serialize.js';

export type ControlAPIOptions = {
  storage: ControlPlaneStorage;
  capture: CaptureNode;
  source: SourceSchema;
  sinks: SinkValidator;
  version: string;
  git_hash: string;
};

export type ChangefeedListFilter = types.api_routes.ListChangefeedsRequest['state'];

/**
 * The operations behind the HTTP API.
 *
 * Everything here validates synchronously against the store and either writes a registry
 * record or enqueues an admin job for the owner. Nothing waits for the owner.
 */
export class ControlAPI {
  constructor(private options: ControlAPIOptions) {}

  private get storage() {
    return this.options.storage;
  }

  async createChangefeed(request: types.api_routes.CreateChangefeedRequest): Promise<ChangefeedInfo> {
    const id = request.changefeed_id ?? uuid.v4();
    if (!isValidChangefeedId(id)) {
      throw new ValidationError(`invalid changefeed id ${JSON.stringify(id)}`);
    }
    if (request.start_ts != null && !isValidTs(request.start_ts)) {
      throw new ValidationError(`invalid start_ts ${request.start_ts}, expected an integer between 0 and ${MAX_TS}`);
    }
    if ((await this.storage.getChangefeed(id)) != null) {
      // Also covers removed changefeeds that have not been purged yet.
      throw new ChangefeedAlreadyExistsError(id);
    }

    const consistent = resolveConsistentConfig(request.consistent);
    await this.options.sinks.validate(request.sink_uri);

    const ignore_ineligible_table = request.ignore_ineligible_table ?? false;
    const tables = await this.options.source.listTables();
    const ineligible = tables.filter((t) => !t.eligible);
    if (ineligible.length > 0 && !ignore_ineligible_table) {
      throw new TableIneligibleError(ineligible.map(qualifiedTableName));
    }

    const start_ts = request.start_ts ?? (await this.options.source.currentTs());
    const now = new Date();
    const info: ChangefeedInfo = {
      id,
      sink_uri: request.sink_uri,
      config: { ignore_ineligible_table, consistent },
      state: ChangefeedState.NORMAL,
      error: null,
      create_time: now,
      start_ts,
      table_ids: tables.filter((t) => t.eligible).map((t) => t.table_id),
      checkpoint_ts: start_ts,
      removed_at: null,
      updated_at: now
    };
    await this.storage.createChangefeed(info);
    logger.info(`Created changefeed ${id} with ${info.table_ids.length} table(s)`);
    return info;
  }

  /**
   * Without a filter, every changefeed except removed ones.
   */
  async listChangefeeds(state?: ChangefeedListFilter): Promise<types.ChangefeedCommonInfo[]> {
    const changefeeds = await this.storage.listChangefeeds();
    return changefeeds
      .filter((cf) => {
        if (state == 'all') {
          return true;
        } else if (state == null) {
          return cf.state != ChangefeedState.REMOVED;
        }
        return cf.state == state;
      })
      .map(serialize.serializeChangefeed);
  }

  async getChangefeed(id: string): Promise<types.ChangefeedDetail> {
    const cf = await this.requireChangefeed(id);
    const processors = await this.storage.listProcessors({ changefeed_id: id });
    return serialize.serializeChangefeedDetail(cf, processors);
  }

  /**
   * Changes the sink or configuration of a stopped changefeed.
   */
  async updateChangefeed(request: types.api_routes.UpdateChangefeedRequest): Promise<void> {
    const cf = await this.requireChangefeed(request.changefeed_id);
    if (cf.state != ChangefeedState.STOPPED) {
      throw new ChangefeedUpdateRefusedError(cf.id, `only stopped changefeeds can be updated, state is ${cf.state}`);
    }
    const consistent = resolveConsistentConfig(request.consistent, cf.config.consistent);
    if (request.sink_uri != null) {
      await this.options.sinks.validate(request.sink_uri);
    }
    const updated = await this.storage.updateChangefeed(
      cf.id,
      {
        sink_uri: request.sink_uri ?? cf.sink_uri,
        config: {
          ignore_ineligible_table: request.ignore_ineligible_table ?? cf.config.ignore_ineligible_table,
          consistent
        }
      },
      { expected_state: [ChangefeedState.STOPPED] }
    );
    if (updated == null) {
      throw new ChangefeedUpdateRefusedError(cf.id, 'changefeed state changed during the update');
    }
  }

  async pauseChangefeed(id: string): Promise<AdminJob> {
    await this.requireActiveChangefeed(id);
    return this.storage.enqueueAdminJob({ changefeed_id: id, type: AdminJobType.PAUSE });
  }

  async resumeChangefeed(id: string): Promise<AdminJob> {
    await this.requireActiveChangefeed(id);
    return this.storage.enqueueAdminJob({ changefeed_id: id, type: AdminJobType.RESUME });
  }

  async removeChangefeed(id: string): Promise<AdminJob> {
    await this.requireChangefeed(id);
    return this.storage.enqueueAdminJob({ changefeed_id: id, type: AdminJobType.REMOVE });
  }

  async listAdminJobs(id: string): Promise<types.AdminJobInfo[]> {
    await this.requireChangefeed(id);
    const jobs = await this.storage.listAdminJobs({ changefeed_id: id });
    return jobs.map(serialize.serializeAdminJob);
  }

  async moveTable(request: types.api_routes.MoveTableRequest): Promise<AdminJob> {
    const { changefeed_id, capture_id, table_id } = request;
    const cf = await this.requireActiveChangefeed(changefeed_id);
    if (capture_id == '' || !(await this.isLiveCapture(capture_id))) {
      throw new CaptureNotFoundError(capture_id);
    }
    if (!cf.table_ids.includes(table_id)) {
      throw new TableNotFoundError(changefeed_id, table_id);
    }

    const tasks = await this.storage.listTableTasks({ changefeed_id });
    if (tasks.some((t) => t.table_id == table_id && t.phase == TablePhase.RELEASING)) {
      throw new TableHandOffInProgressError(changefeed_id, table_id);
    }

    return this.storage.enqueueAdminJob({ changefeed_id, type: AdminJobType.MOVE_TABLE, table_id, capture_id });
  }

  async rebalanceTables(id: string): Promise<AdminJob> {
    await this.requireActiveChangefeed(id);
    return this.storage.enqueueAdminJob({ changefeed_id: id, type: AdminJobType.REBALANCE });
  }

  /**
   * Resigns if this capture is the owner. Otherwise nothing happens.
   */
  async resignOwner(): Promise<void> {
    await this.options.capture.resign();
  }

  async listCaptures(): Promise<types.CaptureListEntry[]> {
    const owner = await this.options.capture.leaseElector.currentOwner();
    const now = Date.now();
    const captures = await this.storage.listCaptures();
    return captures
      .filter((c) => c.expires_at.getTime() > now)
      .map((c) => ({ id: c.id, is_owner: owner?.capture_id == c.id, address: c.address }));
  }

  async listProcessors(): Promise<types.ProcessorListEntry[]> {
    const processors = await this.storage.listProcessors();
    return processors.map((p) => ({ changefeed_id: p.changefeed_id, capture_id: p.capture_id }));
  }

  /**
   * A live capture without tables of the changefeed has an empty, stopped processor.
   */
  async getProcessor(changefeed_id: string, capture_id: string): Promise<types.ProcessorDetail> {
    const cf = await this.requireChangefeed(changefeed_id);
    const [processor] = await this.storage.listProcessors({ changefeed_id, capture_id });
    if (processor) {
      return serialize.serializeProcessor(processor);
    }
    if (!(await this.isLiveCapture(capture_id))) {
      throw new CaptureNotFoundError(capture_id);
    }
    return {
      status: ProcessorStatus.STOPPED,
      checkpoint_ts: cf.checkpoint_ts,
      resolved_ts: cf.checkpoint_ts,
      table_ids: []
    };
  }

  /**
   * @throws StorageUnavailableError if the store cannot be reached
   */
  async health(): Promise<void> {
    try {
      await this.storage.ping();
    } catch (e) {
      if (errors.isServiceError(e)) {
        throw e;
      }
      throw new StorageUnavailableError('coordination store is unreachable', e);
    }
  }

  async status(): Promise<types.ServerStatus> {
    const { capture, version, git_hash } = this.options;
    const owner = await capture.leaseElector.currentOwner();
    return {
      version,
      git_hash,
      id: capture.id,
      pid: process.pid,
      is_owner: owner?.capture_id == capture.id
    };
  }

  setLogLevel(level: string) {
    if (!isLogLevel(level)) {
      throw new ValidationError(`unknown log level ${JSON.stringify(level)}`);
    }
    setLogLevel(level);
    logger.info(`Log level set to ${level}`);
  }

  private async requireChangefeed(id: string): Promise<ChangefeedInfo> {
    const cf = await this.storage.getChangefeed(id);
    if (cf == null) {
      throw new ChangefeedNotFoundError(id);
    }
    return cf;
  }

  /**
   * An existing changefeed that has not been removed.
   */
  private async requireActiveChangefeed(id: string): Promise<ChangefeedInfo> {
    const cf = await this.requireChangefeed(id);
    if (cf.state == ChangefeedState.REMOVED) {
      throw new ChangefeedUpdateRefusedError(id, 'changefeed has been removed');
    }
    return cf;
  }

  private async isLiveCapture(capture_id: string) {
    const captures = await this.storage.listCaptures();
    const now = Date.now();
    return captures.some((c) => c.id == capture_id && c.expires_at.getTime() > now);
  }
}
