import * as types from '@changeplane/service-types';
import { formatTs } from '../changefeed/changefeed-state.js';
import { maskStorageURI } from '../changefeed/consistent-config.js';
import { AdminJob, ChangefeedInfo, ProcessorInfo, RunningError } from '../storage/model.js';

export const serializeError = (error: RunningError): types.RunningError => ({
  code: error.code,
  message: error.message,
  time: error.time.toISOString()
});

export const serializeChangefeed = (cf: ChangefeedInfo): types.ChangefeedCommonInfo => ({
  id: cf.id,
  state: cf.state,
  checkpoint_ts: cf.checkpoint_ts,
  checkpoint_time: formatTs(cf.checkpoint_ts),
  error: cf.error ? serializeError(cf.error) : undefined
});

export const serializeChangefeedDetail = (cf: ChangefeedInfo, processors: ProcessorInfo[]): types.ChangefeedDetail => ({
  ...serializeChangefeed(cf),
  sink_uri: cf.sink_uri,
  create_time: cf.create_time.toISOString(),
  start_ts: cf.start_ts,
  config: {
    ignore_ineligible_table: cf.config.ignore_ineligible_table,
    consistent: { ...cf.config.consistent, storage: maskStorageURI(cf.config.consistent.storage) }
  },
  table_ids: cf.table_ids,
  removed_at: cf.removed_at?.toISOString(),
  task_status: processors
    .filter((p) => p.table_ids.length > 0)
    .map((p) => ({ capture_id: p.capture_id, table_ids: p.table_ids }))
});

export const serializeAdminJob = (job: AdminJob): types.AdminJobInfo => ({
  id: job.id,
  seq: job.seq,
  type: job.type,
  state: job.state,
  table_id: job.table_id ?? undefined,
  capture_id: job.capture_id ?? undefined,
  error: job.error ? serializeError(job.error) : undefined,
  created_at: job.created_at.toISOString(),
  updated_at: job.updated_at.toISOString()
});

export const serializeProcessor = (processor: ProcessorInfo): types.ProcessorDetail => ({
  status: processor.status,
  checkpoint_ts: processor.checkpoint_ts,
  resolved_ts: processor.resolved_ts,
  table_ids: processor.table_ids,
  error: processor.error ? serializeError(processor.error) : undefined
});
