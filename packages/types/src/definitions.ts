import * as t from 'ts-codec';

/**
 * Lifecycle state of a changefeed.
 */
export enum ChangefeedState {
  NORMAL = 'normal',
  STOPPED = 'stopped',
  REMOVED = 'removed',
  ERROR = 'error'
}

export const ChangefeedStateCodec = t.Enum(ChangefeedState);

/**
 * Consistency level of a changefeed. `eventual` writes a redo log that downstream
 * can be restored from to a consistent snapshot.
 */
export enum ConsistentLevel {
  NONE = 'none',
  EVENTUAL = 'eventual'
}

/**
 * Resolved redo log settings of a changefeed. Sizes are in MiB, intervals in milliseconds.
 */
export const ConsistentConfig = t.object({
  level: t.Enum(ConsistentLevel),
  max_log_size: t.number,
  flush_interval: t.number,
  meta_flush_interval: t.number,
  encoding_worker_num: t.number,
  flush_worker_num: t.number,
  storage: t.string,
  use_file_backend: t.boolean
});
export type ConsistentConfig = t.Encoded<typeof ConsistentConfig>;

export const RunningError = t.object({
  code: t.string,
  message: t.string,
  time: t.string
});
export type RunningError = t.Encoded<typeof RunningError>;

export const ChangefeedCommonInfo = t.object({
  id: t.string,
  state: ChangefeedStateCodec,
  checkpoint_ts: t.number,
  checkpoint_time: t.string.optional(),
  error: RunningError.optional()
});
export type ChangefeedCommonInfo = t.Encoded<typeof ChangefeedCommonInfo>;

export const TaskStatus = t.object({
  capture_id: t.string,
  table_ids: t.array(t.number)
});
export type TaskStatus = t.Encoded<typeof TaskStatus>;

export const ChangefeedDetail = ChangefeedCommonInfo.and(
  t.object({
    sink_uri: t.string,
    create_time: t.string,
    start_ts: t.number,
    config: t.object({
      ignore_ineligible_table: t.boolean,
      /**
       * Credentials in the redo storage URI are masked.
       */
      consistent: ConsistentConfig
    }),
    table_ids: t.array(t.number),
    removed_at: t.string.optional(),
    /**
     * Which capture runs which tables, from the processor reports.
     */
    task_status: t.array(TaskStatus)
  })
);
export type ChangefeedDetail = t.Encoded<typeof ChangefeedDetail>;

export const AdminJobInfo = t.object({
  id: t.string,
  seq: t.number,
  type: t.string,
  state: t.string,
  table_id: t.number.optional(),
  capture_id: t.string.optional(),
  error: RunningError.optional(),
  created_at: t.string,
  updated_at: t.string
});
export type AdminJobInfo = t.Encoded<typeof AdminJobInfo>;

export const CaptureListEntry = t.object({
  id: t.string,
  is_owner: t.boolean,
  address: t.string
});
export type CaptureListEntry = t.Encoded<typeof CaptureListEntry>;

export const ProcessorListEntry = t.object({
  changefeed_id: t.string,
  capture_id: t.string
});
export type ProcessorListEntry = t.Encoded<typeof ProcessorListEntry>;

export const ProcessorDetail = t.object({
  status: t.string,
  checkpoint_ts: t.number,
  resolved_ts: t.number,
  table_ids: t.array(t.number),
  error: RunningError.optional()
});
export type ProcessorDetail = t.Encoded<typeof ProcessorDetail>;

export const ServerStatus = t.object({
  version: t.string,
  git_hash: t.string,
  id: t.string,
  pid: t.number,
  is_owner: t.boolean
});
export type ServerStatus = t.Encoded<typeof ServerStatus>;

/**
 * Body of every non-2xx API response.
 */
export const ErrorResponse = t.object({
  error_code: t.string,
  error_msg: t.string
});
export type ErrorResponse = t.Encoded<typeof ErrorResponse>;
