import * as t from 'ts-codec';
import { ChangefeedState } from './definitions.js';

/**
 * Route parameters, query and body are merged into one object before validation.
 * Route parameters take precedence.
 */
export const ChangefeedIdParams = t.object({
  changefeed_id: t.string
});
export type ChangefeedIdParams = t.Encoded<typeof ChangefeedIdParams>;

/**
 * Unset or zero values take their defaults. The level is checked by the API, so that an
 * unknown level is reported as an invalid replica config.
 */
export const ConsistentConfigRequest = t.object({
  level: t.string.optional(),
  max_log_size: t.number.optional(),
  flush_interval: t.number.optional(),
  meta_flush_interval: t.number.optional(),
  encoding_worker_num: t.number.optional(),
  flush_worker_num: t.number.optional(),
  storage: t.string.optional(),
  use_file_backend: t.boolean.optional()
});
export type ConsistentConfigRequest = t.Encoded<typeof ConsistentConfigRequest>;

export const CreateChangefeedRequest = t.object({
  changefeed_id: t.string.optional(),
  sink_uri: t.string,
  start_ts: t.number.optional(),
  ignore_ineligible_table: t.boolean.optional(),
  consistent: ConsistentConfigRequest.optional()
});
export type CreateChangefeedRequest = t.Encoded<typeof CreateChangefeedRequest>;

export const UpdateChangefeedRequest = t.object({
  changefeed_id: t.string,
  sink_uri: t.string.optional(),
  ignore_ineligible_table: t.boolean.optional(),
  /**
   * Replaces the given fields of the current consistency config.
   */
  consistent: ConsistentConfigRequest.optional()
});
export type UpdateChangefeedRequest = t.Encoded<typeof UpdateChangefeedRequest>;

export const ListChangefeedsRequest = t.object({
  state: t.literal('all').or(t.Enum(ChangefeedState)).optional()
});
export type ListChangefeedsRequest = t.Encoded<typeof ListChangefeedsRequest>;

export const MoveTableRequest = t.object({
  changefeed_id: t.string,
  capture_id: t.string,
  table_id: t.number
});
export type MoveTableRequest = t.Encoded<typeof MoveTableRequest>;

export const GetProcessorRequest = t.object({
  changefeed_id: t.string,
  capture_id: t.string
});
export type GetProcessorRequest = t.Encoded<typeof GetProcessorRequest>;

export const SetLogLevelRequest = t.object({
  log_level: t.string
});
export type SetLogLevelRequest = t.Encoded<typeof SetLogLevelRequest>;
