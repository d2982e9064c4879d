import { storage } from '@changeplane/service-core';

export interface ChangefeedDocument {
  _id: string;
  sink_uri: string;
  config: storage.ChangefeedConfig;
  state: storage.ChangefeedState;
  error: storage.RunningError | null;
  create_time: Date;
  start_ts: number;
  table_ids: number[];
  checkpoint_ts: number;
  removed_at: Date | null;
  updated_at: Date;
}

export interface AdminJobDocument {
  /**
   * uuid
   */
  _id: string;
  seq: number;
  changefeed_id: string;
  type: storage.AdminJobType;
  table_id: number | null;
  capture_id: string | null;
  state: storage.AdminJobState;
  error: storage.RunningError | null;
  created_at: Date;
  updated_at: Date;
}

export interface CaptureDocument {
  _id: string;
  address: string;
  version: string;
  started_at: Date;
  expires_at: Date;
}

export interface TableTaskDocument {
  /**
   * `${changefeed_id}/${table_id}`
   */
  _id: string;
  changefeed_id: string;
  table_id: number;
  capture_id: string;
  phase: storage.TablePhase;
  move_target: string | null;
  state: storage.TableAckState;
  revision: number;
  updated_at: Date;
}

export interface ProcessorDocument {
  /**
   * `${changefeed_id}/${capture_id}`
   */
  _id: string;
  changefeed_id: string;
  capture_id: string;
  table_ids: number[];
  status: storage.ProcessorStatus;
  checkpoint_ts: number;
  resolved_ts: number;
  error: storage.RunningError | null;
  updated_at: Date;
}

export interface IdSequenceDocument {
  _id: string;
  value: number;
}

export const taskId = (changefeed_id: string, table_id: number) => `${changefeed_id}/${table_id}`;
export const processorId = (changefeed_id: string, capture_id: string) => `${changefeed_id}/${capture_id}`;

export function changefeedToDocument(info: storage.ChangefeedInfo): ChangefeedDocument {
  const { id, ...rest } = info;
  return { _id: id, ...rest };
}

export function changefeedFromDocument(doc: ChangefeedDocument): storage.ChangefeedInfo {
  const { _id, ...rest } = doc;
  return { id: _id, ...rest };
}

export function adminJobFromDocument(doc: AdminJobDocument): storage.AdminJob {
  const { _id, ...rest } = doc;
  return { id: _id, ...rest };
}

export function captureToDocument(info: storage.CaptureInfo): CaptureDocument {
  const { id, ...rest } = info;
  return { _id: id, ...rest };
}

export function captureFromDocument(doc: CaptureDocument): storage.CaptureInfo {
  const { _id, ...rest } = doc;
  return { id: _id, ...rest };
}

export function tableTaskFromDocument(doc: TableTaskDocument): storage.TableTask {
  const { _id, ...rest } = doc;
  return rest;
}

export function processorToDocument(info: storage.ProcessorInfo): ProcessorDocument {
  return { _id: processorId(info.changefeed_id, info.capture_id), ...info };
}

export function processorFromDocument(doc: ProcessorDocument): storage.ProcessorInfo {
  const { _id, ...rest } = doc;
  return rest;
}
