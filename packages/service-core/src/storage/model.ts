import { ChangefeedState, ConsistentConfig } from '@changeplane/service-types';

export { ChangefeedState };

/**
 * Error payload attached to a changefeed in state `error`, to a failed admin job, or to a processor.
 */
export type RunningError = {
  code: string;
  message: string;
  time: Date;
};

export type ChangefeedConfig = {
  ignore_ineligible_table: boolean;
  consistent: ConsistentConfig;
};

export interface ChangefeedInfo {
  id: string;
  sink_uri: string;
  config: ChangefeedConfig;
  state: ChangefeedState;
  /**
   * Present iff state is `error`.
   */
  error: RunningError | null;
  create_time: Date;
  start_ts: number;
  /**
   * Eligible source tables at creation time.
   */
  table_ids: number[];
  /**
   * Minimum progress over all running tables. Never decreases.
   */
  checkpoint_ts: number;
  removed_at: Date | null;
  updated_at: Date;
}

export interface CaptureInfo {
  id: string;
  address: string;
  version: string;
  started_at: Date;
  /**
   * Liveness deadline, extended by every heartbeat.
   */
  expires_at: Date;
}

/**
 * The single authoritative owner lease.
 */
export type OwnerRecord = {
  capture_id: string;
  lease_id: string;
  expires_at: Date;
};

/**
 * Proof of leadership, passed to every owner-fenced write.
 */
export type OwnerToken = {
  capture_id: string;
  lease_id: string;
};

export enum TablePhase {
  ASSIGNED = 'assigned',
  RELEASING = 'releasing'
}

/**
 * Acknowledgement written by the processor holding the task.
 */
export enum TableAckState {
  PENDING = 'pending',
  RUNNING = 'running',
  STOPPED = 'stopped'
}

export interface TableTask {
  changefeed_id: string;
  table_id: number;
  capture_id: string;
  phase: TablePhase;
  /**
   * Capture that receives the table once the current holder released it.
   */
  move_target: string | null;
  state: TableAckState;
  /**
   * Incremented on every owner write.
   */
  revision: number;
  updated_at: Date;
}

export enum ProcessorStatus {
  RUNNING = 'running',
  STOPPED = 'stopped',
  ERROR = 'error'
}

export interface ProcessorInfo {
  changefeed_id: string;
  capture_id: string;
  table_ids: number[];
  status: ProcessorStatus;
  checkpoint_ts: number;
  resolved_ts: number;
  error: RunningError | null;
  updated_at: Date;
}

export enum AdminJobType {
  PAUSE = 'pause',
  RESUME = 'resume',
  REMOVE = 'remove',
  MOVE_TABLE = 'move_table',
  REBALANCE = 'rebalance'
}

export enum AdminJobState {
  QUEUED = 'queued',
  APPLYING = 'applying',
  DONE = 'done',
  FAILED = 'failed'
}

export interface AdminJob {
  id: string;
  /**
   * Global, monotonically increasing. Jobs of one changefeed are applied in `seq` order.
   */
  seq: number;
  changefeed_id: string;
  type: AdminJobType;
  table_id: number | null;
  capture_id: string | null;
  state: AdminJobState;
  error: RunningError | null;
  created_at: Date;
  updated_at: Date;
}

export type NewAdminJob = {
  changefeed_id: string;
  type: AdminJobType;
  table_id?: number;
  capture_id?: string;
};

export const toRunningError = (code: string, message: string): RunningError => {
  return { code, message, time: new Date() };
};
