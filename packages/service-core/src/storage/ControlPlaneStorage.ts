import { LockManager, LockManagerParams } from '@changeplane/lib-services-framework';
import {
  AdminJob,
  AdminJobState,
  CaptureInfo,
  ChangefeedInfo,
  ChangefeedState,
  NewAdminJob,
  OwnerToken,
  ProcessorInfo,
  RunningError,
  TableAckState,
  TablePhase,
  TableTask
} from './model.js';

/**
 * Name of the lock backing the owner lease.
 */
export const OWNER_LOCK_NAME = 'owner';

export type ChangefeedUpdate = Partial<
  Pick<ChangefeedInfo, 'sink_uri' | 'config' | 'state' | 'error' | 'checkpoint_ts' | 'removed_at'>
>;

export type ChangefeedUpdateOptions = {
  /**
   * The update is only applied while the changefeed is in one of these states.
   */
  expected_state?: ChangefeedState[];
  /**
   * Fences the write: rejected with `OwnerLeaseLostError` unless the token is the current owner lease.
   */
  owner?: OwnerToken;
};

export type AdminJobFilter = {
  changefeed_id?: string;
  states?: AdminJobState[];
};

export type AdminJobUpdate = {
  state: AdminJobState;
  error?: RunningError | null;
};

export type TableTaskFilter = {
  changefeed_id?: string;
  capture_id?: string;
};

export type TableAssignment = {
  changefeed_id: string;
  table_id: number;
  capture_id: string;
};

export type TableAck = {
  changefeed_id: string;
  table_id: number;
  capture_id: string;
  phase: TablePhase;
  /**
   * The acknowledgement only applies while the task is in one of these states.
   */
  from: TableAckState[];
  to: TableAckState;
};

export type ProcessorFilter = {
  changefeed_id?: string;
  capture_id?: string;
};

/**
 * The coordination store. Every record the control plane shares between captures lives here.
 *
 * Each method is a single-document operation: a failed call leaves prior state intact.
 * Store faults surface as `StorageUnavailableError`.
 */
export interface ControlPlaneStorage {
  /**
   * @throws ChangefeedAlreadyExistsError
   */
  createChangefeed(info: ChangefeedInfo): Promise<void>;
  getChangefeed(id: string): Promise<ChangefeedInfo | null>;
  listChangefeeds(): Promise<ChangefeedInfo[]>;
  /**
   * @returns the updated changefeed, or null if it does not exist or is not in an expected state.
   */
  updateChangefeed(id: string, update: ChangefeedUpdate, options?: ChangefeedUpdateOptions): Promise<ChangefeedInfo | null>;
  /**
   * Purges a changefeed with its admin jobs. Owner-fenced.
   */
  deleteChangefeed(owner: OwnerToken, id: string): Promise<void>;

  /**
   * Appends a job with the next sequence number.
   */
  enqueueAdminJob(job: NewAdminJob): Promise<AdminJob>;
  /**
   * Jobs ordered by `seq`.
   */
  listAdminJobs(filter?: AdminJobFilter): Promise<AdminJob[]>;
  updateAdminJob(owner: OwnerToken, id: string, update: AdminJobUpdate): Promise<void>;

  registerCapture(info: CaptureInfo): Promise<void>;
  /**
   * @returns false if the capture is no longer registered.
   */
  heartbeatCapture(id: string, expires_at: Date): Promise<boolean>;
  deregisterCapture(id: string): Promise<void>;
  listCaptures(): Promise<CaptureInfo[]>;

  /**
   * Lock managers over the store's lock table. The owner lease is the lock named {@link OWNER_LOCK_NAME}.
   */
  createLockManager(params: LockManagerParams): LockManager;

  listTableTasks(filter?: TableTaskFilter): Promise<TableTask[]>;
  /**
   * Creates or replaces a task as `assigned` + `pending` on the given capture. Owner-fenced.
   */
  assignTableTask(owner: OwnerToken, assignment: TableAssignment): Promise<TableTask>;
  /**
   * Moves a task to `releasing`, keeping its acknowledgement state. Owner-fenced.
   * @returns null if the task does not exist.
   */
  releaseTableTask(
    owner: OwnerToken,
    changefeed_id: string,
    table_id: number,
    move_target: string | null
  ): Promise<TableTask | null>;
  deleteTableTask(owner: OwnerToken, changefeed_id: string, table_id: number): Promise<void>;
  /**
   * Compare-and-set of the processor acknowledgement.
   * @returns true if the task matched and was updated.
   */
  ackTableTask(ack: TableAck): Promise<boolean>;

  putProcessor(info: ProcessorInfo): Promise<void>;
  deleteProcessor(changefeed_id: string, capture_id: string): Promise<void>;
  listProcessors(filter?: ProcessorFilter): Promise<ProcessorInfo[]>;

  /**
   * @throws StorageUnavailableError if the store cannot be reached.
   */
  ping(): Promise<void>;
}
