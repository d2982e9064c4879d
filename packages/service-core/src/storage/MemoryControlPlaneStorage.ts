import {
  ChangefeedAlreadyExistsError,
  LockManager,
  LockManagerParams,
  MemoryLockManager,
  MemoryLockTable,
  OwnerLeaseLostError
} from '@changeplane/lib-services-framework';
import _ from 'lodash';
import * as uuid from 'uuid';
import {
  AdminJobFilter,
  AdminJobUpdate,
  ChangefeedUpdate,
  ChangefeedUpdateOptions,
  ControlPlaneStorage,
  OWNER_LOCK_NAME,
  ProcessorFilter,
  TableAck,
  TableAssignment,
  TableTaskFilter
} from './ControlPlaneStorage.js';
import {
  AdminJob,
  AdminJobState,
  CaptureInfo,
  ChangefeedInfo,
  NewAdminJob,
  OwnerToken,
  ProcessorInfo,
  TableAckState,
  TablePhase,
  TableTask
} from './model.js';

const taskKey = (changefeed_id: string, table_id: number) => `${changefeed_id}/${table_id}`;
const processorKey = (changefeed_id: string, capture_id: string) => `${changefeed_id}/${capture_id}`;

/**
 * Coordination store kept in process memory.
 *
 * Shared by every capture of a single process, which makes it suitable for
 * single-node deployments and for tests that run a whole cluster in one process.
 * Records are copied on the way in and out so callers never share mutable state.
 */
export class MemoryControlPlaneStorage implements ControlPlaneStorage {
  readonly locks: MemoryLockTable = new Map();

  private changefeeds = new Map<string, ChangefeedInfo>();
  private jobs = new Map<string, AdminJob>();
  private captures = new Map<string, CaptureInfo>();
  private tasks = new Map<string, TableTask>();
  private processors = new Map<string, ProcessorInfo>();
  private jobSeq = 0;

  /**
   * Set to simulate an unreachable store in {@link ping}.
   */
  unavailable: Error | null = null;

  async createChangefeed(info: ChangefeedInfo): Promise<void> {
    if (this.changefeeds.has(info.id)) {
      throw new ChangefeedAlreadyExistsError(info.id);
    }
    this.changefeeds.set(info.id, _.cloneDeep(info));
  }

  async getChangefeed(id: string): Promise<ChangefeedInfo | null> {
    const info = this.changefeeds.get(id);
    return info ? _.cloneDeep(info) : null;
  }

  async listChangefeeds(): Promise<ChangefeedInfo[]> {
    return _.sortBy([...this.changefeeds.values()], (cf) => cf.create_time.getTime()).map((cf) => _.cloneDeep(cf));
  }

  async updateChangefeed(
    id: string,
    update: ChangefeedUpdate,
    options?: ChangefeedUpdateOptions
  ): Promise<ChangefeedInfo | null> {
    if (options?.owner) {
      this.verifyOwner(options.owner);
    }
    const current = this.changefeeds.get(id);
    if (current == null) {
      return null;
    }
    if (options?.expected_state && !options.expected_state.includes(current.state)) {
      return null;
    }
    const updated: ChangefeedInfo = { ...current, ..._.cloneDeep(update), updated_at: new Date() };
    this.changefeeds.set(id, updated);
    return _.cloneDeep(updated);
  }

  async deleteChangefeed(owner: OwnerToken, id: string): Promise<void> {
    this.verifyOwner(owner);
    this.changefeeds.delete(id);
    for (const [jobId, job] of this.jobs) {
      if (job.changefeed_id == id) {
        this.jobs.delete(jobId);
      }
    }
  }

  async enqueueAdminJob(job: NewAdminJob): Promise<AdminJob> {
    const now = new Date();
    const created: AdminJob = {
      id: uuid.v4(),
      seq: ++this.jobSeq,
      changefeed_id: job.changefeed_id,
      type: job.type,
      table_id: job.table_id ?? null,
      capture_id: job.capture_id ?? null,
      state: AdminJobState.QUEUED,
      error: null,
      created_at: now,
      updated_at: now
    };
    this.jobs.set(created.id, created);
    return _.cloneDeep(created);
  }

  async listAdminJobs(filter?: AdminJobFilter): Promise<AdminJob[]> {
    const jobs = [...this.jobs.values()].filter(
      (job) =>
        (filter?.changefeed_id == null || job.changefeed_id == filter.changefeed_id) &&
        (filter?.states == null || filter.states.includes(job.state))
    );
    return _.sortBy(jobs, (job) => job.seq).map((job) => _.cloneDeep(job));
  }

  async updateAdminJob(owner: OwnerToken, id: string, update: AdminJobUpdate): Promise<void> {
    this.verifyOwner(owner);
    const job = this.jobs.get(id);
    if (job == null) {
      return;
    }
    this.jobs.set(id, {
      ...job,
      state: update.state,
      error: update.error === undefined ? job.error : _.cloneDeep(update.error),
      updated_at: new Date()
    });
  }

  async registerCapture(info: CaptureInfo): Promise<void> {
    this.captures.set(info.id, _.cloneDeep(info));
  }

  async heartbeatCapture(id: string, expires_at: Date): Promise<boolean> {
    const capture = this.captures.get(id);
    if (capture == null) {
      return false;
    }
    capture.expires_at = new Date(expires_at);
    return true;
  }

  async deregisterCapture(id: string): Promise<void> {
    this.captures.delete(id);
  }

  async listCaptures(): Promise<CaptureInfo[]> {
    return _.sortBy([...this.captures.values()], (c) => c.id).map((c) => _.cloneDeep(c));
  }

  createLockManager(params: LockManagerParams): LockManager {
    return new MemoryLockManager({ ...params, locks: this.locks });
  }

  async listTableTasks(filter?: TableTaskFilter): Promise<TableTask[]> {
    const tasks = [...this.tasks.values()].filter(
      (task) =>
        (filter?.changefeed_id == null || task.changefeed_id == filter.changefeed_id) &&
        (filter?.capture_id == null || task.capture_id == filter.capture_id)
    );
    return _.sortBy(tasks, [(task) => task.changefeed_id, (task) => task.table_id]).map((task) => ({ ...task }));
  }

  async assignTableTask(owner: OwnerToken, assignment: TableAssignment): Promise<TableTask> {
    this.verifyOwner(owner);
    const key = taskKey(assignment.changefeed_id, assignment.table_id);
    const task: TableTask = {
      ...assignment,
      phase: TablePhase.ASSIGNED,
      move_target: null,
      state: TableAckState.PENDING,
      revision: (this.tasks.get(key)?.revision ?? 0) + 1,
      updated_at: new Date()
    };
    this.tasks.set(key, task);
    return { ...task };
  }

  async releaseTableTask(
    owner: OwnerToken,
    changefeed_id: string,
    table_id: number,
    move_target: string | null
  ): Promise<TableTask | null> {
    this.verifyOwner(owner);
    const task = this.tasks.get(taskKey(changefeed_id, table_id));
    if (task == null) {
      return null;
    }
    task.phase = TablePhase.RELEASING;
    task.move_target = move_target;
    task.revision++;
    task.updated_at = new Date();
    return { ...task };
  }

  async deleteTableTask(owner: OwnerToken, changefeed_id: string, table_id: number): Promise<void> {
    this.verifyOwner(owner);
    this.tasks.delete(taskKey(changefeed_id, table_id));
  }

  async ackTableTask(ack: TableAck): Promise<boolean> {
    const task = this.tasks.get(taskKey(ack.changefeed_id, ack.table_id));
    if (task == null || task.capture_id != ack.capture_id || task.phase != ack.phase || !ack.from.includes(task.state)) {
      return false;
    }
    task.state = ack.to;
    task.updated_at = new Date();
    return true;
  }

  async putProcessor(info: ProcessorInfo): Promise<void> {
    this.processors.set(processorKey(info.changefeed_id, info.capture_id), _.cloneDeep(info));
  }

  async deleteProcessor(changefeed_id: string, capture_id: string): Promise<void> {
    this.processors.delete(processorKey(changefeed_id, capture_id));
  }

  async listProcessors(filter?: ProcessorFilter): Promise<ProcessorInfo[]> {
    const processors = [...this.processors.values()].filter(
      (p) =>
        (filter?.changefeed_id == null || p.changefeed_id == filter.changefeed_id) &&
        (filter?.capture_id == null || p.capture_id == filter.capture_id)
    );
    return _.sortBy(processors, [(p) => p.changefeed_id, (p) => p.capture_id]).map((p) => _.cloneDeep(p));
  }

  async ping(): Promise<void> {
    if (this.unavailable) {
      throw this.unavailable;
    }
  }

  private verifyOwner(owner: OwnerToken) {
    const lease = this.locks.get(OWNER_LOCK_NAME);
    if (
      lease == null ||
      lease.lock_id != owner.lease_id ||
      lease.holder != owner.capture_id ||
      lease.expires_at.getTime() <= Date.now()
    ) {
      throw new OwnerLeaseLostError(owner.capture_id);
    }
  }
}
