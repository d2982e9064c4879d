import * as lib_mongo from '@changeplane/lib-service-mongodb';
import { mongo } from '@changeplane/lib-service-mongodb';
import {
  ChangefeedAlreadyExistsError,
  LockManager,
  LockManagerParams,
  OwnerLeaseLostError,
  ServiceAssertionError
} from '@changeplane/lib-services-framework';
import { storage } from '@changeplane/service-core';
import * as uuid from 'uuid';

import { ControlPlaneMongo } from './implementation/db.js';
import {
  AdminJobDocument,
  adminJobFromDocument,
  captureFromDocument,
  captureToDocument,
  ChangefeedDocument,
  changefeedFromDocument,
  changefeedToDocument,
  processorFromDocument,
  ProcessorDocument,
  processorId,
  processorToDocument,
  TableTaskDocument,
  tableTaskFromDocument,
  taskId
} from './implementation/models.js';

const DUPLICATE_KEY = 11000;

/**
 * Coordination store backed by MongoDB. Every capture of a cluster connects to the same database.
 *
 * Owner-fenced writes check the owner lock document before writing. The check and the write
 * are separate operations, so a write can land just after the lease expired.
 */
export class MongoControlPlaneStorage implements storage.ControlPlaneStorage {
  constructor(readonly db: ControlPlaneMongo) {}

  async createChangefeed(info: storage.ChangefeedInfo): Promise<void> {
    try {
      await this.db.changefeeds.insertOne(changefeedToDocument(info));
    } catch (e) {
      if (lib_mongo.isMongoServerError(e) && e.code == DUPLICATE_KEY) {
        throw new ChangefeedAlreadyExistsError(info.id);
      }
      throw lib_mongo.mapQueryError(e, 'creating changefeed');
    }
  }

  async getChangefeed(id: string): Promise<storage.ChangefeedInfo | null> {
    const doc = await this.query('reading changefeed', () => this.db.changefeeds.findOne({ _id: id }));
    return doc ? changefeedFromDocument(doc) : null;
  }

  async listChangefeeds(): Promise<storage.ChangefeedInfo[]> {
    const docs = await this.query('listing changefeeds', () =>
      this.db.changefeeds.find({}).sort({ create_time: 1 }).toArray()
    );
    return docs.map(changefeedFromDocument);
  }

  async updateChangefeed(
    id: string,
    update: storage.ChangefeedUpdate,
    options?: storage.ChangefeedUpdateOptions
  ): Promise<storage.ChangefeedInfo | null> {
    return this.query('updating changefeed', async () => {
      if (options?.owner) {
        await this.verifyOwner(options.owner);
      }
      const filter: mongo.Filter<ChangefeedDocument> = { _id: id };
      if (options?.expected_state) {
        filter.state = { $in: options.expected_state };
      }
      const doc = await this.db.changefeeds.findOneAndUpdate(
        filter,
        { $set: { ...update, updated_at: new Date() } },
        { returnDocument: 'after' }
      );
      return doc ? changefeedFromDocument(doc) : null;
    });
  }

  async deleteChangefeed(owner: storage.OwnerToken, id: string): Promise<void> {
    await this.query('deleting changefeed', async () => {
      await this.verifyOwner(owner);
      await this.db.changefeeds.deleteOne({ _id: id });
      await this.db.admin_jobs.deleteMany({ changefeed_id: id });
    });
  }

  async enqueueAdminJob(job: storage.NewAdminJob): Promise<storage.AdminJob> {
    return this.query('enqueueing admin job', async () => {
      const sequence = await this.db.id_sequences.findOneAndUpdate(
        { _id: 'admin_jobs' },
        { $inc: { value: 1 } },
        { upsert: true, returnDocument: 'after' }
      );
      if (sequence == null) {
        throw new ServiceAssertionError('Admin job sequence was not created');
      }
      const now = new Date();
      const doc: AdminJobDocument = {
        _id: uuid.v4(),
        seq: sequence.value,
        changefeed_id: job.changefeed_id,
        type: job.type,
        table_id: job.table_id ?? null,
        capture_id: job.capture_id ?? null,
        state: storage.AdminJobState.QUEUED,
        error: null,
        created_at: now,
        updated_at: now
      };
      await this.db.admin_jobs.insertOne(doc);
      return adminJobFromDocument(doc);
    });
  }

  async listAdminJobs(filter?: storage.AdminJobFilter): Promise<storage.AdminJob[]> {
    const query: mongo.Filter<AdminJobDocument> = {};
    if (filter?.changefeed_id != null) {
      query.changefeed_id = filter.changefeed_id;
    }
    if (filter?.states != null) {
      query.state = { $in: filter.states };
    }
    const docs = await this.query('listing admin jobs', () =>
      this.db.admin_jobs.find(query).sort({ seq: 1 }).toArray()
    );
    return docs.map(adminJobFromDocument);
  }

  async updateAdminJob(owner: storage.OwnerToken, id: string, update: storage.AdminJobUpdate): Promise<void> {
    await this.query('updating admin job', async () => {
      await this.verifyOwner(owner);
      await this.db.admin_jobs.updateOne(
        { _id: id },
        { $set: { state: update.state, error: update.error, updated_at: new Date() } }
      );
    });
  }

  async registerCapture(info: storage.CaptureInfo): Promise<void> {
    await this.query('registering capture', () =>
      this.db.captures.replaceOne({ _id: info.id }, captureToDocument(info), { upsert: true })
    );
  }

  async heartbeatCapture(id: string, expires_at: Date): Promise<boolean> {
    const result = await this.query('heartbeating capture', () =>
      this.db.captures.updateOne({ _id: id }, { $set: { expires_at } })
    );
    return result.matchedCount > 0;
  }

  async deregisterCapture(id: string): Promise<void> {
    await this.query('deregistering capture', () => this.db.captures.deleteOne({ _id: id }));
  }

  async listCaptures(): Promise<storage.CaptureInfo[]> {
    const docs = await this.query('listing captures', () => this.db.captures.find({}).sort({ _id: 1 }).toArray());
    return docs.map(captureFromDocument);
  }

  createLockManager(params: LockManagerParams): LockManager {
    return new lib_mongo.locks.MongoLockManager({ ...params, collection: this.db.locks });
  }

  async listTableTasks(filter?: storage.TableTaskFilter): Promise<storage.TableTask[]> {
    const query: mongo.Filter<TableTaskDocument> = {};
    if (filter?.changefeed_id != null) {
      query.changefeed_id = filter.changefeed_id;
    }
    if (filter?.capture_id != null) {
      query.capture_id = filter.capture_id;
    }
    const docs = await this.query('listing table tasks', () =>
      this.db.table_tasks.find(query).sort({ changefeed_id: 1, table_id: 1 }).toArray()
    );
    return docs.map(tableTaskFromDocument);
  }

  async assignTableTask(owner: storage.OwnerToken, assignment: storage.TableAssignment): Promise<storage.TableTask> {
    return this.query('assigning table', async () => {
      await this.verifyOwner(owner);
      const doc = await this.db.table_tasks.findOneAndUpdate(
        { _id: taskId(assignment.changefeed_id, assignment.table_id) },
        {
          $set: {
            changefeed_id: assignment.changefeed_id,
            table_id: assignment.table_id,
            capture_id: assignment.capture_id,
            phase: storage.TablePhase.ASSIGNED,
            move_target: null,
            state: storage.TableAckState.PENDING,
            updated_at: new Date()
          },
          $inc: { revision: 1 }
        },
        { upsert: true, returnDocument: 'after' }
      );
      if (doc == null) {
        throw new ServiceAssertionError(`Table task ${assignment.changefeed_id}/${assignment.table_id} was not written`);
      }
      return tableTaskFromDocument(doc);
    });
  }

  async releaseTableTask(
    owner: storage.OwnerToken,
    changefeed_id: string,
    table_id: number,
    move_target: string | null
  ): Promise<storage.TableTask | null> {
    return this.query('releasing table', async () => {
      await this.verifyOwner(owner);
      const doc = await this.db.table_tasks.findOneAndUpdate(
        { _id: taskId(changefeed_id, table_id) },
        {
          $set: { phase: storage.TablePhase.RELEASING, move_target, updated_at: new Date() },
          $inc: { revision: 1 }
        },
        { returnDocument: 'after' }
      );
      return doc ? tableTaskFromDocument(doc) : null;
    });
  }

  async deleteTableTask(owner: storage.OwnerToken, changefeed_id: string, table_id: number): Promise<void> {
    await this.query('deleting table task', async () => {
      await this.verifyOwner(owner);
      await this.db.table_tasks.deleteOne({ _id: taskId(changefeed_id, table_id) });
    });
  }

  async ackTableTask(ack: storage.TableAck): Promise<boolean> {
    const result = await this.query('acknowledging table task', () =>
      this.db.table_tasks.updateOne(
        {
          _id: taskId(ack.changefeed_id, ack.table_id),
          capture_id: ack.capture_id,
          phase: ack.phase,
          state: { $in: ack.from }
        },
        { $set: { state: ack.to, updated_at: new Date() } }
      )
    );
    return result.matchedCount > 0;
  }

  async putProcessor(info: storage.ProcessorInfo): Promise<void> {
    const doc = processorToDocument(info);
    await this.query('writing processor', () => this.db.processors.replaceOne({ _id: doc._id }, doc, { upsert: true }));
  }

  async deleteProcessor(changefeed_id: string, capture_id: string): Promise<void> {
    await this.query('deleting processor', () =>
      this.db.processors.deleteOne({ _id: processorId(changefeed_id, capture_id) })
    );
  }

  async listProcessors(filter?: storage.ProcessorFilter): Promise<storage.ProcessorInfo[]> {
    const query: mongo.Filter<ProcessorDocument> = {};
    if (filter?.changefeed_id != null) {
      query.changefeed_id = filter.changefeed_id;
    }
    if (filter?.capture_id != null) {
      query.capture_id = filter.capture_id;
    }
    const docs = await this.query('listing processors', () =>
      this.db.processors.find(query).sort({ changefeed_id: 1, capture_id: 1 }).toArray()
    );
    return docs.map(processorFromDocument);
  }

  async ping(): Promise<void> {
    await this.query('pinging', () => this.db.db.command({ ping: 1 }));
  }

  private async verifyOwner(owner: storage.OwnerToken) {
    const lock = await this.db.locks.findOne({ _id: storage.OWNER_LOCK_NAME });
    const active = lock?.active_lock;
    if (
      active == null ||
      active.lock_id.toHexString() != owner.lease_id ||
      active.holder != owner.capture_id ||
      active.expires_at.getTime() <= Date.now()
    ) {
      throw new OwnerLeaseLostError(owner.capture_id);
    }
  }

  /**
   * Runs a query, mapping driver failures to `StorageUnavailableError`. Service errors pass through.
   */
  private async query<T>(context: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (e) {
      throw lib_mongo.mapQueryError(e, context);
    }
  }
}
