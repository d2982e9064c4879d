import * as lib_mongo from '@changeplane/lib-service-mongodb';
import { mongo } from '@changeplane/lib-service-mongodb';

import {
  AdminJobDocument,
  CaptureDocument,
  ChangefeedDocument,
  IdSequenceDocument,
  ProcessorDocument,
  TableTaskDocument
} from './models.js';

export interface ControlPlaneMongoOptions {
  /**
   * Optional - uses the database from the MongoClient connection URI if not specified.
   */
  database?: string;
}

export class ControlPlaneMongo {
  readonly changefeeds: mongo.Collection<ChangefeedDocument>;
  readonly admin_jobs: mongo.Collection<AdminJobDocument>;
  readonly captures: mongo.Collection<CaptureDocument>;
  readonly table_tasks: mongo.Collection<TableTaskDocument>;
  readonly processors: mongo.Collection<ProcessorDocument>;
  readonly id_sequences: mongo.Collection<IdSequenceDocument>;
  readonly locks: mongo.Collection<lib_mongo.locks.Lock>;

  readonly client: mongo.MongoClient;
  readonly db: mongo.Db;

  constructor(client: mongo.MongoClient, options?: ControlPlaneMongoOptions) {
    this.client = client;

    // Optional fields of partial updates are left out instead of being written as null
    const db = client.db(options?.database, { ignoreUndefined: true });
    this.db = db;

    this.changefeeds = db.collection('changefeeds');
    this.admin_jobs = db.collection('admin_jobs');
    this.captures = db.collection('captures');
    this.table_tasks = db.collection('table_tasks');
    this.processors = db.collection('processors');
    this.id_sequences = db.collection('id_sequences');
    this.locks = db.collection('locks');
  }

  /**
   * Creates the indexes the scheduling queries need. Safe to call on every startup.
   */
  async createIndexes() {
    await this.admin_jobs.createIndex({ changefeed_id: 1, seq: 1 }, { name: 'changefeed_seq' });
    await this.admin_jobs.createIndex({ state: 1, seq: 1 }, { name: 'state_seq' });
    await this.table_tasks.createIndex({ changefeed_id: 1, table_id: 1 }, { name: 'changefeed_table' });
    await this.table_tasks.createIndex({ capture_id: 1 }, { name: 'capture' });
    await this.processors.createIndex({ capture_id: 1 }, { name: 'capture' });
  }

  /**
   * Clear all collections.
   */
  async clear() {
    await this.changefeeds.deleteMany({});
    await this.admin_jobs.deleteMany({});
    await this.captures.deleteMany({});
    await this.table_tasks.deleteMany({});
    await this.processors.deleteMany({});
    await this.id_sequences.deleteMany({});
    await this.locks.deleteMany({});
  }

  /**
   * Drop the entire database.
   *
   * Primarily for tests.
   */
  async drop() {
    await this.db.dropDatabase();
  }
}
