import * as framework from '@changeplane/lib-services-framework';
import * as bson from 'bson';
import * as mongo from 'mongodb';

/**
 * Lock Document Schema
 */
export type Lock = {
  _id: string;
  active_lock?: {
    lock_id: bson.ObjectId;
    holder: string;
    ts: Date;
    expires_at: Date;
  };
};

export type Collection = mongo.Collection<Lock>;

export type MongoLockManagerParams = framework.locks.LockManagerParams & {
  collection: Collection;
};

/**
 * Lock stored as a single document per lock name. Acquisition is a conditional update that
 * only matches when there is no active lock, or the active lock has expired.
 */
export class MongoLockManager extends framework.locks.AbstractLockManager {
  collection: Collection;
  constructor(params: MongoLockManagerParams) {
    super(params);
    this.collection = params.collection;
  }

  async acquire(): Promise<framework.LockHandle | null> {
    const lock_id = await this.getHandle();
    if (!lock_id) {
      return null;
    }
    return {
      lock_id: lock_id.toHexString(),
      refresh: () => this.refreshHandle(lock_id),
      release: () => this.releaseHandle(lock_id)
    };
  }

  async inspect(): Promise<framework.LockState | null> {
    const doc = await this.collection.findOne({ _id: this.params.name });
    const active = doc?.active_lock;
    if (active == null || active.expires_at.getTime() <= Date.now()) {
      return null;
    }
    return {
      holder: active.holder,
      lock_id: active.lock_id.toHexString(),
      expires_at: active.expires_at
    };
  }

  protected async refreshHandle(lock_id: bson.ObjectId) {
    const now = new Date();
    const res = await this.collection.updateOne(
      {
        _id: this.params.name,
        'active_lock.lock_id': lock_id,
        'active_lock.expires_at': { $gt: now }
      },
      {
        $set: {
          'active_lock.ts': now,
          'active_lock.expires_at': new Date(now.getTime() + this.timeout)
        }
      }
    );

    if (res.matchedCount === 0) {
      throw new framework.LockLostError(lock_id.toHexString());
    }
  }

  protected async getHandle() {
    const now = new Date();
    const lock_id = new bson.ObjectId();

    const _id = this.params.name;
    await this.collection.updateOne(
      {
        _id
      },
      {
        $setOnInsert: {
          _id
        }
      },
      {
        upsert: true
      }
    );

    const res = await this.collection.updateOne(
      {
        $and: [
          { _id },
          {
            $or: [{ active_lock: { $exists: false } }, { 'active_lock.expires_at': { $lte: now } }]
          }
        ]
      },
      {
        $set: {
          active_lock: {
            lock_id: lock_id,
            holder: this.holder,
            ts: now,
            expires_at: new Date(now.getTime() + this.timeout)
          }
        }
      }
    );

    if (res.modifiedCount === 0) {
      return null;
    }

    return lock_id;
  }

  protected async releaseHandle(lock_id: bson.ObjectId) {
    // A lock that has already been taken over is left alone
    await this.collection.updateOne(
      {
        _id: this.params.name,
        'active_lock.lock_id': lock_id
      },
      {
        $unset: {
          active_lock: true
        }
      }
    );
  }
}
