import { v4 as uuid } from 'uuid';
import { AbstractLockManager, LockManagerParams } from './AbstractLockManager.js';
import { LockHandle, LockLostError, LockState } from './LockManager.js';

/**
 * Lock table shared by every {@link MemoryLockManager} of one process.
 */
export type MemoryLockTable = Map<string, LockState>;

export type MemoryLockManagerParams = LockManagerParams & {
  locks: MemoryLockTable;
};

export class MemoryLockManager extends AbstractLockManager {
  constructor(protected params: MemoryLockManagerParams) {
    super(params);
  }

  private get active(): LockState | null {
    const current = this.params.locks.get(this.params.name);
    if (current == null || current.expires_at.getTime() <= Date.now()) {
      return null;
    }
    return current;
  }

  async acquire(): Promise<LockHandle | null> {
    if (this.active) {
      return null;
    }
    const lock_id = uuid();
    this.params.locks.set(this.params.name, {
      holder: this.holder,
      lock_id,
      expires_at: new Date(Date.now() + this.timeout)
    });
    return {
      lock_id,
      refresh: async () => this.refresh(lock_id),
      release: async () => this.release(lock_id)
    };
  }

  async inspect(): Promise<LockState | null> {
    const active = this.active;
    return active && { ...active };
  }

  protected refresh(lock_id: string) {
    const active = this.active;
    if (active == null || active.lock_id != lock_id) {
      throw new LockLostError(lock_id);
    }
    active.expires_at = new Date(Date.now() + this.timeout);
  }

  protected release(lock_id: string) {
    if (this.params.locks.get(this.params.name)?.lock_id == lock_id) {
      this.params.locks.delete(this.params.name);
    }
  }
}
