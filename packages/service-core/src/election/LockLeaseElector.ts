import { LockHandle, LockLostError, OwnerLeaseLostError } from '@changeplane/lib-services-framework';
import { ControlPlaneStorage, OWNER_LOCK_NAME } from '../storage/ControlPlaneStorage.js';
import { OwnerRecord, OwnerToken } from '../storage/model.js';
import { LeaseElector, OwnerCandidate, OwnerLease } from './LeaseElector.js';

export type LockLeaseElectorOptions = {
  storage: ControlPlaneStorage;
  lease_ttl_ms: number;
};

class LockOwnerLease implements OwnerLease {
  constructor(
    readonly token: OwnerToken,
    private handle: LockHandle
  ) {}

  async renew() {
    try {
      await this.handle.refresh();
    } catch (e) {
      if (e instanceof LockLostError) {
        throw new OwnerLeaseLostError(this.token.capture_id);
      }
      throw e;
    }
  }

  async release() {
    await this.handle.release();
  }
}

/**
 * Owner election over the store's lock table: the owner is the holder of the owner lock.
 */
export class LockLeaseElector implements LeaseElector {
  constructor(private options: LockLeaseElectorOptions) {}

  async campaign(candidate: OwnerCandidate): Promise<OwnerLease | null> {
    const handle = await this.lockManager(candidate.capture_id).acquire();
    if (handle == null) {
      return null;
    }
    return new LockOwnerLease({ capture_id: candidate.capture_id, lease_id: handle.lock_id }, handle);
  }

  async currentOwner(): Promise<OwnerRecord | null> {
    const state = await this.lockManager().inspect();
    if (state == null) {
      return null;
    }
    return { capture_id: state.holder, lease_id: state.lock_id, expires_at: state.expires_at };
  }

  private lockManager(holder?: string) {
    return this.options.storage.createLockManager({
      name: OWNER_LOCK_NAME,
      holder,
      timeout: this.options.lease_ttl_ms
    });
  }
}
