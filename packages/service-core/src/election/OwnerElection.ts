import { BaseObserver, errors, Logger, OwnerLeaseLostError } from '@changeplane/lib-services-framework';
import { Owner } from '../scheduler/Owner.js';
import { ControlPlaneStorage } from '../storage/ControlPlaneStorage.js';
import { LeaseElector, OwnerLease } from './LeaseElector.js';

export interface OwnerElectionListener {
  ownerChanged: (is_owner: boolean) => void;
}

export type OwnerElectionOptions = {
  capture_id: string;
  storage: ControlPlaneStorage;
  elector: LeaseElector;
  /**
   * Time a resigned capture waits before campaigning again.
   */
  election_interval_ms: number;
  removed_gc_grace_ms: number;
  logger: Logger;
};

/**
 * Campaigns for the owner lease on behalf of one capture, and runs the {@link Owner} while it holds it.
 */
export class OwnerElection extends BaseObserver<OwnerElectionListener> {
  private lease: OwnerLease | null = null;
  private owner: Owner | null = null;
  private sitOutUntil = 0;

  constructor(private options: OwnerElectionOptions) {
    super();
  }

  get isOwner() {
    return this.owner != null;
  }

  /**
   * Campaigns when not owner, otherwise runs one owner round.
   */
  async tick() {
    if (this.owner == null) {
      if (Date.now() < this.sitOutUntil) {
        return;
      }
      const lease = await this.options.elector.campaign({ capture_id: this.options.capture_id });
      if (lease == null) {
        return;
      }
      this.lease = lease;
      this.owner = new Owner({
        storage: this.options.storage,
        lease,
        removed_gc_grace_ms: this.options.removed_gc_grace_ms,
        logger: this.options.logger
      });
      this.options.logger.info(`Capture ${this.options.capture_id} is now the owner`);
      this.iterateListeners((l) => l.ownerChanged?.(true));
    }

    const owner = this.owner;
    try {
      await owner.tick();
    } catch (e) {
      if (errors.matchesErrorCode(e, OwnerLeaseLostError.CODE)) {
        this.options.logger.warn(`Capture ${this.options.capture_id} lost the owner lease`);
        this.drop();
        return;
      }
      throw e;
    }
  }

  /**
   * Gives up the lease, if held, and sits out one election interval.
   */
  async resign() {
    const lease = this.lease;
    if (lease == null) {
      return;
    }
    this.sitOutUntil = Date.now() + this.options.election_interval_ms;
    this.drop();
    await lease.release();
    this.options.logger.info(`Capture ${this.options.capture_id} resigned as owner`);
  }

  async stop() {
    const lease = this.lease;
    this.drop();
    await lease?.release();
  }

  private drop() {
    const wasOwner = this.owner != null;
    this.lease = null;
    this.owner = null;
    if (wasOwner) {
      this.iterateListeners((l) => l.ownerChanged?.(false));
    }
  }
}
