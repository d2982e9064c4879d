/**
 * Thrown when refreshing a handle whose lock has expired or was taken by another holder.
 */
export class LockLostError extends Error {
  constructor(public readonly lock_id: string) {
    super(`Lock ${lock_id} is no longer held`);
    this.name = this.constructor.name;
  }
}

export type LockHandle = {
  /**
   * Unique per acquisition. A lock re-acquired by the same holder gets a new id.
   */
  lock_id: string;
  /**
   * Extends the lock's expiry.
   * @throws {LockLostError} if the lock is no longer held by this handle.
   */
  refresh(): Promise<void>;
  release(): Promise<void>;
};

/**
 * The current state of a lock, as seen by any process.
 */
export type LockState = {
  holder: string;
  lock_id: string;
  expires_at: Date;
};

export type LockManager = {
  /**
   * Attempts to acquire a lock handle without waiting.
   * @returns null if the lock is held by another, non-expired handle.
   */
  acquire(): Promise<LockHandle | null>;
  /**
   * Returns the active (non-expired) lock, if any.
   */
  inspect(): Promise<LockState | null>;
};
