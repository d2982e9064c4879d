import { LockHandle, LockManager, LockState } from './LockManager.js';

export type LockManagerParams = {
  /**
   * Name of the lock.
   */
  name: string;
  /**
   * Name of the process trying to acquire the lock. Reported by `inspect`.
   */
  holder?: string;
  /**
   * The TTL of the lock (ms). Default: 60000 ms (1 min)
   */
  timeout?: number;
};

export const DEFAULT_LOCK_TIMEOUT_MS = 60_000;

export abstract class AbstractLockManager implements LockManager {
  constructor(protected params: LockManagerParams) {}

  protected get timeout() {
    return this.params.timeout ?? DEFAULT_LOCK_TIMEOUT_MS;
  }

  protected get holder() {
    return this.params.holder ?? this.params.name;
  }

  /**
   * Attempts to acquire the lock once.
   * @returns null if another holder has an active lock.
   */
  abstract acquire(): Promise<LockHandle | null>;

  abstract inspect(): Promise<LockState | null>;
}
