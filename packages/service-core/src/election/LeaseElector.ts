import { OwnerRecord, OwnerToken } from '../storage/model.js';

export type OwnerCandidate = {
  capture_id: string;
};

export interface OwnerLease {
  readonly token: OwnerToken;
  /**
   * Extends the lease.
   * @throws OwnerLeaseLostError once the lease expired or was taken over.
   */
  renew(): Promise<void>;
  release(): Promise<void>;
}

/**
 * Elects a single owner among the captures of a cluster.
 */
export interface LeaseElector {
  /**
   * @returns the lease if the candidate won, null if another capture holds a valid lease.
   */
  campaign(candidate: OwnerCandidate): Promise<OwnerLease | null>;
  currentOwner(): Promise<OwnerRecord | null>;
}
