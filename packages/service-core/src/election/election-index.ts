export * from './LeaseElector.js';
export * from './LockLeaseElector.js';
export * from './OwnerElection.js';
