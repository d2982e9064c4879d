/**
 * Error codes used across the control plane.
 *
 * This is the primary definition of error codes, as well as the documentation
 * for each. The values are the stable, machine-readable part of every API
 * error response - clients assert on these, never on the message text.
 *
 * Keys must match the value without the `CDC:` namespace.
 */
export enum ErrorCode {
  // # Changefeed registry

  /**
   * The changefeed does not exist.
   *
   * Returned for any operation referencing an unknown changefeed id, regardless
   * of the layer that detected it. A removed changefeed reports this once it has
   * been purged from the registry.
   */
  ErrChangeFeedNotExists = 'CDC:ErrChangeFeedNotExists',

  /**
   * A changefeed with the same id already exists.
   *
   * This includes changefeeds in the `removed` state that have not been purged yet.
   */
  ErrChangeFeedAlreadyExists = 'CDC:ErrChangeFeedAlreadyExists',

  /**
   * The operation is not allowed in the current changefeed state.
   *
   * For example resuming a removed changefeed, or updating a changefeed that is not stopped.
   */
  ErrChangefeedUpdateRefused = 'CDC:ErrChangefeedUpdateRefused',

  // # Sinks and sources

  /**
   * The sink URI is malformed or uses an unsupported scheme.
   */
  ErrSinkURIInvalid = 'CDC:ErrSinkURIInvalid',

  /**
   * The sink could not be reached while validating it.
   */
  ErrSinkUnreachable = 'CDC:ErrSinkUnreachable',

  /**
   * The source contains tables that cannot be replicated (no primary key or
   * unique key), and `ignore_ineligible_table` was not set.
   */
  ErrTableIneligible = 'CDC:ErrTableIneligible',

  /**
   * The changefeed configuration is invalid, for example a consistency (redo log)
   * flush interval below the minimum or an unsupported redo storage URI.
   */
  ErrInvalidReplicaConfig = 'CDC:ErrInvalidReplicaConfig',

  // # Scheduling

  /**
   * The table is not part of the changefeed.
   */
  ErrTableNotExists = 'CDC:ErrTableNotExists',

  /**
   * The table is currently being released or moved.
   *
   * Retry once the hand-off has completed.
   */
  ErrTableHandOffInProgress = 'CDC:ErrTableHandOffInProgress',

  /**
   * The capture does not exist, or its liveness lease has expired.
   */
  ErrCaptureNotExist = 'CDC:ErrCaptureNotExist',

  /**
   * A write that requires ownership was attempted with a lease that is no longer valid.
   *
   * This is expected briefly during owner failover.
   */
  ErrOwnerLeaseLost = 'CDC:ErrOwnerLeaseLost',

  /**
   * A table pipeline failed with an unrecoverable error.
   *
   * This is reported as the changefeed error payload.
   */
  ErrProcessorFatal = 'CDC:ErrProcessorFatal',

  // # Service

  /**
   * Internal assertion.
   *
   * If you see this error, it might indicate a bug in the service code.
   */
  ErrServiceAssertion = 'CDC:ErrServiceAssertion',

  /**
   * The coordination store could not be reached, or a write failed.
   *
   * Safe to retry. No partial state has been committed.
   */
  ErrStorageUnavailable = 'CDC:ErrStorageUnavailable',

  /**
   * The service configuration is invalid.
   *
   * Reported on startup, for example for a malformed storage URI.
   */
  ErrConfigInvalid = 'CDC:ErrConfigInvalid',

  // # API

  /**
   * Generic internal server error.
   */
  ErrInternalServerError = 'CDC:ErrInternalServerError',

  /**
   * The request parameters or body failed validation.
   */
  ErrAPIInvalidParam = 'CDC:ErrAPIInvalidParam',

  /**
   * Route not found.
   */
  ErrRouteNotFound = 'CDC:ErrRouteNotFound',

  /**
   * The request queue of the server is full. Retry later.
   */
  ErrTooManyRequests = 'CDC:ErrTooManyRequests'
}
