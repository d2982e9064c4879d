import { ServiceError, StorageUnavailableError } from '@changeplane/lib-services-framework';
import { hasName, isMongoServerError } from './mongo.js';

/**
 * Maps driver errors to a retryable {@link StorageUnavailableError}. Service errors pass through.
 */
export function mapQueryError(err: unknown, context: string): ServiceError {
  if (ServiceError.isServiceError(err)) {
    return err;
  } else if (isMongoServerError(err)) {
    if (err.codeName == 'MaxTimeMSExpired') {
      return new StorageUnavailableError(`Query timed out ${context}`, err);
    } else if (err.codeName == 'AuthenticationFailed') {
      return new StorageUnavailableError('MongoDB authentication failed. Check the username and password.', err);
    }
    return new StorageUnavailableError(`MongoDB server error ${context}: ${err.codeName}`, err);
  } else if (hasName(err, 'MongoNetworkError') || hasName(err, 'MongoServerSelectionError')) {
    return new StorageUnavailableError(`MongoDB network error ${context}`, err);
  }
  return new StorageUnavailableError(`MongoDB connection error ${context}`, err);
}
