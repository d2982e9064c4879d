import { ErrorCode, ErrorData, InternalServerError, ServiceError } from '@changeplane/service-errors';

export const isServiceError = (err: unknown): err is ServiceError => {
  return ServiceError.isServiceError(err);
};

export const asServiceError = (err: unknown): ServiceError => {
  if (isServiceError(err)) {
    return err;
  } else if (err instanceof Error) {
    return new InternalServerError(err);
  }
  return new InternalServerError(new Error(String(err)));
};

export const getErrorData = (err: unknown): ErrorData | undefined => {
  if (!isServiceError(err)) {
    return;
  }
  return err.toJSON();
};

export const matchesErrorCode = (err: unknown, code: ErrorCode) => {
  if (isServiceError(err)) {
    return err.errorData.code === code;
  }
  return false;
};
