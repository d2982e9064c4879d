import { ErrorCode } from './codes.js';

export enum ErrorSeverity {
  INFO = 'info',
  WARNING = 'warning',
  ERROR = 'error'
}

export type ErrorData = {
  name?: string;

  code: ErrorCode;
  description: string;

  severity?: ErrorSeverity;
  details?: string;
  status?: number;
  stack?: string;

  origin?: string;

  trace_id?: string;
};

export class ServiceError extends Error {
  is_service_error = true;

  errorData: ErrorData;

  static isServiceError(input: unknown): input is ServiceError {
    if (input instanceof ServiceError) {
      return true;
    }
    return typeof input == 'object' && input != null && 'is_service_error' in input && input.is_service_error == true;
  }

  private static toErrorData(data: ErrorData | ErrorCode, description?: string): ErrorData {
    if (typeof data == 'string') {
      return {
        code: data,
        description: description ?? data
      };
    }
    return data;
  }

  private static errorMessage(data: ErrorData) {
    let message = `[${data.code}] ${data.description}`;
    if (data.details) {
      message += `\n  ${data.details}`;
    }
    return message;
  }

  constructor(data: ErrorData);
  constructor(code: ErrorCode, description: string);

  constructor(input: ErrorData | ErrorCode, description?: string) {
    const data = ServiceError.toErrorData(input, description);
    super(ServiceError.errorMessage(data));

    this.errorData = data;
    if (data.stack) {
      this.stack = data.stack;
    }

    this.name = data.name || this.constructor.name;
    this.errorData.name = this.name;
  }

  get code(): ErrorCode {
    return this.errorData.code;
  }

  toString() {
    return this.stack;
  }

  toJSON(): ErrorData {
    if (process.env.NODE_ENV !== 'production') {
      return this.errorData;
    }
    return {
      name: this.errorData.name,
      code: this.errorData.code,
      status: this.errorData.status,
      description: this.errorData.description,
      details: this.errorData.details,
      trace_id: this.errorData.trace_id,
      severity: this.errorData.severity,
      origin: this.errorData.origin
    };
  }

  setTraceId(id: string) {
    this.errorData.trace_id = id;
  }
}

/**
 * Request parameters or body did not pass validation.
 */
export class ValidationError extends ServiceError {
  static readonly CODE = ErrorCode.ErrAPIInvalidParam;

  constructor(errors: unknown) {
    super({
      code: ValidationError.CODE,
      status: 400,
      description: 'Validation failed',
      details: typeof errors == 'string' ? errors : JSON.stringify(errors)
    });
  }
}

/**
 * Use for general service errors that are never expected to happen in production.
 *
 * If it does happen, it is either:
 * 1. A bug in the code that should be fixed.
 * 2. An error that needs a different error code.
 */
export class ServiceAssertionError extends ServiceError {
  static readonly CODE = ErrorCode.ErrServiceAssertion;
  constructor(description: string) {
    super({
      code: ServiceAssertionError.CODE,
      status: 500,
      description: description
    });
  }
}

export class InternalServerError extends ServiceError {
  static readonly CODE = ErrorCode.ErrInternalServerError;

  constructor(err: Error) {
    super({
      code: InternalServerError.CODE,
      severity: ErrorSeverity.ERROR,
      status: 500,
      description: 'Something went wrong',
      details: err.message,
      stack: process.env.NODE_ENV !== 'production' ? err.stack : undefined
    });
  }
}

export class RouteNotFound extends ServiceError {
  static readonly CODE = ErrorCode.ErrRouteNotFound;

  constructor(path: string, method?: string) {
    super({
      code: RouteNotFound.CODE,
      status: 404,
      description: 'The path does not exist on this server',
      details: `The path ${JSON.stringify(path)}${method ? ` (${method})` : ''} does not exist on this server`,
      severity: ErrorSeverity.INFO
    });
  }
}

export class TooManyRequestsError extends ServiceError {
  static readonly CODE = ErrorCode.ErrTooManyRequests;

  constructor(queued: number) {
    super({
      code: TooManyRequestsError.CODE,
      status: 429,
      description: 'Too many requests',
      details: `${queued} requests queued`,
      severity: ErrorSeverity.INFO
    });
  }
}

/**
 * Not-found is a client error: the same code and status is used no matter
 * which layer detects the missing changefeed.
 */
export class ChangefeedNotFoundError extends ServiceError {
  static readonly CODE = ErrorCode.ErrChangeFeedNotExists;

  constructor(public readonly changefeed_id: string) {
    super({
      code: ChangefeedNotFoundError.CODE,
      status: 400,
      description: `changefeed not exists: ${changefeed_id}`,
      severity: ErrorSeverity.INFO
    });
  }
}

export class ChangefeedAlreadyExistsError extends ServiceError {
  static readonly CODE = ErrorCode.ErrChangeFeedAlreadyExists;

  constructor(public readonly changefeed_id: string) {
    super({
      code: ChangefeedAlreadyExistsError.CODE,
      status: 400,
      description: `changefeed already exists: ${changefeed_id}`
    });
  }
}

export class ChangefeedUpdateRefusedError extends ServiceError {
  static readonly CODE = ErrorCode.ErrChangefeedUpdateRefused;

  constructor(changefeed_id: string, reason: string) {
    super({
      code: ChangefeedUpdateRefusedError.CODE,
      status: 400,
      description: `changefeed ${changefeed_id} cannot be updated`,
      details: reason
    });
  }
}

export class SinkURIInvalidError extends ServiceError {
  static readonly CODE = ErrorCode.ErrSinkURIInvalid;

  constructor(sink_uri: string, reason: string) {
    super({
      code: SinkURIInvalidError.CODE,
      status: 400,
      description: `sink uri invalid: ${sink_uri}`,
      details: reason
    });
  }
}

export class SinkUnreachableError extends ServiceError {
  static readonly CODE = ErrorCode.ErrSinkUnreachable;

  constructor(sink_uri: string, cause: unknown) {
    super({
      code: SinkUnreachableError.CODE,
      status: 400,
      description: `failed to connect to sink: ${sink_uri}`,
      details: cause instanceof Error ? cause.message : String(cause)
    });
    this.cause = cause;
  }
}

export class TableIneligibleError extends ServiceError {
  static readonly CODE = ErrorCode.ErrTableIneligible;

  constructor(tables: string[]) {
    super({
      code: TableIneligibleError.CODE,
      status: 400,
      description: 'some tables are not eligible to replicate, set ignore_ineligible_table to skip them',
      details: tables.join(', ')
    });
  }
}

export class InvalidReplicaConfigError extends ServiceError {
  static readonly CODE = ErrorCode.ErrInvalidReplicaConfig;

  constructor(details: string) {
    super({
      code: InvalidReplicaConfigError.CODE,
      status: 400,
      description: 'invalid replica config',
      details
    });
  }
}

export class TableNotFoundError extends ServiceError {
  static readonly CODE = ErrorCode.ErrTableNotExists;

  constructor(changefeed_id: string, table_id: number) {
    super({
      code: TableNotFoundError.CODE,
      status: 400,
      description: `table ${table_id} does not belong to changefeed ${changefeed_id}`
    });
  }
}

export class TableHandOffInProgressError extends ServiceError {
  static readonly CODE = ErrorCode.ErrTableHandOffInProgress;

  constructor(changefeed_id: string, table_id: number) {
    super({
      code: TableHandOffInProgressError.CODE,
      status: 400,
      description: `table ${table_id} of changefeed ${changefeed_id} is being moved`
    });
  }
}

export class CaptureNotFoundError extends ServiceError {
  static readonly CODE = ErrorCode.ErrCaptureNotExist;

  constructor(public readonly capture_id: string) {
    super({
      code: CaptureNotFoundError.CODE,
      status: 400,
      description: `capture not exists: ${JSON.stringify(capture_id)}`,
      severity: ErrorSeverity.INFO
    });
  }
}

export class OwnerLeaseLostError extends ServiceError {
  static readonly CODE = ErrorCode.ErrOwnerLeaseLost;

  constructor(capture_id: string) {
    super({
      code: OwnerLeaseLostError.CODE,
      status: 500,
      description: `capture ${capture_id} is no longer the owner`,
      severity: ErrorSeverity.WARNING
    });
  }
}

export class StorageUnavailableError extends ServiceError {
  static readonly CODE = ErrorCode.ErrStorageUnavailable;

  constructor(message: string, cause?: unknown) {
    super({
      code: StorageUnavailableError.CODE,
      status: 500,
      description: message,
      details: cause == null ? undefined : `cause: ${cause instanceof Error ? cause.message : String(cause)}`,
      stack: process.env.NODE_ENV !== 'production' && cause instanceof Error ? cause.stack : undefined
    });
    this.cause = cause;
  }
}

export class ProcessorFatalError extends ServiceError {
  static readonly CODE = ErrorCode.ErrProcessorFatal;

  constructor(description: string, cause?: unknown) {
    super({
      code: ProcessorFatalError.CODE,
      status: 500,
      severity: ErrorSeverity.ERROR,
      description,
      details: cause instanceof Error ? cause.message : undefined
    });
    this.cause = cause;
  }
}
