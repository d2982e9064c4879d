import { describe, expect, it } from 'vitest';
import {
  ChangefeedNotFoundError,
  ErrorCode,
  InternalServerError,
  ServiceError,
  SinkUnreachableError,
  ValidationError
} from '../../src/index.js';

describe('service errors', () => {
  it('formats the message with code and details', () => {
    const error = new ServiceError({
      code: ErrorCode.ErrAPIInvalidParam,
      description: 'bad input',
      details: 'capture_id is empty'
    });

    expect(error.message).toEqual('[CDC:ErrAPIInvalidParam] bad input\n  capture_id is empty');
    expect(error.name).toEqual('ServiceError');
  });

  it('accepts a bare code and description', () => {
    const error = new ServiceError(ErrorCode.ErrServiceAssertion, 'unreachable');
    expect(error.errorData).toEqual({
      name: 'ServiceError',
      code: ErrorCode.ErrServiceAssertion,
      description: 'unreachable'
    });
  });

  it('reports not-found as a client error', () => {
    const error = new ChangefeedNotFoundError('changefeed-not-exists');
    expect(error.code).toEqual('CDC:ErrChangeFeedNotExists');
    expect(error.errorData.status).toEqual(400);
    expect(error.name).toEqual('ChangefeedNotFoundError');
    expect(error.changefeed_id).toEqual('changefeed-not-exists');
  });

  it('recognizes service errors by marker', () => {
    expect(ServiceError.isServiceError(new ValidationError(['x']))).toBe(true);
    expect(ServiceError.isServiceError({ is_service_error: true })).toBe(true);
    expect(ServiceError.isServiceError(new Error('plain'))).toBe(false);
    expect(ServiceError.isServiceError(null)).toBe(false);
  });

  it('keeps the cause of unreachable sinks', () => {
    const cause = new Error('connect ECONNREFUSED 127.0.0.1:1111');
    const error = new SinkUnreachableError('mysql://127.0.0.1:1111', cause);
    expect(error.errorData.details).toEqual('connect ECONNREFUSED 127.0.0.1:1111');
    expect(error.cause).toBe(cause);
  });

  it('wraps unexpected errors as server errors', () => {
    const error = new InternalServerError(new Error('boom'));
    expect(error.errorData.status).toEqual(500);
    expect(error.errorData.details).toEqual('boom');
  });
});
