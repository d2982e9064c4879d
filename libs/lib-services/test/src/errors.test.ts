import { describe, expect, test } from 'vitest';

import * as errors from '../../src/errors/errors-index.js';

class CustomServiceError extends errors.ServiceError {
  constructor() {
    super({
      code: errors.ErrorCode.ErrServiceAssertion,
      description: 'This is a custom error',
      details: 'this is some more detailed information'
    });
  }
}

describe('errors', () => {
  test('it should respond to instanceof checks', () => {
    const error = new CustomServiceError();

    expect(error instanceof Error).toBe(true);
    expect(error instanceof errors.ServiceError).toBe(true);
    expect(error.name).toBe('CustomServiceError');
  });

  test('it should serialize properly', () => {
    const error = new CustomServiceError();

    // The stack contains host specific paths, only the header is compared
    const initial = `CustomServiceError: [CDC:ErrServiceAssertion] This is a custom error
  this is some more detailed information
    at`;

    expect(`${error}`.startsWith(initial)).toBe(true);
  });

  test('utilities should properly match a service error', () => {
    const standard_error = new Error('non-service error');
    const error = new CustomServiceError();

    expect(errors.isServiceError(standard_error)).toBe(false);
    expect(errors.isServiceError(error)).toBe(true);

    expect(errors.matchesErrorCode(error, errors.ErrorCode.ErrServiceAssertion)).toBe(true);
    expect(errors.matchesErrorCode(standard_error, errors.ErrorCode.ErrServiceAssertion)).toBe(false);

    expect(errors.getErrorData(error)).toMatchObject({
      name: 'CustomServiceError',
      code: 'CDC:ErrServiceAssertion',
      description: 'This is a custom error',
      details: 'this is some more detailed information'
    });
    expect(errors.getErrorData(standard_error)).toBe(undefined);
  });

  test('non-service errors are wrapped as internal errors', () => {
    const wrapped = errors.asServiceError(new Error('disk on fire'));
    expect(wrapped.code).toBe(errors.ErrorCode.ErrInternalServerError);
    expect(wrapped.errorData.status).toBe(500);
    expect(wrapped.errorData.details).toBe('disk on fire');

    const fromString = errors.asServiceError('plain');
    expect(fromString.errorData.details).toBe('plain');

    const original = new errors.ChangefeedNotFoundError('cf-1');
    expect(errors.asServiceError(original)).toBe(original);
  });
});
