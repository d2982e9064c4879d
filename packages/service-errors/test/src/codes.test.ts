import { describe, it, expect } from 'vitest';
import { ErrorCode } from '../../src/codes.js';

// Every code is namespaced and its key is the value without the namespace.

type ServiceErrorCode = `CDC:Err${string}`;

describe('Service Error Codes', () => {
  it('should match CDC:Errxxx', () => {
    // tsc checks this for us
    ErrorCode.ErrChangeFeedNotExists satisfies ServiceErrorCode;
    for (const value of Object.values(ErrorCode)) {
      expect(value).toMatch(/^CDC:Err[A-Za-z]+$/);
    }
  });

  it('should have matching keys and values', () => {
    const entries = Object.entries(ErrorCode);
    expect(entries.length).toBeGreaterThan(10);
    for (const [key, value] of entries) {
      expect(value).toEqual(`CDC:${key}`);
    }
  });
});
