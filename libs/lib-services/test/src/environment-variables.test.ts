import { describe, expect, test } from 'vitest';

import { collectEnvironmentVariables, type } from '../../src/utils/environment-variables.js';

describe('environment variables', () => {
  const schema = {
    CP_CONFIG_PATH: type.string.optional(),
    CP_PORT: type.number.optional(),
    CP_DEBUG: type.boolean.optional(),
    CP_TAGS: type.list.optional()
  };

  test('parses typed values', () => {
    const env = collectEnvironmentVariables(schema, {
      CP_CONFIG_PATH: '/etc/cp.yaml',
      CP_PORT: '8300',
      CP_DEBUG: 'true',
      CP_TAGS: 'a,b'
    });
    expect(env).toEqual({
      CP_CONFIG_PATH: '/etc/cp.yaml',
      CP_PORT: 8300,
      CP_DEBUG: true,
      CP_TAGS: ['a', 'b']
    });
  });

  test('missing optional values stay undefined', () => {
    const env = collectEnvironmentVariables(schema, {});
    expect(env.CP_PORT).toBeUndefined();
  });

  test('rejects invalid values', () => {
    expect(() => collectEnvironmentVariables(schema, { CP_PORT: 'abc' })).toThrow(
      'Invalid or missing environment variables'
    );
  });
});
