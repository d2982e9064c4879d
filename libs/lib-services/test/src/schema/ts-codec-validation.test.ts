import * as t from 'ts-codec';
import { describe, expect, test } from 'vitest';

import * as framework_schema from '../../../src/schema/schema-index.js';

describe('ts-codec validation', () => {
  enum Values {
    A = 'A',
    B = 'B'
  }

  const codec = t.object({
    name: t.string,
    other: t.object({
      a: t.array(t.string),
      b: t.literal('optional').optional()
    }),
    or: t.number.or(t.string),
    enum: t.Enum(Values)
  });

  test('passes validation for codec', () => {
    const validator = framework_schema.createTsCodecValidator(codec);

    const result = validator.validate({
      name: 'a',
      other: {
        a: ['nice'],
        b: 'optional'
      },
      or: 1,
      enum: Values.A
    });

    expect(result.valid).toBe(true);
  });

  test('fails validation for a payload of the wrong shape', () => {
    // Untyped validator over the same schema, so the payload can be malformed
    const validator = framework_schema.createSchemaValidator(t.generateJSONSchema(codec));

    const result = validator.validate({
      name: 1,
      other: {
        a: ['nice']
      },
      or: 1,
      enum: 'C'
    });

    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.errors).toContain('/name must be string');
    }
  });
});
