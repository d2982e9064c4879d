import AJV from 'ajv';

import * as defs from '../definitions.js';

export class SchemaValidatorError extends Error {
  constructor(message: string) {
    super(message);

    this.name = this.constructor.name;
  }
}

export type SchemaValidator<T> = defs.MicroValidator<T>;

export type CreateSchemaValidatorParams = {
  ajv?: AJV.Options;

  fail_fast?: boolean;
};

/**
 * Create a validator from a given JSON-Schema schema object. This makes uses of AJV internally
 * to compile a validation function
 */
export const createSchemaValidator = <T = unknown>(
  schema: defs.JSONSchema,
  params: CreateSchemaValidatorParams = {}
): SchemaValidator<T> => {
  try {
    const ajv = new AJV.Ajv({
      allErrors: !(params.fail_fast ?? false),
      ...(params.ajv || {})
    });

    const validator = ajv.compile(schema);

    return {
      toJSONSchema: () => {
        return schema;
      },

      validate: (data) => {
        const valid = validator(data);

        if (!valid) {
          const errors = (validator.errors ?? []).map((error) => `${error.instancePath || '/'} ${error.message}`);

          return {
            valid: false,
            errors
          };
        }

        return {
          valid: true
        };
      }
    };
  } catch (err) {
    // Here we re-throw the error because the original error thrown by AJV has a deep stack that
    // obfuscates the location of the error in application code
    throw new SchemaValidatorError(err instanceof Error ? err.message : String(err));
  }
};
