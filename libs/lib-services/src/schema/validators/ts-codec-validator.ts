import * as t from 'ts-codec';

import * as defs from '../definitions.js';
import * as schema_validator from './schema-validator.js';

export type TsCodecValidator<C extends t.AnyCodec> = defs.MicroValidator<t.Encoded<C>>;

export type TsCodecValidatorOptions = Partial<Omit<t.BaseParserParams, 'target'>>;

/**
 * Create a validator from a given ts-codec codec. Data is validated in its encoded (wire) form.
 */
export const createTsCodecValidator = <C extends t.AnyCodec>(
  codec: C,
  options?: TsCodecValidatorOptions
): TsCodecValidator<C> => {
  const schema = t.generateJSONSchema(codec, { ...(options || {}) });
  return schema_validator.createSchemaValidator<t.Encoded<C>>(schema);
};
