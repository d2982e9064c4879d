import * as dotenv from 'dotenv';
import * as t from 'zod';
import { logger } from '../logger/Logger.js';

const string = t.string();
const number = t
  .string()
  .refine((value) => !isNaN(parseInt(value)))
  .transform((value) => parseInt(value));

const convertToBoolean = (value: string) => {
  return value == '1' || value == 'true';
};
const boolean = t
  .string()
  .refine((value) => ['0', '1', 'true', 'false'].includes(value))
  .transform(convertToBoolean);

const list = t.string().transform((value) => value.split(','));

export type EnvironmentSource = Record<string, string | undefined>;

export const collectEnvironmentVariablesFromSchema = <T extends t.ZodType>(
  schema: T,
  override?: EnvironmentSource
): t.infer<T> => {
  let env: EnvironmentSource;
  if (override) {
    env = override;
  } else {
    dotenv.config();
    env = process.env;
  }

  const result = schema.safeParse(env);

  if (!result.success) {
    logger.error(`Invalid environment variables: ${JSON.stringify(result.error.format())}`);
    throw new Error('Invalid or missing environment variables');
  }

  return result.data;
};

export const collectEnvironmentVariables = <T extends t.ZodRawShape>(schema: T, override?: EnvironmentSource) => {
  return collectEnvironmentVariablesFromSchema(t.object(schema), override);
};

export const type = {
  string,
  number,
  boolean,
  list
};
