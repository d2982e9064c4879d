import { ErrorCode, ServiceError } from '@changeplane/lib-services-framework';
import { ConnectionString as ConnectionURI } from 'mongodb-connection-string-url';
import * as t from 'ts-codec';

export const MONGO_CONNECTION_TYPE = 'mongodb' as const;

export const BaseMongoConfig = t.object({
  type: t.literal(MONGO_CONNECTION_TYPE),
  uri: t.string,
  database: t.string.optional(),
  username: t.string.optional(),
  password: t.string.optional(),

  connectTimeoutMS: t.number.optional(),
  socketTimeoutMS: t.number.optional(),
  serverSelectionTimeoutMS: t.number.optional(),
  maxPoolSize: t.number.optional(),
  maxIdleTimeMS: t.number.optional()
});

export type BaseMongoConfig = t.Encoded<typeof BaseMongoConfig>;
export type BaseMongoConfigDecoded = t.Decoded<typeof BaseMongoConfig>;

export type NormalizedMongoConfig = {
  uri: string;
  database: string;
  username: string;
  password: string;
  connectTimeoutMS?: number;
  socketTimeoutMS?: number;
  serverSelectionTimeoutMS?: number;
  maxPoolSize?: number;
  maxIdleTimeMS?: number;
};

/**
 * Validate and normalize connection options.
 *
 * Credentials are taken out of the URI; explicit options win over URI query parameters.
 */
export function normalizeMongoConfig(options: BaseMongoConfigDecoded): NormalizedMongoConfig {
  let uri: ConnectionURI;

  try {
    uri = new ConnectionURI(options.uri);
  } catch (error) {
    throw new ServiceError(
      ErrorCode.ErrConfigInvalid,
      `MongoDB connection: invalid URI ${error instanceof Error ? `- ${error.message}` : ''}`
    );
  }

  const database = options.database ?? uri.pathname.split('/')[1] ?? '';
  const username = options.username ?? uri.username;
  const password = options.password ?? uri.password;

  uri.password = '';
  uri.username = '';

  if (database == '') {
    throw new ServiceError(ErrorCode.ErrConfigInvalid, `MongoDB connection: database required`);
  }

  const parseQueryParam = (key: string): number | undefined => {
    const value = uri.searchParams.get(key);
    if (value == null) return undefined;
    const num = Number(value);
    if (isNaN(num) || num < 0) return undefined;
    return num;
  };

  return {
    uri: uri.toString(),
    database,

    username,
    password,

    connectTimeoutMS: options.connectTimeoutMS ?? parseQueryParam('connectTimeoutMS'),
    socketTimeoutMS: options.socketTimeoutMS ?? parseQueryParam('socketTimeoutMS'),
    serverSelectionTimeoutMS: options.serverSelectionTimeoutMS ?? parseQueryParam('serverSelectionTimeoutMS'),
    maxPoolSize: options.maxPoolSize ?? parseQueryParam('maxPoolSize'),
    maxIdleTimeMS: options.maxIdleTimeMS ?? parseQueryParam('maxIdleTimeMS')
  };
}
