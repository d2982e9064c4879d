import * as lib_mongo from '@changeplane/lib-service-mongodb';
import * as service_types from '@changeplane/service-types';
import * as t from 'ts-codec';

export const MongoStorageConfig = lib_mongo.BaseMongoConfig.and(
  t.object({
    // Add any mongo specific storage settings here in future
  })
);

export type MongoStorageConfig = t.Encoded<typeof MongoStorageConfig>;
export type MongoStorageConfigDecoded = t.Decoded<typeof MongoStorageConfig>;

export function isMongoStorageConfig(
  config: service_types.configFile.GenericStorageConfig
): config is service_types.configFile.GenericStorageConfig & MongoStorageConfig {
  return config.type == lib_mongo.MONGO_CONNECTION_TYPE;
}
