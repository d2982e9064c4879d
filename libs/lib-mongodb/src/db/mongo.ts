import * as mongo from 'mongodb';
import * as timers from 'timers/promises';
import { BaseMongoConfigDecoded, normalizeMongoConfig } from '../types/types.js';

/**
 * Time for new connection to timeout.
 */
export const MONGO_CONNECT_TIMEOUT_MS = 10_000;

/**
 * Time for individual requests to timeout the socket.
 */
export const MONGO_SOCKET_TIMEOUT_MS = 60_000;

/**
 * Time for individual requests to timeout the operation.
 *
 * Must be less than MONGO_SOCKET_TIMEOUT_MS to ensure proper error handling.
 */
export const MONGO_OPERATION_TIMEOUT_MS = 30_000;

export interface MongoConnectionOptions {
  maxPoolSize?: number;
  serviceVersion?: string;
}

/**
 * Create a MongoClient for the coordination store.
 */
export function createMongoClient(config: BaseMongoConfigDecoded, options?: MongoConnectionOptions) {
  const normalized = normalizeMongoConfig(config);
  return new mongo.MongoClient(normalized.uri, {
    auth: {
      username: normalized.username,
      password: normalized.password
    },
    connectTimeoutMS: normalized.connectTimeoutMS ?? MONGO_CONNECT_TIMEOUT_MS,
    socketTimeoutMS: normalized.socketTimeoutMS ?? MONGO_SOCKET_TIMEOUT_MS,
    // How long to wait for new primary selection
    serverSelectionTimeoutMS: normalized.serverSelectionTimeoutMS ?? 30_000,

    appName: options?.serviceVersion ? `changeplane ${options.serviceVersion}` : 'changeplane',
    driverInfo: {
      // This is merged with the node driver info.
      name: 'changeplane',
      version: options?.serviceVersion
    },

    // The control plane issues few, small queries
    maxPoolSize: normalized.maxPoolSize ?? options?.maxPoolSize ?? 8,
    maxConnecting: 3,
    maxIdleTimeMS: normalized.maxIdleTimeMS ?? 60_000
  });
}

/**
 * Wait up to a minute for authentication errors to resolve.
 *
 * There can be a delay between a database user being created, and that user being
 * available on the cluster.
 */
export async function waitForAuth(db: mongo.Db) {
  const start = Date.now();
  while (Date.now() - start < 60_000) {
    try {
      await db.command({ ping: 1 });
      break;
    } catch (e) {
      if (isMongoServerError(e) && e.codeName == 'AuthenticationFailed') {
        await timers.setTimeout(1_000);
        continue;
      }
      throw e;
    }
  }
}

export const isMongoServerError = (error: unknown): error is mongo.MongoServerError => {
  return error instanceof mongo.MongoServerError || hasName(error, 'MongoServerError');
};

export const isMongoNetworkTimeoutError = (error: unknown): error is mongo.MongoNetworkTimeoutError => {
  return error instanceof mongo.MongoNetworkTimeoutError || hasName(error, 'MongoNetworkTimeoutError');
};

export function hasName(error: unknown, name: string): boolean {
  return typeof error == 'object' && error != null && 'name' in error && error.name == name;
}
