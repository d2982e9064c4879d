import { InvalidReplicaConfigError } from '@changeplane/lib-services-framework';
import * as types from '@changeplane/service-types';
import * as urijs from 'uri-js';

/**
 * MiB per redo log file.
 */
export const DEFAULT_MAX_LOG_SIZE = 64;
export const DEFAULT_FLUSH_INTERVAL_MS = 2_000;
export const DEFAULT_META_FLUSH_INTERVAL_MS = 200;
export const MIN_FLUSH_INTERVAL_MS = 50;
export const DEFAULT_ENCODING_WORKER_NUM = 16;
export const DEFAULT_FLUSH_WORKER_NUM = 8;

export const DEFAULT_CONSISTENT_CONFIG: types.ConsistentConfig = {
  level: types.ConsistentLevel.NONE,
  max_log_size: DEFAULT_MAX_LOG_SIZE,
  flush_interval: DEFAULT_FLUSH_INTERVAL_MS,
  meta_flush_interval: DEFAULT_META_FLUSH_INTERVAL_MS,
  encoding_worker_num: DEFAULT_ENCODING_WORKER_NUM,
  flush_worker_num: DEFAULT_FLUSH_WORKER_NUM,
  storage: '',
  use_file_backend: false
};

export enum RedoStorageScheme {
  LOCAL = 'local',
  NFS = 'nfs',
  FILE = 'file',
  S3 = 's3',
  GCS = 'gcs',
  GS = 'gs',
  AZURE = 'azure',
  AZBLOB = 'azblob',
  BLACKHOLE = 'blackhole'
}

const LEVELS: string[] = Object.values(types.ConsistentLevel);
const isConsistentLevel = (level: string): level is types.ConsistentLevel => LEVELS.includes(level);

const SENSITIVE_QUERY_KEYS = [
  'access-key',
  'access_key',
  'secret-access-key',
  'secret_access_key',
  'sas-token',
  'sas_token',
  'account-key',
  'account_key'
];
const MASK = 'xxxxx';

/**
 * Applies a consistency config request to `base`, fills unset and zero values with their
 * defaults and validates the result. Only the level is checked for level `none`.
 *
 * @throws InvalidReplicaConfigError
 */
export function resolveConsistentConfig(
  request: types.api_routes.ConsistentConfigRequest | undefined,
  base: types.ConsistentConfig = DEFAULT_CONSISTENT_CONFIG
): types.ConsistentConfig {
  const level = request?.level ?? base.level;
  if (!isConsistentLevel(level)) {
    throw new InvalidReplicaConfigError(`consistent.level ${JSON.stringify(level)} must be one of ${LEVELS.join(', ')}`);
  }

  const config: types.ConsistentConfig = {
    level,
    max_log_size: request?.max_log_size || base.max_log_size || DEFAULT_MAX_LOG_SIZE,
    flush_interval: request?.flush_interval || base.flush_interval || DEFAULT_FLUSH_INTERVAL_MS,
    meta_flush_interval: request?.meta_flush_interval || base.meta_flush_interval || DEFAULT_META_FLUSH_INTERVAL_MS,
    encoding_worker_num: request?.encoding_worker_num || base.encoding_worker_num || DEFAULT_ENCODING_WORKER_NUM,
    flush_worker_num: request?.flush_worker_num || base.flush_worker_num || DEFAULT_FLUSH_WORKER_NUM,
    storage: request?.storage ?? base.storage,
    use_file_backend: request?.use_file_backend ?? base.use_file_backend
  };
  if (config.level == types.ConsistentLevel.NONE) {
    return config;
  }

  for (const key of ['max_log_size', 'encoding_worker_num', 'flush_worker_num'] as const) {
    if (!Number.isSafeInteger(config[key]) || config[key] <= 0) {
      throw new InvalidReplicaConfigError(`consistent.${key} ${config[key]} must be a positive integer`);
    }
  }
  for (const key of ['flush_interval', 'meta_flush_interval'] as const) {
    if (!Number.isSafeInteger(config[key]) || config[key] < MIN_FLUSH_INTERVAL_MS) {
      throw new InvalidReplicaConfigError(
        `consistent.${key} ${config[key]} must be an integer of at least ${MIN_FLUSH_INTERVAL_MS}`
      );
    }
  }
  checkRedoStorage(config.storage);
  return config;
}

/**
 * Checks that the redo log can be written to the given storage URI.
 */
export function checkRedoStorage(storage: string) {
  const uri = urijs.parse(storage);
  if (uri.error) {
    throw new InvalidReplicaConfigError(`invalid storage uri: ${storage}`);
  }
  const scheme = uri.scheme?.toLowerCase() ?? '';
  switch (scheme) {
    case RedoStorageScheme.BLACKHOLE:
      return;
    case RedoStorageScheme.LOCAL:
    case RedoStorageScheme.NFS:
    case RedoStorageScheme.FILE:
      if ((uri.path ?? '').replace(/^\/+/, '') == '') {
        throw new InvalidReplicaConfigError(`redo storage ${scheme} requires a path: ${storage}`);
      }
      return;
    case RedoStorageScheme.S3:
    case RedoStorageScheme.GCS:
    case RedoStorageScheme.GS:
    case RedoStorageScheme.AZURE:
    case RedoStorageScheme.AZBLOB:
      if ((uri.host ?? '') == '') {
        throw new InvalidReplicaConfigError(`redo storage ${scheme} requires a bucket: ${storage}`);
      }
      return;
    default:
      throw new InvalidReplicaConfigError(`unsupported redo storage scheme ${JSON.stringify(scheme)}`);
  }
}

/**
 * Replaces the password and credential query parameters of a storage URI, leaving the rest as written.
 */
export function maskStorageURI(storage: string) {
  const uri = urijs.parse(storage);
  let masked = storage;

  const userinfo = uri.userinfo ?? '';
  const separator = userinfo.indexOf(':');
  if (separator >= 0) {
    masked = masked.replace(`${userinfo}@`, `${userinfo.slice(0, separator)}:${MASK}@`);
  }

  if (uri.query) {
    const query = uri.query
      .split('&')
      .map((part) => {
        const eq = part.indexOf('=');
        const key = eq < 0 ? part : part.slice(0, eq);
        return SENSITIVE_QUERY_KEYS.includes(key.toLowerCase()) ? `${key}=${MASK}` : part;
      })
      .join('&');
    masked = masked.replace(`?${uri.query}`, `?${query}`);
  }
  return masked;
}
