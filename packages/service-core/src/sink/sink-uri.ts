import { SinkURIInvalidError } from '@changeplane/lib-services-framework';
import * as urijs from 'uri-js';

export enum SinkScheme {
  BLACKHOLE = 'blackhole',
  MYSQL = 'mysql',
  TIDB = 'tidb',
  KAFKA = 'kafka',
  PULSAR = 'pulsar',
  FILE = 'file',
  LOCAL = 'local',
  S3 = 's3',
  GCS = 'gcs',
  AZBLOB = 'azblob'
}

const SCHEMES: string[] = Object.values(SinkScheme);

export const MQ_PROTOCOLS = ['canal-json', 'open-protocol', 'avro', 'maxwell', 'canal', 'debezium'];
export const STORAGE_PROTOCOLS = ['csv', 'canal-json'];

export type SinkURI = {
  scheme: SinkScheme;
  host: string;
  port: number | null;
  /**
   * Path without the leading slash.
   */
  path: string;
  username: string;
  password: string;
  query: URLSearchParams;
};

const isSinkScheme = (scheme: string): scheme is SinkScheme => SCHEMES.includes(scheme);

/**
 * Parses a sink URI and checks the parts every sink of its scheme needs.
 * Connectivity is not checked here.
 */
export function parseSinkURI(sink_uri: string): SinkURI {
  const uri = urijs.parse(sink_uri);
  if (uri.error) {
    throw new SinkURIInvalidError(sink_uri, uri.error);
  }
  const scheme = uri.scheme?.toLowerCase() ?? '';
  if (!isSinkScheme(scheme)) {
    throw new SinkURIInvalidError(sink_uri, `unsupported scheme ${JSON.stringify(scheme)}`);
  }

  // Only the first colon separates user and password
  const userinfo = uri.userinfo ?? '';
  const separator = userinfo.indexOf(':');
  const username = separator < 0 ? userinfo : userinfo.slice(0, separator);
  const password = separator < 0 ? '' : userinfo.slice(separator + 1);
  const port = uri.port == null || uri.port === '' ? null : Number(uri.port);
  if (port != null && (!Number.isInteger(port) || port <= 0 || port > 65535)) {
    throw new SinkURIInvalidError(sink_uri, `invalid port ${JSON.stringify(uri.port)}`);
  }

  const parsed: SinkURI = {
    scheme,
    host: uri.host ?? '',
    port,
    path: (uri.path ?? '').replace(/^\/+/, ''),
    username: decodeUserinfo(sink_uri, username),
    password: decodeUserinfo(sink_uri, password),
    query: new URLSearchParams(uri.query ?? '')
  };
  checkSinkURI(sink_uri, parsed);
  return parsed;
}

function decodeUserinfo(sink_uri: string, value: string) {
  try {
    return decodeURIComponent(value);
  } catch (e) {
    throw new SinkURIInvalidError(sink_uri, 'malformed percent-encoding in user info');
  }
}

function checkSinkURI(sink_uri: string, uri: SinkURI) {
  switch (uri.scheme) {
    case SinkScheme.BLACKHOLE:
      return;
    case SinkScheme.MYSQL:
    case SinkScheme.TIDB:
      if (uri.host == '') {
        throw new SinkURIInvalidError(sink_uri, 'host required');
      }
      return;
    case SinkScheme.KAFKA:
    case SinkScheme.PULSAR: {
      if (uri.host == '') {
        throw new SinkURIInvalidError(sink_uri, 'host required');
      }
      if (uri.path == '') {
        throw new SinkURIInvalidError(sink_uri, 'topic required');
      }
      checkProtocol(sink_uri, uri, MQ_PROTOCOLS);
      const partitions = uri.query.get('partition-num');
      if (partitions != null && !/^[1-9][0-9]*$/.test(partitions)) {
        throw new SinkURIInvalidError(sink_uri, `partition-num must be a positive integer, got ${partitions}`);
      }
      return;
    }
    case SinkScheme.FILE:
    case SinkScheme.LOCAL:
    case SinkScheme.S3:
    case SinkScheme.GCS:
    case SinkScheme.AZBLOB:
      if (uri.host == '' && uri.path == '') {
        throw new SinkURIInvalidError(sink_uri, 'path or bucket required');
      }
      checkProtocol(sink_uri, uri, STORAGE_PROTOCOLS);
      return;
  }
}

function checkProtocol(sink_uri: string, uri: SinkURI, allowed: string[]) {
  const protocol = uri.query.get('protocol');
  if (protocol != null && !allowed.includes(protocol)) {
    throw new SinkURIInvalidError(
      sink_uri,
      `protocol ${JSON.stringify(protocol)} is not supported by ${uri.scheme} sinks, use one of ${allowed.join(', ')}`
    );
  }
}
