import { logger, SinkUnreachableError } from '@changeplane/lib-services-framework';
import mysql from 'mysql2/promise';
import { parseSinkURI, SinkScheme, SinkURI } from './sink-uri.js';

export type MySQLSinkConnection = {
  host: string;
  port: number;
  user: string;
  password: string;
};

/**
 * Opens a connection to the sink and closes it again. Rejects if the sink cannot be reached.
 */
export type MySQLConnector = (connection: MySQLSinkConnection) => Promise<void>;

export const DEFAULT_MYSQL_PORT = 3306;
export const DEFAULT_TIDB_PORT = 4000;
const CONNECT_TIMEOUT_MS = 5_000;

export const connectMySQL: MySQLConnector = async (options) => {
  const connection = await mysql.createConnection({
    ...options,
    connectTimeout: CONNECT_TIMEOUT_MS
  });
  await connection.end();
};

export type SinkValidatorOptions = {
  connectMySQL?: MySQLConnector;
};

/**
 * Checks that a changefeed's sink is usable before the changefeed is created or updated.
 */
export class SinkValidator {
  private connectMySQL: MySQLConnector;

  constructor(options?: SinkValidatorOptions) {
    this.connectMySQL = options?.connectMySQL ?? connectMySQL;
  }

  /**
   * @throws SinkURIInvalidError for unsupported or malformed URIs
   * @throws SinkUnreachableError if a database sink cannot be connected to
   */
  async validate(sink_uri: string): Promise<SinkURI> {
    const uri = parseSinkURI(sink_uri);
    if (uri.scheme == SinkScheme.MYSQL || uri.scheme == SinkScheme.TIDB) {
      const port = uri.port ?? (uri.scheme == SinkScheme.TIDB ? DEFAULT_TIDB_PORT : DEFAULT_MYSQL_PORT);
      try {
        await this.connectMySQL({ host: uri.host, port, user: uri.username || 'root', password: uri.password });
      } catch (e) {
        logger.warn(`Sink validation failed for ${uri.scheme}://${uri.host}:${port}`, e);
        throw new SinkUnreachableError(sink_uri, e);
      }
    }
    return uri;
  }
}
