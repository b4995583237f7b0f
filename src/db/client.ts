import { Client } from 'pg';
import type { DatabaseConfig } from '../config/env';
import { ConfigurationError, ConnectionError, formatError } from './errors';

export type Logger = Pick<Console, 'log' | 'error'>;

export interface SqlConnection {
  query(text: string): Promise<unknown>;
  end(): Promise<void>;
}

export interface ConnectableClient extends SqlConnection {
  connect(): Promise<void>;
}

export interface ConnectionDeps {
  logger?: Logger;
  createClient?: (config: DatabaseConfig) => ConnectableClient;
}

export function createPgClient(config: DatabaseConfig): ConnectableClient {
  return new Client({
    connectionString: config.url,
    ssl: config.ssl ? { rejectUnauthorized: false } : false,
    connectionTimeoutMillis: config.connectionTimeoutMillis,
  });
}

// Mask password in logs
export function maskConnectionString(url: string): string {
  return url.replace(/:([^:@/]+)@/, ':***@');
}

export async function openConnection(
  config: DatabaseConfig,
  deps: ConnectionDeps = {}
): Promise<SqlConnection> {
  const logger = deps.logger ?? console;
  const createClient = deps.createClient ?? createPgClient;
  const masked = maskConnectionString(config.url);

  // pg parses the URI (and reads any sslcert/sslkey files) while constructing
  let client: ConnectableClient;
  try {
    client = createClient(config);
  } catch (error) {
    throw new ConfigurationError(
      `Invalid connection string ${masked}: ${formatError(error)}`,
      { cause: error }
    );
  }

  logger.log(`Connecting to database ${masked}...`);
  try {
    await client.connect();
  } catch (error) {
    await client.end().catch(endError => {
      logger.error(`✗ Error closing connection: ${formatError(endError)}`);
    });
    throw new ConnectionError(error);
  }
  logger.log('✓ Connected successfully!');

  return client;
}

/**
 * Opens a connection, hands it to `fn` and closes it afterwards, whatever
 * `fn` returns or throws. A failing close is logged and never replaces the
 * result of `fn`.
 */
export async function withConnection<T>(
  config: DatabaseConfig,
  fn: (connection: SqlConnection) => Promise<T>,
  deps: ConnectionDeps = {}
): Promise<T> {
  const logger = deps.logger ?? console;
  const connection = await openConnection(config, deps);

  try {
    return await fn(connection);
  } finally {
    try {
      await connection.end();
    } catch (error) {
      logger.error(`✗ Error closing connection: ${formatError(error)}`);
    }
  }
}
