import oracledb from 'oracledb';
import type { Connection } from 'oracledb';
import { buildDsn } from './dsn.js';
import type { Credentials, DatabaseSession, QueryOutcome, Row } from '../control-plane/types.js';

export class ConnectionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConnectionError';
  }
}

/** LOB columns come back as strings and buffers instead of open `Lob` streams. */
export function fetchLobsAsValues(metadata: { dbType?: unknown }) {
  if (metadata.dbType === oracledb.DB_TYPE_CLOB || metadata.dbType === oracledb.DB_TYPE_NCLOB) {
    return { type: oracledb.STRING };
  }
  if (metadata.dbType === oracledb.DB_TYPE_BLOB) {
    return { type: oracledb.BUFFER };
  }
  return undefined;
}

/**
 * A single Oracle connection. Queries are awaited one at a time by the
 * runner, so the connection is never used by two callers at once.
 */
export class OracleSession implements DatabaseSession {
  private closed = false;

  constructor(private readonly connection: Connection) {}

  async execute(query: string): Promise<QueryOutcome> {
    try {
      const result = await this.connection.execute<unknown[]>(query, [], {
        outFormat: oracledb.OUT_FORMAT_ARRAY,
        fetchTypeHandler: fetchLobsAsValues,
      });
      const rows: Row[] = result.rows ?? [];
      return { ok: true, rows };
    } catch (err) {
      return { ok: false, error: err instanceof Error ? err.message : String(err) };
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.connection.close();
  }
}

export async function connect(credentials: Credentials): Promise<DatabaseSession> {
  const connectString = buildDsn(credentials.host, credentials.port, credentials.service);
  try {
    const connection = await oracledb.getConnection({
      user: credentials.user,
      password: credentials.password,
      connectString,
    });
    return new OracleSession(connection);
  } catch (err) {
    throw new ConnectionError(err instanceof Error ? err.message : String(err));
  }
}
