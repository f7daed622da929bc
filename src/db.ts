import { Pool } from 'pg';
import type { LocalConnection } from './types.js';

export type QueryRows = {
  rows: Array<Record<string, unknown>>;
  rowCount: number | null;
};

export type SqlClient = {
  query: (text: string, values?: unknown[]) => Promise<QueryRows>;
};

export type Db = {
  pool: SqlClient;
  close: () => Promise<void>;
};

export function createDb(connection: LocalConnection): Db {
  // A single connection is enough: statements run strictly one after another.
  // Nothing connects until the first query, so a dry run never touches the server.
  const pool = new Pool({
    host: connection.host,
    port: connection.port,
    user: connection.user,
    password: connection.password,
    database: connection.database,
    max: 1,
    idleTimeoutMillis: 10_000,
    connectionTimeoutMillis: 10_000
  });

  return {
    pool: {
      query: async (text, values) => {
        const res = await pool.query(text, values);
        return { rows: res.rows, rowCount: res.rowCount };
      }
    },
    close: async () => {
      await pool.end();
    }
  };
}
