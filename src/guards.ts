import fs from 'node:fs/promises';
import type { Db } from './db.js';

export async function roleExists(db: Db, roleName: string): Promise<boolean> {
  const res = await db.pool.query('SELECT 1 FROM pg_roles WHERE rolname = $1', [roleName]);
  return (res.rowCount ?? res.rows.length) > 0;
}

export async function databaseExists(db: Db, databaseName: string): Promise<boolean> {
  const res = await db.pool.query('SELECT 1 FROM pg_database WHERE datname = $1', [databaseName]);
  return (res.rowCount ?? res.rows.length) > 0;
}

export async function directoryExists(dirPath: string): Promise<boolean> {
  try {
    return (await fs.stat(dirPath)).isDirectory();
  } catch {
    return false;
  }
}
