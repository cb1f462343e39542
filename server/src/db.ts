import { readFile } from 'node:fs/promises';
import pg, { type PoolClient, type QueryResultRow } from 'pg';
import env from './env';
import { errorMessage } from './errors';
import { createLogger } from './logger';

const log = createLogger('db');

export const pool = new pg.Pool({
  connectionString: env.DATABASE_URL,
  ssl: env.PGSSL ? { rejectUnauthorized: false } : undefined,
});

pool.on('error', (error) => {
  log.error(`Idle client error: ${error.message}`);
});

export type Queryable = {
  query: <T extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]) => Promise<{ rows: T[] }>;
};

export async function query<T extends QueryResultRow = QueryResultRow>(
  text: string,
  params?: unknown[],
): Promise<{ rows: T[] }> {
  const res = await pool.query<T>(text, params);
  return { rows: res.rows };
}

const wrapClient = (client: PoolClient): Queryable => ({
  query: async <T extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]) => {
    const res = await client.query<T>(text, params);
    return { rows: res.rows };
  },
});

export async function withTransaction<T>(fn: (tx: Queryable) => Promise<T>): Promise<T> {
  const client = await pool.connect();
  try {
    await client.query('BEGIN');
    const result = await fn(wrapClient(client));
    await client.query('COMMIT');
    client.release();
    return result;
  } catch (error) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackError) {
      // A client that cannot roll back is discarded instead of returned to the pool.
      log.error(`Rollback failed: ${errorMessage(rollbackError)}`);
      client.release(rollbackError instanceof Error ? rollbackError : true);
      throw error;
    }
    client.release();
    throw error;
  }
}

export async function migrate(): Promise<void> {
  const schema = await readFile(new URL('./schema.sql', import.meta.url), 'utf8');
  await query(schema);
  log.info('Schema applied');
}

export function databaseName(): string {
  if (!env.DATABASE_URL) {
    return 'unconfigured';
  }

  try {
    return new URL(env.DATABASE_URL).pathname.replace(/^\//, '') || 'postgres';
  } catch {
    return 'unknown';
  }
}

// Stays under Postgres' 65535 bind parameter limit per statement.
const MAX_PARAMS = 60000;

/** Multi-row INSERT of records whose keys match the table's columns. */
export async function insertRows<T extends Record<string, unknown>>(
  db: Queryable,
  table: string,
  rows: T[],
): Promise<number> {
  if (rows.length === 0) {
    return 0;
  }

  const columns = Object.keys(rows[0]);
  const chunkSize = Math.max(1, Math.floor(MAX_PARAMS / columns.length));

  for (let start = 0; start < rows.length; start += chunkSize) {
    const chunk = rows.slice(start, start + chunkSize);
    const valuesSql = chunk
      .map((_row, i) => `(${columns.map((_column, j) => `$${i * columns.length + j + 1}`).join(', ')})`)
      .join(', ');
    const params = chunk.flatMap((row) => columns.map((column) => row[column]));

    await db.query(`INSERT INTO ${table} (${columns.join(', ')}) VALUES ${valuesSql}`, params);
  }

  return rows.length;
}
