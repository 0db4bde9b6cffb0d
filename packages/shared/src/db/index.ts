import { promises as fs } from 'node:fs';
import path from 'node:path';

import { Pool, type PoolClient, type QueryResult, type QueryResultRow } from 'pg';

import { config } from '../config';
import { logger } from '../logger';

let pool: Pool | null = null;

/** Anything that can run a parameterised statement: the pool or a checked-out client. */
export interface Queryable {
  query<R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>>;
}

export function getDb(): Pool {
  if (!pool) {
    pool = new Pool({
      connectionString: config.DATABASE_URL,
      max: config.DATABASE_MAX_POOL
    });
  }

  return pool;
}

export async function withTransaction<T>(
  handler: (client: PoolClient) => Promise<T>
): Promise<T> {
  const client = await getDb().connect();

  try {
    await client.query('BEGIN');
    const result = await handler(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    client.release();
  }
}

export async function closeDb(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
}

export async function runMigrations(): Promise<void> {
  const migrationsDir = config.MIGRATIONS_DIR;
  const files = await fs.readdir(migrationsDir);
  const sqlFiles = files.filter((file) => file.endsWith('.sql')).sort();

  if (sqlFiles.length === 0) {
    logger.info({ migrationsDir }, 'No SQL migrations found');
    return;
  }

  const client = await getDb().connect();

  try {
    await client.query(
      `CREATE TABLE IF NOT EXISTS schema_migrations (
         name TEXT PRIMARY KEY,
         applied_at TIMESTAMPTZ NOT NULL DEFAULT now()
       )`
    );
    const applied = await client.query<{ name: string }>('SELECT name FROM schema_migrations');
    const appliedNames = new Set(applied.rows.map((row) => row.name));
    let executed = 0;

    for (const file of sqlFiles) {
      if (appliedNames.has(file)) continue;

      const sql = await fs.readFile(path.join(migrationsDir, file), 'utf-8');
      logger.info({ migration: file }, 'Applying migration');

      await client.query('BEGIN');
      try {
        await client.query(sql);
        await client.query('INSERT INTO schema_migrations (name) VALUES ($1)', [file]);
        await client.query('COMMIT');
      } catch (error) {
        await client.query('ROLLBACK');
        throw error;
      }
      executed += 1;
    }

    logger.info({ executed, total: sqlFiles.length }, 'Migrations applied');
  } catch (error) {
    logger.error({ error }, 'Failed to apply migrations');
    throw error;
  } finally {
    client.release();
  }
}
