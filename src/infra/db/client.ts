import fs from 'fs';
import path from 'path';
import { Pool, PoolClient, QueryResult, QueryResultRow } from 'pg';
import { config } from '../../config';
import { logger } from '../logging/logger';
import { DatabaseError } from '../../shared/errors';

export function createPool(connectionString: string): Pool {
  const pool = new Pool({
    connectionString,
    max: 20,                          // Max connections per instance
    idleTimeoutMillis: 30000,         // Close after 30s idle
    connectionTimeoutMillis: 5000,    // Fail fast on connection
    statement_timeout: 10000,         // Server-side bound for any single query
    maxUses: 10000,                   // Refresh connections periodically
    allowExitOnIdle: false,
  });

  pool.on('connect', () => {
    logger.debug('New database connection established');
  });

  pool.on('error', (err) => {
    logger.error({ error: err.message }, 'Unexpected database pool error');
  });

  return pool;
}

export const db = createPool(config.databaseUrl);

// Health check
export async function checkDatabaseHealth(pool: Pool = db): Promise<{
  healthy: boolean;
  latencyMs: number;
  connections: {
    total: number;
    idle: number;
    waiting: number;
  };
}> {
  const start = Date.now();
  const connections = () => ({
    total: pool.totalCount,
    idle: pool.idleCount,
    waiting: pool.waitingCount,
  });

  try {
    await pool.query('SELECT 1');
    return { healthy: true, latencyMs: Date.now() - start, connections: connections() };
  } catch (error) {
    logger.warn({ error: error instanceof Error ? error.message : String(error) }, 'Database health check failed');
    return { healthy: false, latencyMs: Date.now() - start, connections: connections() };
  }
}

// ============================================================================
// Query Helpers
// ============================================================================

export type Queryable = Pick<Pool, 'query'> | PoolClient;

export async function runQuery<T extends QueryResultRow = QueryResultRow>(
  executor: Queryable,
  text: string,
  params?: unknown[]
): Promise<QueryResult<T>> {
  const start = Date.now();

  try {
    const result = await executor.query<T>(text, params);
    const duration = Date.now() - start;

    if (duration > 1000) {
      logger.warn({ query: text.substring(0, 100), duration }, 'Slow query detected');
    }

    return result;
  } catch (error) {
    const err = error instanceof Error ? error : new Error(String(error));
    logger.error({ query: text.substring(0, 100), error: err.message }, 'Query failed');
    throw new DatabaseError(err.message, err);
  }
}

// ============================================================================
// Transaction Support
// ============================================================================

export async function withTransaction<T>(
  pool: Pool,
  callback: (client: PoolClient) => Promise<T>
): Promise<T> {
  const client = await pool.connect();

  try {
    await client.query('BEGIN');
    const result = await callback(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    client.release();
  }
}

// ============================================================================
// Migrations
// ============================================================================

const MIGRATIONS_DIR = path.join(__dirname, '..', '..', '..', 'migrations');

/**
 * Apply every .sql file in migrations/ once, in file-name order.
 */
export async function runMigrations(pool: Pool = db, dir: string = MIGRATIONS_DIR): Promise<string[]> {
  const files = fs
    .readdirSync(dir)
    .filter((f) => f.endsWith('.sql'))
    .sort();

  await runQuery(
    pool,
    `CREATE TABLE IF NOT EXISTS schema_migrations (
       name TEXT PRIMARY KEY,
       applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
     )`
  );

  const applied: string[] = [];

  for (const file of files) {
    const existing = await runQuery<{ name: string }>(
      pool,
      'SELECT name FROM schema_migrations WHERE name = $1',
      [file]
    );
    if (existing.rows.length > 0) continue;

    const sql = fs.readFileSync(path.join(dir, file), 'utf8');
    await withTransaction(pool, async (client) => {
      await client.query(sql);
      await client.query('INSERT INTO schema_migrations (name) VALUES ($1)', [file]);
    });

    logger.info({ migration: file }, 'Migration applied');
    applied.push(file);
  }

  return applied;
}
