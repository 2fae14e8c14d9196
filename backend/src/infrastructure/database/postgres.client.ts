/**
 * PostgreSQL connection pool
 * Master data: users, API keys
 *
 * Every statement runs under `statement_timeout`, so a stalled database
 * surfaces as an error instead of a hung request.
 */

import pg from 'pg';
import type { Pool, QueryResult, QueryResultRow } from 'pg';
import type { Config } from '../../config/index.js';
import { createLogger } from '../logging/logger.js';

const logger = createLogger('postgres-client');

const SLOW_QUERY_MS = 100;

let pool: Pool | null = null;

/**
 * Minimal query surface the repositories depend on
 */
export interface Queryable {
  query<R extends QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>>;
}

export function createPostgresPool(config: Config): Pool {
  if (pool) {
    return pool;
  }

  pool = new pg.Pool({
    connectionString: config.postgres.url,
    max: config.postgres.poolMax,
    connectionTimeoutMillis: config.postgres.connectionTimeoutMs,
    statement_timeout: config.postgres.statementTimeoutMs,
    idleTimeoutMillis: 30000,
  });

  pool.on('error', (error: Error) => {
    logger.error({ error: error.message }, 'Idle PostgreSQL client error');
  });

  return pool;
}

export async function closePostgresPool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
    logger.info('PostgreSQL pool closed');
  }
}

/**
 * Run a parameterised statement, warning on slow queries
 */
export async function timedQuery<R extends QueryResultRow>(
  db: Queryable,
  text: string,
  values: unknown[] = []
): Promise<QueryResult<R>> {
  const startedAt = Date.now();
  const result = await db.query<R>(text, values);
  const duration = Date.now() - startedAt;
  if (duration > SLOW_QUERY_MS) {
    logger.warn({ query: text.replace(/\s+/g, ' ').trim().substring(0, 100), duration }, 'Slow query');
  }
  return result;
}
