import { Logger } from '@nestjs/common';
import { Pool } from 'pg';
import type { Env } from '../config/env.schema';

export const PG_POOL = Symbol('PG_POOL');

/**
 * The slice of pg the stores use. Rows come back unchecked; callers validate
 * them. Tests hand in a function instead of a pool.
 */
export type QueryFunction = (text: string, params: unknown[]) => Promise<{ rows: unknown[] }>;

const logger = new Logger('PgPool');

/** An idle client that dies is dropped by the pool; the next query opens a new one. */
export function createPool(env: Pick<Env, 'DATABASE_URL' | 'DB_POOL_SIZE' | 'DB_SSL'>): Pool {
  const pool = new Pool({
    connectionString: env.DATABASE_URL,
    max: env.DB_POOL_SIZE,
    ssl: env.DB_SSL ? { rejectUnauthorized: false } : undefined,
  });
  pool.on('error', (e) => logger.warn(`idle client error: ${e.message}`));
  return pool;
}

export function poolQuery(pool: Pool): QueryFunction {
  return (text, params) => pool.query(text, params);
}
