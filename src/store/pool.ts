import pg from 'pg';

/**
 * Creates a pool from `DATABASE_URL` and, when set, `DATABASE_POOL_MAX`.
 * The pool connects lazily, on its first query.
 */
export function createPool(env: NodeJS.ProcessEnv = process.env): pg.Pool {
  const connectionString = env['DATABASE_URL'];
  if (!connectionString) {
    throw new Error('DATABASE_URL environment variable is required');
  }

  const rawMax = env['DATABASE_POOL_MAX'];
  if (rawMax === undefined || rawMax === '') {
    return new pg.Pool({ connectionString });
  }

  const max = parseInt(rawMax, 10);
  if (!Number.isInteger(max) || max < 1) {
    throw new Error(`DATABASE_POOL_MAX must be a positive integer, got "${rawMax}"`);
  }
  return new pg.Pool({ connectionString, max });
}
