import { Pool, PoolClient, QueryResult, QueryResultRow } from 'pg';
import { env } from '@/config/env';
import { logger } from '@/adapters/logging/LoggerFactory';
import { DATABASE_POOL_CONFIG } from '@/config/database.config';
import { DB_QUERY_LIMITS } from '@/config/businessRules';

/**
 * PostgreSQL connection pool
 * Configuration values come from database.config.ts
 */
const pool = new Pool({
  host: env.DB_HOST,
  port: env.DB_PORT,
  database: env.DB_NAME,
  user: env.DB_USER,
  password: env.DB_PASSWORD,
  ssl: env.DB_SSL ? { rejectUnauthorized: false } : undefined,
  min: DATABASE_POOL_CONFIG.min,
  max: DATABASE_POOL_CONFIG.max,
  idleTimeoutMillis: DATABASE_POOL_CONFIG.idleTimeoutMillis,
  connectionTimeoutMillis: DATABASE_POOL_CONFIG.connectionTimeoutMillis,
  maxUses: DATABASE_POOL_CONFIG.maxUses,
  statement_timeout: DB_QUERY_LIMITS.STATEMENT_TIMEOUT_MS,
});

// Let the pool recycle broken idle clients instead of crashing the process
pool.on('error', (err) => {
  logger.error({ err }, 'Unexpected error on idle PostgreSQL client');
});

pool.on('connect', () => {
  logger.debug('New PostgreSQL client connected to pool');
});

/**
 * Execute a SQL query with parameters
 *
 * Runs on the given client when called inside a unit of work, on the pool otherwise.
 */
export async function query<T extends QueryResultRow = QueryResultRow>(
  text: string,
  params: unknown[] = [],
  client?: PoolClient
): Promise<QueryResult<T>> {
  const start = Date.now();
  try {
    const result = client
      ? await client.query<T>(text, params)
      : await pool.query<T>(text, params);
    const duration = Date.now() - start;

    if (duration >= DB_QUERY_LIMITS.SLOW_QUERY_THRESHOLD_MS) {
      logger.warn({ query: text, duration, rows: result.rowCount }, 'Slow SQL query');
    } else {
      logger.debug({ query: text, duration, rows: result.rowCount }, 'Executed SQL query');
    }

    return result;
  } catch (error) {
    logger.error(
      {
        error,
        query: text,
        paramCount: params.length,
      },
      'Database query error'
    );
    throw error;
  }
}

/**
 * Get a client from the pool for transactions
 * IMPORTANT: Remember to call client.release() when done
 */
export async function getClient(): Promise<PoolClient> {
  return await pool.connect();
}

/**
 * Execute a function within a database transaction
 *
 * READ COMMITTED combined with `SELECT ... FOR UPDATE` on the position rows and
 * the transaction row being changed. Any error rolls back the whole unit of work.
 */
export async function transaction<T>(
  callback: (client: PoolClient) => Promise<T>
): Promise<T> {
  const client = await getClient();

  try {
    await client.query('BEGIN TRANSACTION ISOLATION LEVEL READ COMMITTED');
    logger.debug('Transaction started with READ COMMITTED isolation');

    const result = await callback(client);

    await client.query('COMMIT');
    logger.debug('Transaction committed');

    return result;
  } catch (error) {
    await client.query('ROLLBACK');
    logger.error({ error }, 'Transaction rolled back');
    throw error;
  } finally {
    client.release();
  }
}

/**
 * Test database connection
 * Used for startup validation
 */
export async function testConnection(): Promise<boolean> {
  try {
    const result = await query<{ now: Date }>('SELECT NOW() AS now');
    logger.info({ time: result.rows[0]?.now }, 'Database connection successful');
    return true;
  } catch (error) {
    logger.error({ error }, 'Database connection failed');
    return false;
  }
}

/**
 * Close all connections in the pool
 * Should be called during graceful shutdown
 */
export async function closePool(): Promise<void> {
  await pool.end();
  logger.info('Database pool closed');
}

export { pool };
