import { Pool, PoolClient, QueryResult, QueryResultRow } from 'pg';
import { env } from '@/config/env';
import { createLogger } from '@/adapters/logging/LoggerFactory';
import { DATABASE_POOL_CONFIG } from '@/config/database.config';
import { DB_QUERY_LIMITS } from '@/config/businessRules';

const logger = createLogger('Database');

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
});

// Let pool handle client recycling - don't crash the process
pool.on('error', (err) => {
  logger.error({ err }, 'Unexpected error on idle PostgreSQL client');
});

pool.on('connect', (client) => {
  logger.debug('New PostgreSQL client connected to pool');

  client
    .query(`SET statement_timeout = ${DB_QUERY_LIMITS.STATEMENT_TIMEOUT_MS}`)
    .then(() => {
      logger.debug(
        { timeout_ms: DB_QUERY_LIMITS.STATEMENT_TIMEOUT_MS },
        'Statement timeout configured for connection'
      );
    })
    .catch((error: unknown) => {
      logger.error({ error }, 'Failed to set statement timeout');
    });
});

/**
 * Execute a SQL query with parameters
 *
 * Runs on the given transaction client when one is passed, otherwise on
 * a pooled connection. Errors are logged and rethrown unchanged.
 *
 * @param text - SQL query string
 * @param params - Query parameters
 * @param client - Optional PoolClient of an open transaction
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
      logger.warn({ query: text, duration }, 'Slow SQL query');
    } else {
      logger.debug(
        {
          query: text,
          duration,
          rows: result.rowCount,
        },
        'Executed SQL query'
      );
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
 * Commits when the callback resolves, rolls back when it throws.
 *
 * READ COMMITTED is enough here: inserts rely on the unique index and
 * deletes on the affected-row count, both atomic per statement.
 *
 * @param callback - Function to execute within transaction
 * @returns Result of the callback function
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
    try {
      await client.query('ROLLBACK');
      logger.debug({ error }, 'Transaction rolled back');
    } catch (rollbackError) {
      logger.error({ error: rollbackError }, 'Failed to roll back transaction');
    }
    throw error;
  } finally {
    client.release();
  }
}

/**
 * Test database connection
 * Used at startup before the server starts listening
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
