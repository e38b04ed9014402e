/**
 * Database Connection Pool Configuration
 *
 * PostgreSQL pool settings for node-postgres.
 * See: https://node-postgres.com/apis/pool
 */

import { env } from './env';

export const DATABASE_POOL_CONFIG = {
  /**
   * Minimum number of connections to keep in pool
   *
   * Keeps a couple of connections warm so the first requests after an
   * idle period do not pay the connection handshake.
   */
  min: 2,

  /**
   * Maximum number of connections in pool
   *
   * Bounds concurrent database usage: each request holds at most one
   * connection for the lifetime of its transaction.
   */
  max: env.DB_MAX_CONNECTIONS,

  /**
   * Idle connection timeout (5 minutes)
   */
  idleTimeoutMillis: 300_000,

  /**
   * Connection acquisition timeout (10 seconds)
   *
   * When every connection is busy a request waits this long before
   * failing with a transaction error.
   */
  connectionTimeoutMillis: 10_000,

  /**
   * Recycle a connection after this many uses
   */
  maxUses: 7_500,
} as const;
