/**
 * Database Connection Pool Configuration
 *
 * PostgreSQL pool settings. Every ledger mutation holds one client for the
 * whole unit of work (BEGIN ... COMMIT), so `max` bounds the number of
 * concurrent create/update/delete calls per instance.
 *
 * See: https://node-postgres.com/apis/pool
 */

import { env } from './env';

export const DATABASE_POOL_CONFIG = {
  /**
   * Connections kept warm so the first requests after idle periods
   * do not pay the connection handshake.
   */
  min: 2,

  /**
   * Upper bound per app instance. PostgreSQL defaults to max_connections = 100,
   * leave headroom for migrations and admin sessions.
   */
  max: env.DB_MAX_CONNECTIONS,

  /** Idle connections are closed after 5 minutes */
  idleTimeoutMillis: 300_000,

  /** Fail a request after waiting 10 seconds for a free connection */
  connectionTimeoutMillis: 10_000,

  /** Recycle a connection after this many queries */
  maxUses: 7_500,
} as const;

export type DatabasePoolConfig = typeof DATABASE_POOL_CONFIG;
