import { cleanEnv, str, num, bool } from 'envalid';
import dotenv from 'dotenv';

// Load .env file
dotenv.config();

/**
 * Validated environment variables
 *
 * envalid validates types, enforces choices and fails fast on startup
 * when a required variable is missing. Test runs set LOG_LEVEL=silent.
 */
export const env = cleanEnv(process.env, {
  // ==========================================
  // Server Configuration
  // ==========================================
  NODE_ENV: str({
    choices: ['development', 'test', 'production'],
    default: 'development',
    desc: 'Application environment (affects logging, error handling, CORS)',
  }),
  PORT: num({
    default: 3000,
    desc: 'HTTP server port',
  }),

  // ==========================================
  // Database Configuration
  // ==========================================
  DB_HOST: str({
    default: 'localhost',
    desc: 'PostgreSQL host',
  }),
  DB_PORT: num({
    default: 5432,
    desc: 'PostgreSQL port',
  }),
  DB_NAME: str({
    default: 'position_ledger',
    desc: 'PostgreSQL database name',
  }),
  DB_USER: str({
    default: 'postgres',
    desc: 'PostgreSQL username',
  }),
  DB_PASSWORD: str({
    devDefault: 'postgres',
    desc: 'PostgreSQL password (required in production)',
  }),
  DB_MAX_CONNECTIONS: num({
    default: 20,
    desc: 'Maximum database connection pool size',
  }),
  DB_SSL: bool({
    default: false,
    desc: 'Connect to PostgreSQL over TLS (managed databases)',
  }),

  // ==========================================
  // Observability
  // ==========================================
  LOG_LEVEL: str({
    choices: ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'],
    default: 'info',
    desc: 'Minimum log level to output',
  }),
  LOG_PRETTY: bool({
    default: true,
    desc: 'Pretty-print logs in development (false for JSON logs)',
  }),
  METRICS_TYPE: str({
    choices: ['memory', 'noop'],
    default: 'memory',
    desc: 'Metrics backend: in-process Prometheus registry or disabled',
  }),
});

export type Env = typeof env;
