import { cleanEnv, str, num, bool } from 'envalid';
import dotenv from 'dotenv';

// Load .env file
dotenv.config();

/**
 * Validated environment variables
 *
 * Using envalid for runtime validation and type safety:
 * - Validates types (string, number, boolean)
 * - Enforces choices for enums
 * - Provides defaults for development/test
 * - Fails fast on startup if a value cannot be parsed
 */
export const env = cleanEnv(process.env, {
  // ==========================================
  // Server Configuration
  // ==========================================
  NODE_ENV: str({
    choices: ['development', 'test', 'production'],
    default: 'development',
    desc: 'Application environment (affects logging and CORS)',
  }),
  PORT: num({
    default: 3000,
    desc: 'HTTP server port',
  }),
  TRUST_PROXY: bool({
    default: false,
    desc: 'Trust X-Forwarded-* headers (enable only behind a known reverse proxy)',
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
    default: 'user_registry',
    desc: 'PostgreSQL database name',
  }),
  DB_USER: str({
    default: 'postgres',
    desc: 'PostgreSQL username',
  }),
  DB_PASSWORD: str({
    default: 'postgres', // Only for dev - production MUST set this explicitly
    desc: 'PostgreSQL password',
  }),
  DB_SSL: bool({
    default: false,
    desc: 'Connect over TLS (managed databases usually require it)',
  }),
  DB_MAX_CONNECTIONS: num({
    default: 20,
    desc: 'Maximum database connection pool size',
  }),

  // ==========================================
  // Logging Configuration
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
});
