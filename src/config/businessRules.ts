/**
 * Business Rules Configuration
 *
 * Centralized limits for the user API. These values can be adjusted
 * without touching validation schemas or middleware.
 */

/**
 * User Field Limits
 *
 * Mirror the column sizes in database/migrations/V1__create_user_table.sql.
 * A payload that passes validation must always fit the table.
 */
export const USER_FIELD_LIMITS = {
  /** user_name, first_name and last_name are VARCHAR(255) */
  MAX_NAME_LENGTH: 255,

  /** address is TEXT; capped so a single row stays well under the body limit */
  MAX_ADDRESS_LENGTH: 1_000,
} as const;

/**
 * Rate Limiting Configuration
 *
 * - Global limits apply to all endpoints except /health
 * - Stricter limits for mutations (POST /user, DELETE /user/:username)
 */
export const RATE_LIMITS = {
  GLOBAL: {
    WINDOW_MS: 60_000, // 1 minute
    MAX_REQUESTS: 100,
  },

  /**
   * Creating and deleting users touches the unique index and takes a
   * transaction each time; 30/min is plenty for an admin client.
   */
  USER_MUTATIONS: {
    WINDOW_MS: 60_000, // 1 minute
    MAX_REQUESTS: 30,
  },
} as const;

/**
 * Database Query Configuration
 */
export const DB_QUERY_LIMITS = {
  /**
   * Global statement timeout (10 seconds)
   * Every statement here is a single-row insert/delete or a table scan of users
   */
  STATEMENT_TIMEOUT_MS: 10_000,

  /**
   * Queries slower than this are logged at warn level
   */
  SLOW_QUERY_THRESHOLD_MS: 1_000,
} as const;
