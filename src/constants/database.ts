/**
 * PostgreSQL error codes (SQLSTATE) the application reacts to
 * See: https://www.postgresql.org/docs/current/errcodes-appendix.html
 */
export const PG_ERROR_CODES = {
  UNIQUE_VIOLATION: '23505',
} as const;

export const USER_TABLE = 'user_table';

export type PgErrorCode = (typeof PG_ERROR_CODES)[keyof typeof PG_ERROR_CODES];
