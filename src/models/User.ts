/**
 * User domain model
 * userName is unique across the table; address is optional.
 */
export interface User {
  userName: string;
  firstName: string;
  lastName: string;
  address?: string;
}

/**
 * Persisted representation of a User
 * Matches the 'user_table' schema (columns aliased to camelCase)
 */
export type UserRow = {
  userName: string;
  firstName: string;
  lastName: string;
  address: string | null;
};
