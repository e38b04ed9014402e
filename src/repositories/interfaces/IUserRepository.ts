import { PoolClient } from 'pg';
import { UserRow } from '@/models';

/**
 * User Repository Interface
 * Defines the contract for user data access operations
 *
 * Every method can run inside a transaction by passing a client.
 * Counts are returned as reported by PostgreSQL; interpreting them is
 * left to the caller.
 */
export interface IUserRepository {
  /**
   * Insert a user row
   * @param row - Row to insert
   * @param client - Optional PoolClient for transaction support
   * @returns Promise resolving to the number of inserted rows
   */
  insertUser(row: UserRow, client?: PoolClient): Promise<number>;

  /**
   * Select every user row, ordered by user name
   * @param client - Optional PoolClient for transaction support
   */
  getAllUsers(client?: PoolClient): Promise<UserRow[]>;

  /**
   * Delete the row with the given user name
   * @param userName - Unique user name
   * @param client - Optional PoolClient for transaction support
   * @returns Promise resolving to the number of deleted rows (0 or 1)
   */
  deleteUserByUsername(userName: string, client?: PoolClient): Promise<number>;
}
