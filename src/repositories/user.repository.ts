import { PoolClient } from 'pg';
import { query } from '@/config/database';
import { UserRow } from '@/models';
import { USER_TABLE } from '@/constants/database';
import { IUserRepository } from './interfaces/IUserRepository';

/**
 * User Repository
 * Handles all database operations for users
 *
 * Database errors (including unique violations) propagate unchanged.
 */
export class UserRepository implements IUserRepository {
  async insertUser(row: UserRow, client?: PoolClient): Promise<number> {
    const result = await query(
      `INSERT INTO ${USER_TABLE} (user_name, first_name, last_name, address)
       VALUES ($1, $2, $3, $4)`,
      [row.userName, row.firstName, row.lastName, row.address],
      client
    );

    return result.rowCount ?? 0;
  }

  async getAllUsers(client?: PoolClient): Promise<UserRow[]> {
    const result = await query<UserRow>(
      `SELECT
         user_name AS "userName",
         first_name AS "firstName",
         last_name AS "lastName",
         address
       FROM ${USER_TABLE}
       ORDER BY user_name`,
      [],
      client
    );

    return result.rows;
  }

  async deleteUserByUsername(userName: string, client?: PoolClient): Promise<number> {
    const result = await query(
      `DELETE FROM ${USER_TABLE} WHERE user_name = $1`,
      [userName],
      client
    );

    return result.rowCount ?? 0;
  }
}
