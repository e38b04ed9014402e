import { PoolClient } from 'pg';
import { User } from '@/models';

/**
 * User Service Interface
 * Domain-facing wrapper around the user repository
 */
export interface IUserService {
  /** @returns number of inserted rows */
  insertUser(user: User, client?: PoolClient): Promise<number>;

  getAllUsers(client?: PoolClient): Promise<User[]>;

  /** @returns number of deleted rows */
  deleteUserByUsername(userName: string, client?: PoolClient): Promise<number>;
}
