import { User } from '@/models';

/**
 * User Program Interface
 *
 * One method per endpoint. Each call is a single database transaction
 * and fails only with the typed errors from '@/errors'.
 */
export interface IUserProgram {
  /**
   * @returns number of inserted rows (1)
   * @throws UserAlreadyExistsError when the userName is taken
   * @throws UserNotInsertedError when no row was written
   * @throws DatabaseTransactionError on any other database failure
   */
  insertUser(user: User): Promise<number>;

  /**
   * @throws DatabaseTransactionError
   */
  getAllUsers(): Promise<User[]>;

  /**
   * @throws UserAlreadyDeletedError when no row matched
   * @throws DatabaseTransactionError on any other database failure
   */
  deleteUserByUsername(userName: string): Promise<void>;
}
