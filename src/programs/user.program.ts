import { PoolClient } from 'pg';
import { transaction } from '@/config/database';
import { User } from '@/models';
import { PG_ERROR_CODES, PgErrorCode } from '@/constants/database';
import {
  AppError,
  DatabaseTransactionError,
  UserAlreadyDeletedError,
  UserAlreadyExistsError,
  UserNotInsertedError,
} from '@/errors';
import { createLogger } from '@/adapters/logging/LoggerFactory';
import { IUserService } from '@/services/interfaces/IUserService';
import { IUserProgram } from './interfaces/IUserProgram';

const logger = createLogger('UserProgram');

/**
 * True for PostgreSQL errors carrying the given SQLSTATE
 */
function hasPgErrorCode(error: unknown, code: PgErrorCode): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === code;
}

/**
 * User Program
 * Transaction boundary for user operations
 *
 * Row counts from the service are interpreted here and nowhere else:
 * - insert of 0 rows  -> UserNotInsertedError
 * - delete of 0 rows  -> UserAlreadyDeletedError
 * Failures are re-typed on the way out:
 * - unique violation  -> UserAlreadyExistsError
 * - anything else     -> DatabaseTransactionError
 */
export class UserProgram implements IUserProgram {
  constructor(private userService: IUserService) {}

  async insertUser(user: User): Promise<number> {
    const count = await this.inTransaction('insertUser', async (client) => {
      const inserted = await this.userService.insertUser(user, client);
      if (inserted === 0) {
        throw new UserNotInsertedError();
      }
      return inserted;
    });

    logger.info({ userName: user.userName }, 'User created');
    return count;
  }

  async getAllUsers(): Promise<User[]> {
    return await this.inTransaction('getAllUsers', (client) =>
      this.userService.getAllUsers(client)
    );
  }

  async deleteUserByUsername(userName: string): Promise<void> {
    await this.inTransaction('deleteUserByUsername', async (client) => {
      const deleted = await this.userService.deleteUserByUsername(userName, client);
      if (deleted === 0) {
        throw new UserAlreadyDeletedError();
      }
    });

    logger.info({ userName }, 'User deleted');
  }

  private async inTransaction<T>(
    operation: string,
    work: (client: PoolClient) => Promise<T>
  ): Promise<T> {
    try {
      return await transaction(work);
    } catch (error) {
      throw this.toDomainError(operation, error);
    }
  }

  private toDomainError(operation: string, error: unknown): AppError {
    if (error instanceof AppError) {
      logger.warn({ operation, error: error.name }, 'User operation rejected');
      return error;
    }

    if (hasPgErrorCode(error, PG_ERROR_CODES.UNIQUE_VIOLATION)) {
      logger.warn({ operation }, 'Unique constraint violated on user_name');
      return new UserAlreadyExistsError();
    }

    logger.error({ operation, error }, 'User transaction failed');
    return new DatabaseTransactionError('transaction error', error);
  }
}
