import { PoolClient } from 'pg';
import { UserProgram } from '@/programs/user.program';
import { transaction } from '@/config/database';
import { createMockUserService } from '@/tests/utils/mockServices';
import { createFakeClient } from '@/tests/utils/database';
import { IUserService } from '@/services/interfaces/IUserService';
import { User } from '@/models';
import {
  DatabaseTransactionError,
  UserAlreadyDeletedError,
  UserAlreadyExistsError,
  UserNotInsertedError,
} from '@/errors';

// Mock the transaction function to execute callback immediately with a fake client
const mockClient = createFakeClient();

jest.mock('@/config/database', () => ({
  transaction: jest.fn((callback: (client: PoolClient) => Promise<unknown>) => callback(mockClient)),
}));

const mockTransaction = jest.mocked(transaction);

function uniqueViolation(): Error {
  return Object.assign(
    new Error('duplicate key value violates unique constraint "user_table_user_name_key"'),
    { code: '23505' }
  );
}

async function failureOf(promise: Promise<unknown>): Promise<unknown> {
  return promise.then(
    () => {
      throw new Error('Expected the promise to reject');
    },
    (error: unknown) => error
  );
}

describe('UserProgram', () => {
  let userProgram: UserProgram;
  let mockUserService: jest.Mocked<IUserService>;

  const user: User = { userName: 'jdoe', firstName: 'Jane', lastName: 'Doe' };

  beforeEach(() => {
    mockUserService = createMockUserService();
    userProgram = new UserProgram(mockUserService);
  });

  describe('insertUser', () => {
    it('should insert inside a transaction and return the row count', async () => {
      mockUserService.insertUser.mockResolvedValue(1);

      await expect(userProgram.insertUser(user)).resolves.toBe(1);
      expect(mockTransaction).toHaveBeenCalledTimes(1);
      expect(mockUserService.insertUser).toHaveBeenCalledWith(user, mockClient);
    });

    it('should throw UserNotInsertedError when no row was written', async () => {
      mockUserService.insertUser.mockResolvedValue(0);

      const error = await failureOf(userProgram.insertUser(user));

      expect(error).toBeInstanceOf(UserNotInsertedError);
      expect(error).toMatchObject({ message: 'failed to insert the user', statusCode: 500 });
    });

    it('should throw UserAlreadyExistsError on a unique violation', async () => {
      mockUserService.insertUser.mockRejectedValue(uniqueViolation());

      const error = await failureOf(userProgram.insertUser(user));

      expect(error).toBeInstanceOf(UserAlreadyExistsError);
      expect(error).toMatchObject({ message: 'user already exists', statusCode: 409 });
    });

    it('should throw DatabaseTransactionError on any other database failure', async () => {
      const cause = new Error('relation "user_table" does not exist');
      mockUserService.insertUser.mockRejectedValue(cause);

      const error = await failureOf(userProgram.insertUser(user));

      expect(error).toBeInstanceOf(DatabaseTransactionError);
      expect(error).toMatchObject({ message: 'transaction error', statusCode: 500 });
      expect(error).toHaveProperty('cause', cause);
    });

    it('should throw DatabaseTransactionError when the transaction cannot start', async () => {
      mockTransaction.mockRejectedValueOnce(new Error('connect ECONNREFUSED 127.0.0.1:5432'));

      const error = await failureOf(userProgram.insertUser(user));

      expect(error).toBeInstanceOf(DatabaseTransactionError);
      expect(mockUserService.insertUser).not.toHaveBeenCalled();
    });
  });

  describe('getAllUsers', () => {
    it('should return the users read inside a transaction', async () => {
      const users: User[] = [user, { ...user, userName: 'jdoe2', address: '1 Main Street' }];
      mockUserService.getAllUsers.mockResolvedValue(users);

      await expect(userProgram.getAllUsers()).resolves.toEqual(users);
      expect(mockUserService.getAllUsers).toHaveBeenCalledWith(mockClient);
    });

    it('should throw DatabaseTransactionError when the read fails', async () => {
      mockUserService.getAllUsers.mockRejectedValue(new Error('canceling statement due to statement timeout'));

      const error = await failureOf(userProgram.getAllUsers());

      expect(error).toBeInstanceOf(DatabaseTransactionError);
      expect(error).toMatchObject({ message: 'transaction error' });
    });
  });

  describe('deleteUserByUsername', () => {
    it('should resolve when exactly one row was deleted', async () => {
      mockUserService.deleteUserByUsername.mockResolvedValue(1);

      await expect(userProgram.deleteUserByUsername('jdoe')).resolves.toBeUndefined();
      expect(mockUserService.deleteUserByUsername).toHaveBeenCalledWith('jdoe', mockClient);
    });

    it('should throw UserAlreadyDeletedError when no row matched', async () => {
      mockUserService.deleteUserByUsername.mockResolvedValue(0);

      const error = await failureOf(userProgram.deleteUserByUsername('jdoe'));

      expect(error).toBeInstanceOf(UserAlreadyDeletedError);
      expect(error).toMatchObject({ message: 'already deleted', statusCode: 400 });
    });

    it('should throw DatabaseTransactionError when the delete fails', async () => {
      mockUserService.deleteUserByUsername.mockRejectedValue(new Error('Connection terminated unexpectedly'));

      const error = await failureOf(userProgram.deleteUserByUsername('jdoe'));

      expect(error).toBeInstanceOf(DatabaseTransactionError);
      expect(error).toMatchObject({ message: 'transaction error', statusCode: 500 });
    });
  });
});
