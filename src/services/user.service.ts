import { PoolClient } from 'pg';
import { User, UserRow } from '@/models';
import { IUserRepository } from '@/repositories/interfaces';
import { IUserService } from './interfaces/IUserService';

/**
 * User Service
 * Maps between the User domain model and user_table rows
 */
export class UserService implements IUserService {
  constructor(private userRepo: IUserRepository) {}

  async insertUser(user: User, client?: PoolClient): Promise<number> {
    return await this.userRepo.insertUser(this.toRow(user), client);
  }

  async getAllUsers(client?: PoolClient): Promise<User[]> {
    const rows = await this.userRepo.getAllUsers(client);
    return rows.map((row) => this.toUser(row));
  }

  async deleteUserByUsername(userName: string, client?: PoolClient): Promise<number> {
    return await this.userRepo.deleteUserByUsername(userName, client);
  }

  private toRow(user: User): UserRow {
    return {
      userName: user.userName,
      firstName: user.firstName,
      lastName: user.lastName,
      address: user.address ?? null,
    };
  }

  /**
   * NULL address is dropped rather than serialized as null
   */
  private toUser(row: UserRow): User {
    const { address, ...names } = row;
    return address === null ? names : { ...names, address };
  }
}
