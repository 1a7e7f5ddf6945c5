import User, { IUser } from '@/models/User';
import { UserRecord } from '@/types/user.types';
import { ValidationError } from '@/errors/auth.errors';

export interface UserRepository {
  findByUsername(username: string): Promise<UserRecord | null>;
  createUser(user: UserRecord): Promise<UserRecord>;
}

const toUserRecord = (user: IUser): UserRecord => ({
  username: user.username,
  passwordHash: user.passwordHash,
  roles: [...user.roles],
});

const isDuplicateKeyError = (error: unknown): boolean =>
  typeof error === 'object' && error !== null && Reflect.get(error, 'code') === 11000;

export const createMongoUserRepository = (): UserRepository => ({
  findByUsername: async (username) => {
    const user = await User.findOne({ username }).lean<IUser>();
    return user ? toUserRecord(user) : null;
  },

  createUser: async (user) => {
    try {
      const created = await User.create(user);
      return toUserRecord(created);
    } catch (error) {
      if (isDuplicateKeyError(error)) {
        throw new ValidationError(`User ${user.username} already exists`);
      }
      throw error;
    }
  },
});
