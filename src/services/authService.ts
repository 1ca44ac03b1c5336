import Database from 'better-sqlite3';
import { config } from '../config/env';
import { createUser, getUserById, getUserByUsername } from '../repositories/userRepository';
import { hashPassword, verifyPassword } from '../utils/password';
import { UserRecord, UserRole } from '../db/types';

export const ADMIN_USERNAME = 'admin';

export type AuthUser = Pick<UserRecord, 'id' | 'username' | 'role' | 'createdAt'>;

export class InvalidCredentialsError extends Error {
  constructor() {
    super('Invalid username or password.');
    this.name = 'InvalidCredentialsError';
  }
}

export class DuplicateUsernameError extends Error {
  constructor() {
    super('Username already exists.');
    this.name = 'DuplicateUsernameError';
  }
}

const toAuthUser = (user: UserRecord): AuthUser => ({
  id: user.id,
  username: user.username,
  role: user.role,
  createdAt: user.createdAt,
});

const isUniqueViolation = (error: unknown) =>
  error instanceof Database.SqliteError && error.code === 'SQLITE_CONSTRAINT_UNIQUE';

export const register = async (username: string, password: string, role: UserRole): Promise<AuthUser> => {
  if (getUserByUsername(username)) {
    throw new DuplicateUsernameError();
  }
  const passwordHash = await hashPassword(password);
  try {
    return toAuthUser(createUser(username, passwordHash, role));
  } catch (error) {
    if (isUniqueViolation(error)) {
      throw new DuplicateUsernameError();
    }
    throw error;
  }
};

export const login = async (username: string, password: string): Promise<AuthUser> => {
  const user = getUserByUsername(username);
  if (!user) {
    throw new InvalidCredentialsError();
  }
  const isValid = await verifyPassword(password, user.passwordHash);
  if (!isValid) {
    throw new InvalidCredentialsError();
  }
  return toAuthUser(user);
};

export const findAuthUser = (id: number): AuthUser | undefined => {
  const user = getUserById(id);
  return user ? toAuthUser(user) : undefined;
};

/** Creates the seed admin account when it is missing. Resolves to true if it was created. */
export const ensureAdminAccount = async (): Promise<boolean> => {
  if (getUserByUsername(ADMIN_USERNAME)) {
    return false;
  }
  await register(ADMIN_USERNAME, config.adminInitialPassword, 'admin');
  return true;
};
