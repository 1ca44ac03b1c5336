import db from '../db/client';
import { UserRecord, UserRole } from '../db/types';

interface UserRow {
  id: number;
  username: string;
  password_hash: string;
  role: string;
  created_at: string;
}

const toRole = (value: string): UserRole => (value === 'admin' ? 'admin' : 'staff');

const toUser = (row: UserRow): UserRecord => ({
  id: row.id,
  username: row.username,
  passwordHash: row.password_hash,
  role: toRole(row.role),
  createdAt: row.created_at,
});

const insertUserStmt = db.prepare<[string, string, UserRole, string]>(
  'INSERT INTO users (username, password_hash, role, created_at) VALUES (?, ?, ?, ?)'
);
const selectUserByIdStmt = db.prepare<[number], UserRow>('SELECT * FROM users WHERE id = ?');
const selectUserByUsernameStmt = db.prepare<[string], UserRow>('SELECT * FROM users WHERE username = ?');

export const createUser = (username: string, passwordHash: string, role: UserRole): UserRecord => {
  const result = insertUserStmt.run(username, passwordHash, role, new Date().toISOString());
  const row = selectUserByIdStmt.get(Number(result.lastInsertRowid));
  if (!row) {
    throw new Error('Failed to create user');
  }
  return toUser(row);
};

export const getUserByUsername = (username: string): UserRecord | undefined => {
  const row = selectUserByUsernameStmt.get(username);
  return row ? toUser(row) : undefined;
};

export const getUserById = (id: number): UserRecord | undefined => {
  const row = selectUserByIdStmt.get(id);
  return row ? toUser(row) : undefined;
};
