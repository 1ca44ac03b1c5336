import { z } from 'zod';
import db from '../db/client';
import { FlashMessage, SessionRecord } from '../db/types';

interface SessionRow {
  id: number;
  token: string;
  user_id: number | null;
  csrf_token: string | null;
  flashes: string;
  expires_at: string;
  created_at: string;
}

const flashListSchema = z
  .array(
    z.object({
      category: z.enum(['success', 'info', 'danger']),
      message: z.string(),
    })
  )
  .catch([]);

const parseFlashes = (raw: string): FlashMessage[] => {
  try {
    return flashListSchema.parse(JSON.parse(raw));
  } catch {
    return [];
  }
};

const toSession = (row: SessionRow): SessionRecord => ({
  id: row.id,
  token: row.token,
  userId: row.user_id,
  csrfToken: row.csrf_token,
  flashes: parseFlashes(row.flashes),
  expiresAt: row.expires_at,
  createdAt: row.created_at,
});

const insertSessionStmt = db.prepare<[string, number | null, string, string]>(
  'INSERT INTO sessions (token, user_id, expires_at, created_at) VALUES (?, ?, ?, ?)'
);
const selectSessionByTokenStmt = db.prepare<[string], SessionRow>('SELECT * FROM sessions WHERE token = ?');
const updateCsrfTokenStmt = db.prepare<[string, string]>('UPDATE sessions SET csrf_token = ? WHERE token = ?');
const updateFlashesStmt = db.prepare<[string, string]>('UPDATE sessions SET flashes = ? WHERE token = ?');
const deleteSessionStmt = db.prepare<[string]>('DELETE FROM sessions WHERE token = ?');
const deleteExpiredSessionsStmt = db.prepare<[string]>('DELETE FROM sessions WHERE expires_at <= ?');

export const createSession = (
  token: string,
  userId: number | null,
  expiresAt: Date
): SessionRecord => {
  insertSessionStmt.run(token, userId, expiresAt.toISOString(), new Date().toISOString());
  const row = selectSessionByTokenStmt.get(token);
  if (!row) {
    throw new Error('Failed to create session');
  }
  return toSession(row);
};

export const getSessionByToken = (token: string): SessionRecord | undefined => {
  const row = selectSessionByTokenStmt.get(token);
  return row ? toSession(row) : undefined;
};

export const setSessionCsrfToken = (token: string, csrfToken: string) => {
  updateCsrfTokenStmt.run(csrfToken, token);
};

export const setSessionFlashes = (token: string, flashes: FlashMessage[]) => {
  updateFlashesStmt.run(JSON.stringify(flashes), token);
};

export const deleteSessionByToken = (token: string) => {
  deleteSessionStmt.run(token);
};

export const purgeExpiredSessions = () => {
  deleteExpiredSessionsStmt.run(new Date().toISOString());
};
