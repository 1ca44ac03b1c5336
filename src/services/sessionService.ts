import { config } from '../config/env';
import {
  createSession,
  deleteSessionByToken,
  getSessionByToken,
  purgeExpiredSessions,
  setSessionCsrfToken,
  setSessionFlashes,
} from '../repositories/sessionRepository';
import { FlashMessage, SessionRecord } from '../db/types';
import { generateSessionToken } from '../utils/token';
import { AuthUser, findAuthUser } from './authService';

export const sessionDurationMs = config.sessionDurationHours * 60 * 60 * 1000;

const isSessionExpired = (session: SessionRecord) => new Date(session.expiresAt).getTime() <= Date.now();

export const startSession = (userId: number | null): SessionRecord => {
  const expiresAt = new Date(Date.now() + sessionDurationMs);
  return createSession(generateSessionToken(), userId, expiresAt);
};

export const resumeSession = (token: string): { session: SessionRecord; user?: AuthUser } | undefined => {
  purgeExpiredSessions();
  const session = getSessionByToken(token);
  if (!session || isSessionExpired(session)) {
    return undefined;
  }
  if (session.userId === null) {
    return { session };
  }
  const user = findAuthUser(session.userId);
  if (!user) {
    deleteSessionByToken(token);
    return undefined;
  }
  return { session, user };
};

export const endSession = (token: string) => {
  deleteSessionByToken(token);
};

export const saveCsrfToken = (session: SessionRecord, csrfToken: string): SessionRecord => {
  setSessionCsrfToken(session.token, csrfToken);
  return { ...session, csrfToken };
};

export const saveFlashes = (session: SessionRecord, flashes: FlashMessage[]): SessionRecord => {
  setSessionFlashes(session.token, flashes);
  return { ...session, flashes };
};
