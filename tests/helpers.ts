import request from 'supertest';
import app from '../src/app';
import db from '../src/db/client';

export const resetDatabase = () => {
  db.exec('DELETE FROM sessions; DELETE FROM students; DELETE FROM users;');
};

export const countRows = (table: 'students' | 'users' | 'sessions') => {
  const row = db.prepare<[], { total: number }>(`SELECT COUNT(*) AS total FROM ${table}`).get();
  return row?.total ?? 0;
};

export const expireSession = (token: string) => {
  db.prepare<[string, string]>('UPDATE sessions SET expires_at = ? WHERE token = ?').run('2000-01-01T00:00:00.000Z', token);
};

export type Agent = ReturnType<typeof request.agent>;

export const newAgent = (): Agent => request.agent(app);

export const csrfFrom = (html: string): string => {
  const match = /name="csrf_token" value="([0-9a-f]{32})"/.exec(html);
  if (!match) {
    throw new Error('No CSRF token found in page');
  }
  return match[1];
};

export const signIn = async (agent: Agent, username = 'admin', password = 'admin123') => {
  const page = await agent.get('/login');
  return agent.post('/login').type('form').send({ csrf_token: csrfFrom(page.text), username, password });
};

/** Fetches a page carrying a form and returns the session's CSRF token. */
export const csrfFor = async (agent: Agent, path = '/students/new') => {
  const page = await agent.get(path);
  return csrfFrom(page.text);
};
