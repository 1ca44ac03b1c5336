import dotenv from 'dotenv';
import path from 'path';

dotenv.config();

// Use repo root as base so relative paths work no matter cwd.
const repoRoot = path.resolve(__dirname, '..', '..');
const resolvePath = (filepath: string | undefined, fallback: string) => {
  const target = filepath ?? fallback;
  if (target === ':memory:') return target;
  return path.isAbsolute(target) ? target : path.resolve(repoRoot, target);
};

const requireEnv = (key: string) => {
  const value = process.env[key];
  if (!value) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
};

const parseBooleanFlag = (input: string | undefined, fallback = false) => {
  if (input === undefined) return fallback;
  return ['true', '1', 'yes', 'on'].includes(input.trim().toLowerCase());
};

export const config = {
  port: Number(process.env.PORT) || 8000,
  databasePath: resolvePath(process.env.DATABASE_PATH, 'data/app.db'),
  viewsDir: path.resolve(repoRoot, 'views'),
  sessionDurationHours: Number(process.env.SESSION_DURATION_HOURS) || 24 * 7,
  sessionSecret: requireEnv('SESSION_SECRET'),
  cookieSecure: parseBooleanFlag(process.env.COOKIE_SECURE),
  passwordSaltRounds: Number(process.env.BCRYPT_ROUNDS) || 10,
  adminInitialPassword: process.env.ADMIN_INITIAL_PASSWORD || 'admin123',
  formBodyLimit: process.env.FORM_BODY_LIMIT || '100kb',
};
