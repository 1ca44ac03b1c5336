import db from '../db/client';
import { applySchema } from '../db/schema';
import { ensureAdminAccount } from './authService';

/** Creates any missing tables and seeds the admin account. Safe to run repeatedly. */
export const initializeDatabase = async (): Promise<{ adminCreated: boolean }> => {
  applySchema(db);
  const adminCreated = await ensureAdminAccount();
  if (adminCreated) {
    console.log('[setup] created default admin account');
  }
  return { adminCreated };
};
