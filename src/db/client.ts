import fs from 'fs';
import path from 'path';
import Database from 'better-sqlite3';
import { config } from '../config/env';
import { applySchema } from './schema';

if (config.databasePath !== ':memory:') {
  fs.mkdirSync(path.dirname(config.databasePath), { recursive: true });
}

const db = new Database(config.databasePath);
db.pragma('journal_mode = WAL');
db.pragma('foreign_keys = ON');

// Repositories prepare their statements at import time, so the tables must exist first.
applySchema(db);

export default db;
