/**
 * Database Connection Module
 *
 * Opens the registry database and brings its schema up to date.
 *
 * @module db/connection
 */

import Database from 'better-sqlite3';
import { mkdirSync, existsSync } from 'fs';
import { dirname } from 'path';
import { logger } from '../utils/logger.js';
import { runMigrations } from './migrations/index.js';

/**
 * Open (or create) a database at `dbPath` and apply pending migrations.
 * `:memory:` gives a private in-process database.
 */
export function openDatabase(dbPath: string = ':memory:'): Database.Database {
  if (dbPath !== ':memory:') {
    const dir = dirname(dbPath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
      logger.info({ dir }, 'Created database directory');
    }
  }

  const db = new Database(dbPath);

  // Enable WAL mode and busy timeout for write concurrency
  db.pragma('journal_mode = WAL');
  db.pragma('busy_timeout = 5000');
  db.pragma('foreign_keys = ON');

  const applied = runMigrations(db);
  logger.info({ dbPath, applied }, 'Database initialized');

  return db;
}
