/**
 * Migration runner
 *
 * Applies migrations in order inside one transaction and records each id
 * in `schema_migrations`, so re-running against an existing database is a
 * no-op.
 *
 * @module db/migrations
 */

import type Database from 'better-sqlite3';
import { up as up001 } from './001_name_registry.js';
import { up as up002 } from './002_record_ledger.js';
import { up as up003 } from './003_chain_collaborators.js';
import { up as up004 } from './004_registry_events.js';

interface Migration {
  id: string;
  up: (db: Database.Database) => void;
}

export const MIGRATIONS: readonly Migration[] = [
  { id: '001_name_registry', up: up001 },
  { id: '002_record_ledger', up: up002 },
  { id: '003_chain_collaborators', up: up003 },
  { id: '004_registry_events', up: up004 },
];

/**
 * Apply all pending migrations.
 * @returns ids of the migrations applied by this call
 */
export function runMigrations(db: Database.Database): string[] {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      id TEXT PRIMARY KEY,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    )
  `);

  const applied = new Set(
    (db.prepare('SELECT id FROM schema_migrations').all() as Array<{ id: string }>).map((r) => r.id),
  );

  return db.transaction(() => {
    const ran: string[] = [];
    for (const migration of MIGRATIONS) {
      if (applied.has(migration.id)) continue;
      migration.up(db);
      db.prepare('INSERT INTO schema_migrations (id) VALUES (?)').run(migration.id);
      ran.push(migration.id);
    }
    return ran;
  })();
}
