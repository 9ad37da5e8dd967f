/**
 * Migration 004 — Registry Events (Append-Only Event Log)
 *
 * Every state transition writes its events into this table within the
 * same transaction as the primary write. If the transaction rolls back,
 * the events roll back with it.
 *
 * Append-only: UPDATE and DELETE are blocked by trigger.
 *
 * @module db/migrations/004_registry_events
 */

import type Database from 'better-sqlite3';
import { logger } from '../../utils/logger.js';

export const REGISTRY_EVENTS_SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS registry_events (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    type TEXT NOT NULL,
    source TEXT NOT NULL,
    payload TEXT NOT NULL DEFAULT '{}',
    created_at INTEGER NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_registry_events_source
    ON registry_events (source, id);

  CREATE INDEX IF NOT EXISTS idx_registry_events_type
    ON registry_events (type, id);

  CREATE TRIGGER IF NOT EXISTS trg_registry_events_no_update
    BEFORE UPDATE ON registry_events
    BEGIN
      SELECT RAISE(ABORT, 'registry_events is append-only: UPDATE not allowed');
    END;

  CREATE TRIGGER IF NOT EXISTS trg_registry_events_no_delete
    BEFORE DELETE ON registry_events
    BEGIN
      SELECT RAISE(ABORT, 'registry_events is append-only: DELETE not allowed');
    END;
`;

export function up(db: Database.Database): void {
  logger.info({ msg: 'Running migration 004_registry_events' });
  db.exec(REGISTRY_EVENTS_SCHEMA_SQL);
  logger.info({ msg: 'Migration 004_registry_events completed' });
}
