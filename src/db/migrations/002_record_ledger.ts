/**
 * Migration 002 — Record Ledger (Append-Only)
 *
 * Historical log of completed top-level registrations. `entry_index` is
 * the 0-based position in the master log. The owner and source indexes
 * are the two secondary indices; both are ordered by entry_index so reads
 * come back in append order.
 *
 * Append-only: UPDATE and DELETE are blocked by trigger.
 *
 * @module db/migrations/002_record_ledger
 */

import type Database from 'better-sqlite3';
import { logger } from '../../utils/logger.js';

export const RECORD_LEDGER_SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS ledger_entries (
    entry_index INTEGER PRIMARY KEY CHECK (entry_index >= 0),
    full_name TEXT NOT NULL,
    owner TEXT NOT NULL,
    registration_date INTEGER NOT NULL,
    expiration_date INTEGER NOT NULL,
    registration_price INTEGER NOT NULL CHECK (registration_price >= 0),
    source TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_ledger_entries_owner
    ON ledger_entries (owner, entry_index);

  CREATE INDEX IF NOT EXISTS idx_ledger_entries_source
    ON ledger_entries (source, entry_index);

  CREATE TRIGGER IF NOT EXISTS trg_ledger_entries_no_update
    BEFORE UPDATE ON ledger_entries
    BEGIN
      SELECT RAISE(ABORT, 'ledger_entries is append-only: UPDATE not allowed');
    END;

  CREATE TRIGGER IF NOT EXISTS trg_ledger_entries_no_delete
    BEFORE DELETE ON ledger_entries
    BEGIN
      SELECT RAISE(ABORT, 'ledger_entries is append-only: DELETE not allowed');
    END;
`;

export function up(db: Database.Database): void {
  logger.info({ msg: 'Running migration 002_record_ledger' });
  db.exec(RECORD_LEDGER_SCHEMA_SQL);
  logger.info({ msg: 'Migration 002_record_ledger completed' });
}
