/**
 * Migration 003 — Chain Collaborators
 *
 * Storage for the in-process stand-ins of the external collaborators:
 * value balances, ownership tokens and the resolver address-book. They
 * live in the same database as the registry so a registry transaction
 * that rolls back also rolls back its transfers, mints and links.
 *
 * @module db/migrations/003_chain_collaborators
 */

import type Database from 'better-sqlite3';
import { logger } from '../../utils/logger.js';

export const CHAIN_COLLABORATORS_SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS value_balances (
    address TEXT PRIMARY KEY,
    balance INTEGER NOT NULL DEFAULT 0 CHECK (balance >= 0)
  );

  -- Per-collection monotonic id allocator; ids start at 1
  CREATE TABLE IF NOT EXISTS token_counters (
    collection TEXT PRIMARY KEY,
    last_id INTEGER NOT NULL CHECK (last_id >= 0)
  );

  CREATE TABLE IF NOT EXISTS tokens (
    collection TEXT NOT NULL,
    token_id INTEGER NOT NULL CHECK (token_id > 0),
    owner TEXT NOT NULL,
    minted_at INTEGER NOT NULL,
    PRIMARY KEY (collection, token_id)
  );

  CREATE INDEX IF NOT EXISTS idx_tokens_owner
    ON tokens (owner, collection);

  CREATE TABLE IF NOT EXISTS name_links (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    owner TEXT NOT NULL,
    name_hash TEXT NOT NULL,
    UNIQUE (owner, name_hash)
  );

  CREATE TABLE IF NOT EXISTS primary_names (
    owner TEXT PRIMARY KEY,
    name_hash TEXT NOT NULL
  );
`;

export function up(db: Database.Database): void {
  logger.info({ msg: 'Running migration 003_chain_collaborators' });
  db.exec(CHAIN_COLLABORATORS_SCHEMA_SQL);
  logger.info({ msg: 'Migration 003_chain_collaborators completed' });
}
