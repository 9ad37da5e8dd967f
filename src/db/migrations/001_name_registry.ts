/**
 * Migration 001 — Name Registry
 *
 * Per-registry state. Every registry a factory deploys shares these tables,
 * partitioned by `registry_address`.
 *
 * - registries: identity, admin, fee receiver and registration period
 * - namespaces: factory label → registry (one registry per label, never reused)
 * - domains: name-hash → record; the token binding lives on the same row and
 *   UNIQUE(registry_address, token_id) gives the reverse lookup
 * - price_tiers: length → price, `position` keeps insertion order
 *
 * Amount columns are INTEGER and read with safeIntegers(true).
 *
 * @module db/migrations/001_name_registry
 */

import type Database from 'better-sqlite3';
import { logger } from '../../utils/logger.js';

export const NAME_REGISTRY_SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS registries (
    address TEXT PRIMARY KEY,
    namespace TEXT NOT NULL,
    collection_name TEXT NOT NULL,
    collection_symbol TEXT NOT NULL,
    admin TEXT NOT NULL,
    fee_receiver TEXT NOT NULL,
    registration_period INTEGER NOT NULL CHECK (registration_period > 0),
    created_at INTEGER NOT NULL
  );

  CREATE TABLE IF NOT EXISTS namespaces (
    factory_address TEXT NOT NULL,
    label TEXT NOT NULL,
    registry_address TEXT NOT NULL UNIQUE REFERENCES registries(address),
    created_at INTEGER NOT NULL,
    PRIMARY KEY (factory_address, label)
  );

  CREATE TABLE IF NOT EXISTS domains (
    registry_address TEXT NOT NULL REFERENCES registries(address),
    name_hash TEXT NOT NULL,
    name TEXT NOT NULL,
    resolver TEXT NOT NULL,
    expires INTEGER NOT NULL,
    token_id INTEGER NOT NULL CHECK (token_id > 0),
    PRIMARY KEY (registry_address, name_hash),
    UNIQUE (registry_address, token_id)
  );

  CREATE TABLE IF NOT EXISTS price_tiers (
    registry_address TEXT NOT NULL REFERENCES registries(address),
    length INTEGER NOT NULL CHECK (length > 0),
    price INTEGER NOT NULL CHECK (price >= 0),
    position INTEGER NOT NULL,
    PRIMARY KEY (registry_address, length)
  );

  CREATE INDEX IF NOT EXISTS idx_price_tiers_position
    ON price_tiers (registry_address, position);
`;

export function up(db: Database.Database): void {
  logger.info({ msg: 'Running migration 001_name_registry' });
  db.exec(NAME_REGISTRY_SCHEMA_SQL);
  logger.info({ msg: 'Migration 001_name_registry completed' });
}
