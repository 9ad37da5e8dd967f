/**
 * SqliteResolverAddressBook — In-process owner ↔ name address book
 *
 * @module adapters/chain/SqliteResolverAddressBook
 */

import type Database from 'better-sqlite3';
import type { Address } from 'viem';
import type { IResolverAddressBook } from '../../core/ports/IResolverAddressBook.js';
import type { NameHash } from '../../core/protocol/name-hash.js';
import { normalizeAddress } from './address-utils.js';

export class SqliteResolverAddressBook implements IResolverAddressBook {
  private db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
  }

  linkNameToOwner(nameHash: NameHash, owner: Address): void {
    this.db.prepare(
      `INSERT OR IGNORE INTO name_links (owner, name_hash) VALUES (?, ?)`
    ).run(normalizeAddress(owner), nameHash);
  }

  unlinkName(nameHash: NameHash): void {
    this.db.prepare(`DELETE FROM name_links WHERE name_hash = ?`).run(nameHash);
    this.db.prepare(`DELETE FROM primary_names WHERE name_hash = ?`).run(nameHash);
  }

  setPrimaryName(owner: Address, nameHash: NameHash): void {
    this.db.prepare(
      `INSERT INTO primary_names (owner, name_hash) VALUES (?, ?)
       ON CONFLICT(owner) DO UPDATE SET name_hash = excluded.name_hash`
    ).run(normalizeAddress(owner), nameHash);
  }

  getPrimaryName(owner: Address): NameHash | null {
    const row = this.db.prepare(
      `SELECT name_hash FROM primary_names WHERE owner = ?`
    ).get(normalizeAddress(owner)) as { name_hash: NameHash } | undefined;
    return row?.name_hash ?? null;
  }

  getLinkedNames(owner: Address): NameHash[] {
    const rows = this.db.prepare(
      `SELECT name_hash FROM name_links WHERE owner = ? ORDER BY id`
    ).all(normalizeAddress(owner)) as Array<{ name_hash: NameHash }>;
    return rows.map((r) => r.name_hash);
  }
}
