/**
 * RecordLedgerService — Append-only registration history
 *
 * Master log in `ledger_entries`, positioned by a 0-based `entry_index`.
 * The per-owner and per-source lookups read through the two secondary
 * indexes, which only carry (key, entry_index), so both come back in
 * append order.
 *
 * There is no update or delete path; the table triggers reject both.
 *
 * @module adapters/registry/RecordLedgerService
 */

import type Database from 'better-sqlite3';
import type { Address } from 'viem';
import type {
  AppendLedgerEntry,
  IRecordLedger,
  LedgerEntry,
} from '../../core/ports/IRecordLedger.js';
import { RegistryErrors } from '../../core/errors/RegistryError.js';
import { assertAmount } from '../../core/protocol/amount.js';
import { normalizeAddress } from '../chain/address-utils.js';
import type { RegistryEventEmitter } from './RegistryEventEmitter.js';

interface LedgerRow {
  entry_index: bigint;
  full_name: string;
  owner: string;
  registration_date: bigint;
  expiration_date: bigint;
  registration_price: bigint;
  source: string;
}

export class RecordLedgerService implements IRecordLedger {
  private db: Database.Database;
  private events: RegistryEventEmitter | null;

  constructor(db: Database.Database, events?: RegistryEventEmitter) {
    this.db = db;
    this.events = events ?? null;
  }

  append(entry: AppendLedgerEntry): LedgerEntry {
    assertAmount(entry.registrationPrice, 'registrationPrice');
    const owner = normalizeAddress(entry.owner);
    const source = normalizeAddress(entry.source);

    return this.db.transaction(() => {
      const index = this.count();

      this.db.prepare(
        `INSERT INTO ledger_entries
         (entry_index, full_name, owner, registration_date, expiration_date,
          registration_price, source)
         VALUES (?, ?, ?, ?, ?, ?, ?)`
      ).run(
        index,
        entry.fullName,
        owner,
        entry.registrationDate,
        entry.expirationDate,
        entry.registrationPrice,
        source,
      );

      this.events?.emit({
        type: 'RecordAdded',
        source,
        payload: {
          index,
          fullName: entry.fullName,
          owner,
          registrationDate: entry.registrationDate,
          expirationDate: entry.expirationDate,
          registrationPrice: entry.registrationPrice.toString(),
        },
      });

      return { ...entry, owner, source, index };
    })();
  }

  allEntries(): LedgerEntry[] {
    const rows = this.db.prepare(
      `SELECT * FROM ledger_entries ORDER BY entry_index`
    ).safeIntegers(true).all() as LedgerRow[];
    return rows.map(rowToEntry);
  }

  entryAt(index: number): LedgerEntry {
    if (!Number.isInteger(index) || index < 0) {
      throw RegistryErrors.notFound('Ledger entry', { index });
    }
    const row = this.db.prepare(
      `SELECT * FROM ledger_entries WHERE entry_index = ?`
    ).safeIntegers(true).get(index) as LedgerRow | undefined;
    if (!row) {
      throw RegistryErrors.notFound('Ledger entry', { index });
    }
    return rowToEntry(row);
  }

  entriesByOwner(owner: Address): LedgerEntry[] {
    const rows = this.db.prepare(
      `SELECT * FROM ledger_entries WHERE owner = ? ORDER BY entry_index`
    ).safeIntegers(true).all(normalizeAddress(owner)) as LedgerRow[];
    return rows.map(rowToEntry);
  }

  entriesBySource(source: Address): LedgerEntry[] {
    const rows = this.db.prepare(
      `SELECT * FROM ledger_entries WHERE source = ? ORDER BY entry_index`
    ).safeIntegers(true).all(normalizeAddress(source)) as LedgerRow[];
    return rows.map(rowToEntry);
  }

  count(): number {
    const row = this.db.prepare(
      `SELECT COUNT(*) AS n FROM ledger_entries`
    ).get() as { n: number };
    return row.n;
  }
}

function rowToEntry(row: LedgerRow): LedgerEntry {
  return {
    index: Number(row.entry_index),
    fullName: row.full_name,
    owner: normalizeAddress(row.owner),
    registrationDate: Number(row.registration_date),
    expirationDate: Number(row.expiration_date),
    registrationPrice: row.registration_price,
    source: normalizeAddress(row.source),
  };
}
