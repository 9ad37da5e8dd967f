/**
 * IRecordLedger — Historical Registration Ledger Port
 *
 * Append-only log of completed top-level registrations, indexed by owner
 * and by originating registry. Entries are never updated or deleted: a
 * later renewal, burn or resolver change leaves the historical entry as is.
 *
 * @module core/ports/IRecordLedger
 */

import type { Address } from 'viem';

// =============================================================================
// Entry Types
// =============================================================================

export interface LedgerEntry {
  /** 0-based position in the master log */
  index: number;
  /** `<name>.<namespace>` */
  fullName: string;
  owner: Address;
  /** Unix seconds */
  registrationDate: number;
  /** Unix seconds */
  expirationDate: number;
  registrationPrice: bigint;
  /** Registry that produced the entry */
  source: Address;
}

export type AppendLedgerEntry = Omit<LedgerEntry, 'index'>;

// =============================================================================
// Port Interface
// =============================================================================

export interface IRecordLedger {
  /**
   * Append an entry. Runs inside the caller's transaction when one is open,
   * so a rolled-back registration leaves no entry behind.
   */
  append(entry: AppendLedgerEntry): LedgerEntry;

  allEntries(): LedgerEntry[];

  /** @throws RegistryError NOT_FOUND when `index` is outside the log */
  entryAt(index: number): LedgerEntry;

  entriesByOwner(owner: Address): LedgerEntry[];

  entriesBySource(source: Address): LedgerEntry[];

  count(): number;
}
