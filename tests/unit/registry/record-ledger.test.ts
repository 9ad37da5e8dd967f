import { describe, it, expect, beforeEach } from 'vitest';
import type Database from 'better-sqlite3';
import { openDatabase } from '../../../src/db/connection.js';
import { RecordLedgerService } from '../../../src/packages/adapters/registry/RecordLedgerService.js';
import { RegistryEventEmitter } from '../../../src/packages/adapters/registry/RegistryEventEmitter.js';
import type { AppendLedgerEntry } from '../../../src/packages/core/ports/IRecordLedger.js';
import { ALICE, BOB, REGISTRY, FACTORY, expectRegistryError } from './helpers.js';

function entry(overrides: Partial<AppendLedgerEntry> = {}): AppendLedgerEntry {
  return {
    fullName: 'alice.test',
    owner: ALICE,
    registrationDate: 1_000,
    expirationDate: 2_000,
    registrationPrice: 5n,
    source: REGISTRY,
    ...overrides,
  };
}

describe('RecordLedgerService', () => {
  let db: Database.Database;
  let events: RegistryEventEmitter;
  let ledger: RecordLedgerService;

  beforeEach(() => {
    db = openDatabase(':memory:');
    events = new RegistryEventEmitter(db, () => 1_000);
    ledger = new RecordLedgerService(db, events);
  });

  it('assigns 0-based indexes in append order', () => {
    const first = ledger.append(entry());
    const second = ledger.append(entry({ fullName: 'bob.test', owner: BOB }));

    expect(first.index).toBe(0);
    expect(second.index).toBe(1);
    expect(ledger.count()).toBe(2);
    expect(ledger.allEntries().map((e) => e.fullName)).toEqual(['alice.test', 'bob.test']);
  });

  it('reads an entry back with bigint price intact', () => {
    ledger.append(entry({ registrationPrice: 9_000_000_000_000_000_000n }));
    expect(ledger.entryAt(0)).toEqual({
      index: 0,
      fullName: 'alice.test',
      owner: ALICE,
      registrationDate: 1_000,
      expirationDate: 2_000,
      registrationPrice: 9_000_000_000_000_000_000n,
      source: REGISTRY,
    });
  });

  it('filters by owner and by source in append order', () => {
    ledger.append(entry({ fullName: 'a.test' }));
    ledger.append(entry({ fullName: 'b.other', owner: BOB, source: FACTORY }));
    ledger.append(entry({ fullName: 'c.test' }));

    expect(ledger.entriesByOwner(ALICE).map((e) => e.index)).toEqual([0, 2]);
    expect(ledger.entriesByOwner(BOB).map((e) => e.fullName)).toEqual(['b.other']);
    expect(ledger.entriesBySource(REGISTRY).map((e) => e.fullName)).toEqual(['a.test', 'c.test']);
    expect(ledger.entriesBySource(FACTORY).map((e) => e.index)).toEqual([1]);
  });

  it('reports NOT_FOUND outside the log', () => {
    ledger.append(entry());
    expectRegistryError(() => ledger.entryAt(1), 'NOT_FOUND');
    expectRegistryError(() => ledger.entryAt(-1), 'NOT_FOUND');
    expectRegistryError(() => ledger.entryAt(0.5), 'NOT_FOUND');
  });

  it('emits RecordAdded for each append', () => {
    ledger.append(entry());
    const stored = events.getEventsForSource(REGISTRY, { types: ['RecordAdded'] });
    expect(stored).toHaveLength(1);
    expect(stored[0]?.payload).toEqual({
      index: 0,
      fullName: 'alice.test',
      owner: ALICE,
      registrationDate: 1_000,
      expirationDate: 2_000,
      registrationPrice: '5',
    });
  });

  it('leaves no entry when the surrounding transaction rolls back', () => {
    expect(() =>
      db.transaction(() => {
        ledger.append(entry());
        throw new Error('abort');
      })(),
    ).toThrow('abort');
    expect(ledger.count()).toBe(0);
    expect(events.getEventsForSource(REGISTRY)).toEqual([]);
  });

  it('rejects updates and deletes at the storage layer', () => {
    ledger.append(entry());
    expect(() => db.prepare(`UPDATE ledger_entries SET owner = ?`).run(BOB)).toThrow();
    expect(() => db.prepare(`DELETE FROM ledger_entries`).run()).toThrow();
    expect(ledger.entryAt(0).owner).toBe(ALICE);
  });
});
