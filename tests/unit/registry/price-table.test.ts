import { describe, it, expect, beforeEach } from 'vitest';
import type Database from 'better-sqlite3';
import { openDatabase } from '../../../src/db/connection.js';
import { PriceTable } from '../../../src/packages/adapters/registry/PriceTable.js';
import { MAX_AMOUNT } from '../../../src/packages/core/protocol/amount.js';
import { ADMIN, FEE_RECEIVER, REGISTRY, FACTORY, expectRegistryError } from './helpers.js';

describe('PriceTable', () => {
  let db: Database.Database;
  let prices: PriceTable;

  beforeEach(() => {
    db = openDatabase(':memory:');
    db.prepare(
      `INSERT INTO registries
       (address, namespace, collection_name, collection_symbol, admin,
        fee_receiver, registration_period, created_at)
       VALUES (?, 'test', 'Test Names', 'TST', ?, ?, 31536000, 0)`
    ).run(REGISTRY, ADMIN, FEE_RECEIVER);
    prices = new PriceTable(db, REGISTRY);
    prices.upsert(3, 10n);
    prices.upsert(4, 5n);
    prices.upsert(5, 3n);
  });

  it('prices by exact length', () => {
    expect(prices.priceFor(3)).toBe(10n);
    expect(prices.priceFor(5)).toBe(3n);
  });

  it('has no default for an unconfigured length', () => {
    const err = expectRegistryError(() => prices.priceFor(6), 'INVALID_LENGTH');
    expect(err.message).toBe('No price tier configured for length 6');
  });

  it('replaces a tier in place and appends new lengths', () => {
    prices.upsert(4, 7n);
    prices.upsert(1, 100n);
    expect(prices.tiers()).toEqual([
      { length: 3, price: 10n },
      { length: 4, price: 7n },
      { length: 5, price: 3n },
      { length: 1, price: 100n },
    ]);
  });

  it('keeps tiers per registry', () => {
    expect(new PriceTable(db, FACTORY).tiers()).toEqual([]);
  });

  it('rejects invalid tiers', () => {
    expectRegistryError(() => prices.upsert(0, 1n), 'INVALID_INPUT');
    expectRegistryError(() => prices.upsert(2.5, 1n), 'INVALID_INPUT');
    expectRegistryError(() => prices.upsert(2, -1n), 'INVALID_INPUT');
    expectRegistryError(() => prices.upsert(2, MAX_AMOUNT + 1n), 'INVALID_INPUT');
    expect(prices.tiers()).toHaveLength(3);
  });

  it('accepts a zero price', () => {
    prices.upsert(6, 0n);
    expect(prices.priceFor(6)).toBe(0n);
  });
});
