/**
 * Shared fixtures for registry tests
 *
 * Addresses are digit-only so their EIP-55 form equals the literal.
 */

import { expect } from 'vitest';
import type Database from 'better-sqlite3';
import type { Address } from 'viem';
import { openDatabase } from '../../../src/db/connection.js';
import {
  SqliteResolverAddressBook,
  SqliteTokenLedger,
  SqliteValueLedger,
} from '../../../src/packages/adapters/chain/index.js';
import { NameRegistryService } from '../../../src/packages/adapters/registry/NameRegistryService.js';
import { RecordLedgerService } from '../../../src/packages/adapters/registry/RecordLedgerService.js';
import { RegistryEventEmitter } from '../../../src/packages/adapters/registry/RegistryEventEmitter.js';
import type { PriceTier } from '../../../src/packages/core/ports/INameRegistry.js';
import {
  RegistryError,
  isRegistryError,
  type RegistryErrorCode,
} from '../../../src/packages/core/errors/RegistryError.js';

export const ALICE: Address = '0x1111111111111111111111111111111111111111';
export const BOB: Address = '0x2222222222222222222222222222222222222222';
export const FEE_RECEIVER: Address = '0x3333333333333333333333333333333333333333';
export const ADMIN: Address = '0x4444444444444444444444444444444444444444';
export const REGISTRY: Address = '0x5555555555555555555555555555555555555555';
export const FACTORY: Address = '0x6666666666666666666666666666666666666666';

export const START = 1_700_000_000;
export const PERIOD = 31_536_000;

export const TIERS: PriceTier[] = [
  { length: 3, price: 10n },
  { length: 4, price: 5n },
  { length: 5, price: 3n },
];

export interface TestClock {
  now: () => number;
  set: (t: number) => void;
  advance: (seconds: number) => void;
}

export function createClock(start: number = START): TestClock {
  let current = start;
  return {
    now: () => current,
    set: (t) => { current = t; },
    advance: (seconds) => { current += seconds; },
  };
}

export interface Collaborators {
  db: Database.Database;
  clock: TestClock;
  events: RegistryEventEmitter;
  value: SqliteValueLedger;
  tokens: SqliteTokenLedger;
  resolverBook: SqliteResolverAddressBook;
  recordLedger: RecordLedgerService;
}

export function createCollaborators(): Collaborators {
  const db = openDatabase(':memory:');
  const clock = createClock();
  const events = new RegistryEventEmitter(db, clock.now);
  return {
    db,
    clock,
    events,
    value: new SqliteValueLedger(db),
    tokens: new SqliteTokenLedger(db, clock.now),
    resolverBook: new SqliteResolverAddressBook(db),
    recordLedger: new RecordLedgerService(db, events),
  };
}

export interface RegistryHarness extends Collaborators {
  registry: NameRegistryService;
}

export function createRegistryHarness(tiers: PriceTier[] = TIERS): RegistryHarness {
  const c = createCollaborators();
  const registry = NameRegistryService.create(
    {
      db: c.db,
      tokens: c.tokens,
      value: c.value,
      resolverBook: c.resolverBook,
      recordLedger: c.recordLedger,
      events: c.events,
      clock: c.clock.now,
    },
    {
      address: REGISTRY,
      namespace: 'test',
      name: 'Test Names',
      symbol: 'TST',
      admin: ADMIN,
      feeReceiver: FEE_RECEIVER,
      registrationPeriod: PERIOD,
      priceTiers: tiers,
    },
  );
  return { ...c, registry };
}

/**
 * Run `fn`, assert it throws a RegistryError with `code`, return the error.
 */
export function expectRegistryError(fn: () => unknown, code: RegistryErrorCode): RegistryError {
  let caught: unknown;
  try {
    fn();
  } catch (err) {
    caught = err;
  }
  expect(caught).toBeInstanceOf(RegistryError);
  if (!isRegistryError(caught)) {
    throw new Error('expected a RegistryError');
  }
  expect(caught.code).toBe(code);
  return caught;
}
