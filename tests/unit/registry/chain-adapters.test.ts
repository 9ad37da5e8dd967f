import { describe, it, expect, beforeEach } from 'vitest';
import type Database from 'better-sqlite3';
import type { Address } from 'viem';
import { openDatabase } from '../../../src/db/connection.js';
import {
  SqliteResolverAddressBook,
  SqliteTokenLedger,
  SqliteValueLedger,
  deriveChildAddress,
  normalizeAddress,
} from '../../../src/packages/adapters/chain/index.js';
import { hashName } from '../../../src/packages/core/protocol/name-hash.js';
import { ALICE, BOB, REGISTRY, FACTORY, expectRegistryError } from './helpers.js';

let db: Database.Database;

beforeEach(() => {
  db = openDatabase(':memory:');
});

describe('address-utils', () => {
  it('normalizes to EIP-55 form', () => {
    expect(normalizeAddress('0x52908400098527886e0f7030069857d2e4169ee7'))
      .toBe('0x52908400098527886E0F7030069857D2E4169EE7');
  });

  it('rejects malformed addresses', () => {
    expectRegistryError(() => normalizeAddress('0x1234'), 'INVALID_INPUT');
  });

  it('derives distinct child addresses per salt', () => {
    const a = deriveChildAddress(FACTORY, 'eth');
    const b = deriveChildAddress(FACTORY, 'sol');
    expect(a).toMatch(/^0x[0-9a-fA-F]{40}$/);
    expect(a).not.toBe(b);
    expect(deriveChildAddress(FACTORY, 'eth')).toBe(a);
  });
});

describe('SqliteValueLedger', () => {
  let value: SqliteValueLedger;

  beforeEach(() => {
    value = new SqliteValueLedger(db);
    value.credit(ALICE, 100n);
  });

  it('moves value between accounts', () => {
    expect(value.transfer(ALICE, BOB, 30n)).toBe(true);
    expect(value.balanceOf(ALICE)).toBe(70n);
    expect(value.balanceOf(BOB)).toBe(30n);
  });

  it('reports zero for an unknown account', () => {
    expect(value.balanceOf(REGISTRY)).toBe(0n);
  });

  it('fails without side effects on insufficient balance', () => {
    expect(value.transfer(ALICE, BOB, 101n)).toBe(false);
    expect(value.balanceOf(ALICE)).toBe(100n);
    expect(value.balanceOf(BOB)).toBe(0n);
  });

  it('hands sender and amount to the recipient hook', () => {
    const seen: Array<[Address, bigint]> = [];
    value.onReceive(BOB, (from, amount) => {
      seen.push([from, amount]);
      return true;
    });
    expect(value.transfer(ALICE, BOB, 5n)).toBe(true);
    expect(seen).toEqual([[ALICE, 5n]]);
  });

  it('rolls the transfer back when the hook rejects', () => {
    value.onReceive(BOB, () => false);
    expect(value.transfer(ALICE, BOB, 5n)).toBe(false);
    expect(value.balanceOf(ALICE)).toBe(100n);
    expect(value.balanceOf(BOB)).toBe(0n);
  });

  it('rolls the transfer back when the hook throws', () => {
    value.onReceive(BOB, () => {
      throw new Error('no thanks');
    });
    expect(value.transfer(ALICE, BOB, 5n)).toBe(false);
    expect(value.balanceOf(ALICE)).toBe(100n);
  });

  it('stops calling a removed hook', () => {
    value.onReceive(BOB, () => false);
    value.removeReceiveHook(BOB);
    expect(value.transfer(ALICE, BOB, 5n)).toBe(true);
  });

  it('rejects negative amounts', () => {
    expect(value.transfer(ALICE, BOB, -1n)).toBe(false);
    expectRegistryError(() => value.credit(BOB, -1n), 'INVALID_INPUT');
  });
});

describe('SqliteTokenLedger', () => {
  let tokens: SqliteTokenLedger;

  beforeEach(() => {
    tokens = new SqliteTokenLedger(db, () => 1_000);
  });

  it('numbers tokens from 1 per collection', () => {
    expect(tokens.mint(REGISTRY, ALICE)).toBe(1);
    expect(tokens.mint(REGISTRY, BOB)).toBe(2);
    expect(tokens.mint(FACTORY, BOB)).toBe(1);
    expect(tokens.ownerOf(REGISTRY, 2)).toBe(BOB);
  });

  it('returns null for an unminted or burned token', () => {
    const id = tokens.mint(REGISTRY, ALICE);
    expect(tokens.ownerOf(REGISTRY, id + 1)).toBeNull();
    tokens.burn(REGISTRY, id);
    expect(tokens.ownerOf(REGISTRY, id)).toBeNull();
  });

  it('does not reuse ids after a burn', () => {
    const id = tokens.mint(REGISTRY, ALICE);
    tokens.burn(REGISTRY, id);
    expect(tokens.mint(REGISTRY, ALICE)).toBe(id + 1);
  });

  it('transfers tokens between holders', () => {
    const id = tokens.mint(REGISTRY, ALICE);
    tokens.transferToken(REGISTRY, id, ALICE, BOB);
    expect(tokens.ownerOf(REGISTRY, id)).toBe(BOB);
    expect(tokens.tokensOf(REGISTRY, ALICE)).toEqual([]);
    expect(tokens.tokensOf(REGISTRY, BOB)).toEqual([id]);
  });

  it('refuses a transfer from a non-holder', () => {
    const id = tokens.mint(REGISTRY, ALICE);
    expectRegistryError(() => tokens.transferToken(REGISTRY, id, BOB, BOB), 'NOT_OWNER');
    expectRegistryError(() => tokens.transferToken(REGISTRY, 99, ALICE, BOB), 'NOT_FOUND');
  });
});

describe('SqliteResolverAddressBook', () => {
  it('links names in order without duplicates', () => {
    const book = new SqliteResolverAddressBook(db);
    const first = hashName('one', 'test');
    const second = hashName('two', 'test');
    book.linkNameToOwner(first, ALICE);
    book.linkNameToOwner(second, ALICE);
    book.linkNameToOwner(first, ALICE);
    expect(book.getLinkedNames(ALICE)).toEqual([first, second]);
    expect(book.getLinkedNames(BOB)).toEqual([]);
  });

  it('unlinks a name from every owner and primary slot', () => {
    const book = new SqliteResolverAddressBook(db);
    const first = hashName('one', 'test');
    const second = hashName('two', 'test');
    book.linkNameToOwner(first, ALICE);
    book.linkNameToOwner(second, ALICE);
    book.setPrimaryName(ALICE, first);
    book.setPrimaryName(BOB, second);

    book.unlinkName(first);
    expect(book.getLinkedNames(ALICE)).toEqual([second]);
    expect(book.getPrimaryName(ALICE)).toBeNull();
    expect(book.getPrimaryName(BOB)).toBe(second);
  });

  it('replaces the primary name', () => {
    const book = new SqliteResolverAddressBook(db);
    expect(book.getPrimaryName(ALICE)).toBeNull();
    book.setPrimaryName(ALICE, hashName('one', 'test'));
    book.setPrimaryName(ALICE, hashName('two', 'test'));
    expect(book.getPrimaryName(ALICE)).toBe(hashName('two', 'test'));
  });
});
