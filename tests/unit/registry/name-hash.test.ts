import { describe, it, expect } from 'vitest';
import {
  canonicalizeName,
  fullName,
  hashName,
  hashSubName,
  nameLength,
} from '../../../src/packages/core/protocol/name-hash.js';

describe('canonicalizeName', () => {
  it('lower-cases ASCII letters only', () => {
    expect(canonicalizeName('AbC-9')).toBe('abc-9');
    expect(canonicalizeName('ÄB')).toBe('Äb');
  });
});

describe('nameLength', () => {
  it('counts UTF-8 bytes of the canonical name', () => {
    expect(nameLength('ABC')).toBe(3);
    expect(nameLength('ÄB')).toBe(3);
    expect(nameLength('')).toBe(0);
  });
});

describe('hashName', () => {
  it('returns a 32-byte hex digest', () => {
    expect(hashName('alice', 'test')).toMatch(/^0x[0-9a-f]{64}$/);
  });

  it('is case-insensitive in the name', () => {
    expect(hashName('ALICE', 'test')).toBe(hashName('alice', 'test'));
  });

  it('separates namespaces', () => {
    expect(hashName('alice', 'test')).not.toBe(hashName('alice', 'other'));
  });

  it('does not collide when a dot moves between name and namespace', () => {
    expect(hashName('a.b', 'c')).not.toBe(hashName('a', 'b.c'));
  });
});

describe('hashSubName', () => {
  it('differs from the parent hash and from a flat hash of the sub-name', () => {
    const parent = hashName('alice', 'test');
    const sub = hashSubName(parent, 'pay');
    expect(sub).not.toBe(parent);
    expect(sub).not.toBe(hashName('pay', 'test'));
    expect(sub).not.toBe(hashName('pay.alice', 'test'));
  });

  it('is case-insensitive in the sub-name', () => {
    const parent = hashName('alice', 'test');
    expect(hashSubName(parent, 'PAY')).toBe(hashSubName(parent, 'pay'));
  });
});

describe('fullName', () => {
  it('joins the canonical name and namespace', () => {
    expect(fullName('Alice', 'test')).toBe('alice.test');
  });
});
