/**
 * Property-based tests for hashing and value conservation
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { hashName } from '../../../src/packages/core/protocol/name-hash.js';
import { isRegistryError } from '../../../src/packages/core/errors/RegistryError.js';
import { ALICE, FEE_RECEIVER, REGISTRY, createRegistryHarness } from './helpers.js';

describe('Registry properties', () => {
  it('hashes ASCII names independently of letter case', () => {
    fc.assert(
      fc.property(fc.stringMatching(/^[a-zA-Z0-9-]{1,16}$/), (name) => {
        const canonical = hashName(name.toLowerCase(), 'test');
        expect(hashName(name, 'test')).toBe(canonical);
        expect(hashName(name.toUpperCase(), 'test')).toBe(canonical);
      }),
    );
  });

  it('conserves value across any sequence of registration attempts', () => {
    const attempt = fc.record({
      name: fc.stringMatching(/^[a-c]{3,6}$/),
      payment: fc.bigInt({ min: 0n, max: 20n }),
    });

    fc.assert(
      fc.property(fc.array(attempt, { maxLength: 8 }), (attempts) => {
        const h = createRegistryHarness();
        h.value.credit(ALICE, 100n);
        let registered = 0;

        for (const { name, payment } of attempts) {
          try {
            h.registry.registerDomain({ name, payment, caller: ALICE });
            registered++;
          } catch (err) {
            if (!isRegistryError(err)) throw err;
          }
        }

        const fees = h.recordLedger
          .allEntries()
          .reduce((sum, e) => sum + e.registrationPrice, 0n);

        expect(h.recordLedger.count()).toBe(registered);
        expect(h.value.balanceOf(REGISTRY)).toBe(0n);
        expect(h.value.balanceOf(FEE_RECEIVER)).toBe(fees);
        expect(h.value.balanceOf(ALICE) + fees).toBe(100n);
        h.db.close();
      }),
      { numRuns: 50 },
    );
  });
});
