/**
 * PriceTable — Length-tiered pricing for one registry
 *
 * An ordered list of (length → price) tiers. Lookup is a linear scan for an
 * exact length match; a length with no tier has no price (INVALID_LENGTH),
 * never a default.
 *
 * @module adapters/registry/PriceTable
 */

import type Database from 'better-sqlite3';
import type { Address } from 'viem';
import { z } from 'zod';
import type { PriceTier } from '../../core/ports/INameRegistry.js';
import { RegistryErrors } from '../../core/errors/RegistryError.js';
import { MAX_AMOUNT } from '../../core/protocol/amount.js';

export const priceTierSchema = z.object({
  length: z.number().int().positive(),
  price: z.bigint().nonnegative().max(MAX_AMOUNT),
});

interface TierRow {
  length: bigint;
  price: bigint;
}

export class PriceTable {
  private db: Database.Database;
  private registry: Address;

  constructor(db: Database.Database, registry: Address) {
    this.db = db;
    this.registry = registry;
  }

  tiers(): PriceTier[] {
    const rows = this.db.prepare(
      `SELECT length, price FROM price_tiers
       WHERE registry_address = ?
       ORDER BY position`
    ).safeIntegers(true).all(this.registry) as TierRow[];
    return rows.map((r) => ({ length: Number(r.length), price: r.price }));
  }

  /**
   * @throws RegistryError INVALID_LENGTH when no tier matches `length`
   */
  priceFor(length: number): bigint {
    const tier = this.tiers().find((t) => t.length === length);
    if (!tier) {
      throw RegistryErrors.invalidLength(length);
    }
    return tier.price;
  }

  /**
   * Replace the price of an existing tier (keeping its position) or append
   * a new tier at the end.
   *
   * @throws RegistryError INVALID_INPUT for a non-positive length or an out-of-range price
   */
  upsert(length: number, price: bigint): void {
    const parsed = priceTierSchema.safeParse({ length, price });
    if (!parsed.success) {
      throw RegistryErrors.invalidInput(
        `Invalid price tier: ${parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join('; ')}`,
        { length, price: price.toString() },
      );
    }

    this.db.prepare(
      `INSERT INTO price_tiers (registry_address, length, price, position)
       VALUES (?, ?, ?, (SELECT COUNT(*) FROM price_tiers WHERE registry_address = ?))
       ON CONFLICT(registry_address, length) DO UPDATE SET price = excluded.price`
    ).run(this.registry, length, price, this.registry);
  }
}
