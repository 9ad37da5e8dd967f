/**
 * SqliteTokenLedger — In-process ownership tokens
 *
 * One collection per registry address. Ids come from `token_counters`,
 * bumped inside the caller's transaction, so an operation that rolls back
 * also gives its id back and the sequence stays gap-free.
 *
 * @module adapters/chain/SqliteTokenLedger
 */

import type Database from 'better-sqlite3';
import type { Address } from 'viem';
import type { ITokenLedger, TokenId } from '../../core/ports/ITokenLedger.js';
import { RegistryErrors } from '../../core/errors/RegistryError.js';
import { normalizeAddress } from './address-utils.js';

export class SqliteTokenLedger implements ITokenLedger {
  private db: Database.Database;
  private clock: () => number;

  constructor(db: Database.Database, clock: () => number = () => Math.floor(Date.now() / 1000)) {
    this.db = db;
    this.clock = clock;
  }

  mint(collection: Address, owner: Address): TokenId {
    const holder = normalizeAddress(owner);
    return this.db.transaction(() => {
      const row = this.db.prepare(
        `INSERT INTO token_counters (collection, last_id) VALUES (?, 1)
         ON CONFLICT(collection) DO UPDATE SET last_id = last_id + 1
         RETURNING last_id`
      ).get(collection) as { last_id: number };

      this.db.prepare(
        `INSERT INTO tokens (collection, token_id, owner, minted_at) VALUES (?, ?, ?, ?)`
      ).run(collection, row.last_id, holder, this.clock());

      return row.last_id;
    })();
  }

  ownerOf(collection: Address, tokenId: TokenId): Address | null {
    const row = this.db.prepare(
      `SELECT owner FROM tokens WHERE collection = ? AND token_id = ?`
    ).get(collection, tokenId) as { owner: string } | undefined;
    return row ? normalizeAddress(row.owner) : null;
  }

  burn(collection: Address, tokenId: TokenId): void {
    this.db.prepare(
      `DELETE FROM tokens WHERE collection = ? AND token_id = ?`
    ).run(collection, tokenId);
  }

  /**
   * Move a token between holders. Ownership of the bound name moves with it.
   *
   * @throws RegistryError NOT_FOUND when the token does not exist
   * @throws RegistryError NOT_OWNER when `from` is not the current holder
   */
  transferToken(collection: Address, tokenId: TokenId, from: Address, to: Address): void {
    const current = this.ownerOf(collection, tokenId);
    if (current === null) {
      throw RegistryErrors.notFound('Token', { collection, tokenId });
    }
    const sender = normalizeAddress(from);
    if (current !== sender) {
      throw RegistryErrors.notOwner(`token #${tokenId}`, sender);
    }
    this.db.prepare(
      `UPDATE tokens SET owner = ? WHERE collection = ? AND token_id = ?`
    ).run(normalizeAddress(to), collection, tokenId);
  }

  /** Token ids held by `owner` in `collection`, ascending */
  tokensOf(collection: Address, owner: Address): TokenId[] {
    const rows = this.db.prepare(
      `SELECT token_id FROM tokens WHERE collection = ? AND owner = ? ORDER BY token_id`
    ).all(collection, normalizeAddress(owner)) as Array<{ token_id: number }>;
    return rows.map((r) => r.token_id);
  }
}
