/**
 * ITokenLedger — Ownership Token Port
 *
 * Non-fungible ownership tokens, one collection per registry. The token
 * holder is the authoritative owner of a name.
 *
 * Ids are allocated per collection starting at 1. The ledger never hands
 * out 0; callers model "no token" as `null`, not as a numeric sentinel.
 *
 * @module core/ports/ITokenLedger
 */

import type { Address } from 'viem';

/** Positive integer token id */
export type TokenId = number;

export interface ITokenLedger {
  /**
   * Allocate the next id in `collection` and assign it to `owner`.
   * Participates in the caller's transaction when one is open.
   */
  mint(collection: Address, owner: Address): TokenId;

  /** Current holder, or null when the token does not exist */
  ownerOf(collection: Address, tokenId: TokenId): Address | null;

  /** Destroy the token. Burning a missing token is a no-op. */
  burn(collection: Address, tokenId: TokenId): void;
}
