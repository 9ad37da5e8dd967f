/**
 * IValueTransfer — Value Transfer Port
 *
 * Synchronous value movement between address-like accounts. A transfer
 * either succeeds or reports failure; it never throws. Callers turn a
 * `false` into a TRANSFER_FAILED error, which rolls back their transaction.
 *
 * @module core/ports/IValueTransfer
 */

import type { Address } from 'viem';

export interface IValueTransfer {
  /**
   * Move `amount` from `from` to `to`.
   * Returns false when `from` lacks funds or the recipient rejects the value.
   */
  transfer(from: Address, to: Address, amount: bigint): boolean;

  balanceOf(address: Address): bigint;
}
