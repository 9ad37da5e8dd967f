/**
 * Amount validation
 *
 * Amounts are bigint in the smallest unit and stored in SQLite INTEGER
 * columns, so they must fit a signed 64-bit integer.
 *
 * @module packages/core/protocol/amount
 */

import { RegistryErrors } from '../errors/RegistryError.js';

export const MAX_AMOUNT = 9_223_372_036_854_775_807n;

export function isValidAmount(value: bigint): boolean {
  return value >= 0n && value <= MAX_AMOUNT;
}

/**
 * @throws RegistryError INVALID_INPUT when negative or above MAX_AMOUNT
 */
export function assertAmount(value: bigint, field: string): void {
  if (!isValidAmount(value)) {
    throw RegistryErrors.invalidInput(`${field} must be between 0 and ${MAX_AMOUNT}`, {
      field,
      value: value.toString(),
    });
  }
}
