/**
 * Address Utilities — EIP-55 Checksum Normalization
 *
 * Storage normalization for address-like identifiers (20-byte hex).
 * Every address is stored and compared in EIP-55 form, so the same
 * identity written in two letter cases is the same key.
 *
 * @module adapters/chain/address-utils
 */

import {
  encodeAbiParameters,
  getAddress,
  isAddress,
  keccak256,
  type Address,
} from 'viem';
import { RegistryErrors } from '../../core/errors/RegistryError.js';

/**
 * Validate that a string is a well-formed address.
 * Accepts: 0x prefix + 40 hex characters (case-insensitive).
 */
export function isValidAddress(address: string): address is Address {
  return isAddress(address, { strict: false });
}

/**
 * Normalize an address to EIP-55 checksummed format.
 *
 * @throws RegistryError INVALID_INPUT if address is not a valid hex address
 */
export function normalizeAddress(address: string): Address {
  if (!isValidAddress(address)) {
    throw RegistryErrors.invalidInput(`Invalid address: ${address}`, { address });
  }
  return getAddress(address);
}

/**
 * Deterministic child address: last 20 bytes of
 * keccak256(abi.encode(address parent, string salt)).
 * Used for registries spawned by a factory (one per label).
 */
export function deriveChildAddress(parent: Address, salt: string): Address {
  const digest = keccak256(
    encodeAbiParameters([{ type: 'address' }, { type: 'string' }], [parent, salt]),
  );
  return getAddress(`0x${digest.slice(-40)}`);
}
