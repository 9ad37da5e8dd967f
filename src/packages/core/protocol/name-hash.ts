/**
 * Name Canonicalization & Hashing
 *
 * Names are case-insensitive: the canonical form is the ASCII lower-case
 * of the input. Hashes are keccak-256 over the ABI encoding of the parts,
 * which length-prefixes every string, so no choice of name or namespace
 * can make two distinct pairs encode to the same bytes.
 *
 * Top-level:  keccak256(abi.encode(string name, string namespace))
 * Sub-name:   keccak256(abi.encode(string subName, bytes32 parentHash))
 *
 * The two encodings have different head layouts (dynamic vs static second
 * word), so a sub-name hash never equals a top-level hash of any flat string.
 *
 * @module packages/core/protocol/name-hash
 */

import { encodeAbiParameters, keccak256, stringToBytes, type Hex } from 'viem';

/** Fixed-width name identifier (bytes32) */
export type NameHash = Hex;

const TOP_LEVEL_PARAMS = [{ type: 'string' }, { type: 'string' }] as const;
const SUB_NAME_PARAMS = [{ type: 'string' }, { type: 'bytes32' }] as const;

/**
 * ASCII lower-case. Non-ASCII characters pass through untouched.
 */
export function canonicalizeName(name: string): string {
  return name.replace(/[A-Z]/g, (c) => String.fromCharCode(c.charCodeAt(0) + 32));
}

/**
 * Length used for price lookup: UTF-8 byte length of the canonical name.
 */
export function nameLength(name: string): number {
  return stringToBytes(canonicalizeName(name)).length;
}

export function hashName(name: string, namespace: string): NameHash {
  return keccak256(encodeAbiParameters(TOP_LEVEL_PARAMS, [canonicalizeName(name), namespace]));
}

export function hashSubName(parentHash: NameHash, subName: string): NameHash {
  return keccak256(encodeAbiParameters(SUB_NAME_PARAMS, [canonicalizeName(subName), parentHash]));
}

/**
 * Display form of a registered name: `<name>.<namespace>`
 */
export function fullName(name: string, namespace: string): string {
  return `${canonicalizeName(name)}.${namespace}`;
}
