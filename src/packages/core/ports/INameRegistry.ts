/**
 * INameRegistry — Per-Namespace Registry Port
 *
 * One registry per namespace label. Holds the domain records, the
 * name-hash ↔ token bindings and the price table, and executes the
 * pay-and-register / renew / sub-name / resolver transitions.
 *
 * Two notions of "owner" are distinct:
 * - the token holder (authorization: renew, setResolver, sub-names)
 * - the `resolver` attribute (routing/display, freely repointed)
 *
 * Every mutating method is synchronous and atomic, and throws
 * REENTRANCY_BLOCKED when invoked while another mutating call on the same
 * registry is still in flight.
 *
 * @module core/ports/INameRegistry
 */

import type { Address } from 'viem';
import type { NameHash } from '../protocol/name-hash.js';
import type { TokenId } from './ITokenLedger.js';

// =============================================================================
// Records
// =============================================================================

export interface DomainRecord {
  nameHash: NameHash;
  /** Canonical name (`sub.parent` for sub-names) */
  name: string;
  resolver: Address;
  /** Unix seconds */
  expires: number;
  tokenId: TokenId;
}

export interface PriceTier {
  length: number;
  price: bigint;
}

// =============================================================================
// Operation Params & Results
// =============================================================================

export interface RegisterDomainParams {
  name: string;
  /** Value attached to the call */
  payment: bigint;
  caller: Address;
}

export interface RegisterDomainResult {
  nameHash: NameHash;
  tokenId: TokenId;
  expires: number;
  price: bigint;
  refund: bigint;
}

export type RenewDomainParams = RegisterDomainParams;

export interface RenewDomainResult {
  nameHash: NameHash;
  tokenId: TokenId;
  expires: number;
  price: bigint;
  refund: bigint;
}

export interface SetResolverParams {
  name: string;
  resolver: Address;
  caller: Address;
}

export interface SetPrimaryDomainParams {
  name: string;
  caller: Address;
}

export interface CreateSubDomainParams {
  parentName: string;
  subName: string;
  /** Receives the sub-name token; need not be the caller */
  owner: Address;
  caller: Address;
}

export interface CreateSubDomainResult {
  nameHash: NameHash;
  tokenId: TokenId;
  expires: number;
}

export interface BurnDomainParams {
  name: string;
  caller: Address;
}

export interface SetPriceConfigParams {
  length: number;
  price: bigint;
  caller: Address;
}

export interface TransferAdminParams {
  newAdmin: Address;
  caller: Address;
}

// =============================================================================
// Port Interface
// =============================================================================

export interface INameRegistry {
  readonly address: Address;
  readonly namespace: string;

  registerDomain(params: RegisterDomainParams): RegisterDomainResult;
  renewDomain(params: RenewDomainParams): RenewDomainResult;
  setResolver(params: SetResolverParams): void;
  setPrimaryDomain(params: SetPrimaryDomainParams): void;
  createSubDomain(params: CreateSubDomainParams): CreateSubDomainResult;

  /** @throws RegistryError INVALID_LENGTH */
  getDomainPrice(name: string): bigint;
  generateHash(name: string): NameHash;
  /** @throws RegistryError NOT_FOUND */
  getExpiration(name: string): number;
  /** @throws RegistryError NOT_FOUND */
  getResolver(name: string): Address;
  checkOwnership(name: string, caller: Address): boolean;

  getDomain(name: string): DomainRecord | null;
  /** Resolver of a live (unexpired) name */
  resolveName(name: string): Address | null;
  isAvailable(name: string): boolean;
  getTokenId(name: string): TokenId | null;
  getNameHashByToken(tokenId: TokenId): NameHash | null;
  ownerOf(name: string): Address | null;
  getPriceTiers(): PriceTier[];
  getAdmin(): Address;

  burnDomain(params: BurnDomainParams): void;
  setPriceConfig(params: SetPriceConfigParams): void;
  transferAdmin(params: TransferAdminParams): void;
}
