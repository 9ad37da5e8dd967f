/**
 * INamespaceFactory — Namespace Factory Port
 *
 * Spawns one registry per namespace label, all wired to a shared
 * configuration (resolver address-book, record ledger, fee receiver) and
 * charging an exact flat creation fee.
 *
 * @module core/ports/INamespaceFactory
 */

import type { Address } from 'viem';
import type { IRecordLedger } from './IRecordLedger.js';
import type { IResolverAddressBook } from './IResolverAddressBook.js';
import type { INameRegistry } from './INameRegistry.js';

export interface FactoryConfig {
  resolverBook: IResolverAddressBook;
  recordLedger: IRecordLedger;
  feeReceiver: Address;
  /** Exact namespace creation fee */
  fee: bigint;
}

export interface DeployNamespaceParams {
  /** Token collection name */
  name: string;
  /** Token collection symbol */
  symbol: string;
  /** Namespace label, e.g. `eth` */
  label: string;
  payment: bigint;
  caller: Address;
}

export interface NamespaceInfo {
  label: string;
  registry: Address;
  name: string;
  symbol: string;
  /** Unix seconds */
  createdAt: number;
}

export interface SetFactoryConfigParams extends FactoryConfig {
  caller: Address;
}

export interface INamespaceFactory {
  readonly address: Address;

  deployNamespace(params: DeployNamespaceParams): INameRegistry;

  /** Sweep the factory balance to the fee receiver. Returns the amount swept. */
  withdraw(params: { caller: Address }): bigint;

  /** Replace the shared configuration wholesale */
  setConfig(params: SetFactoryConfigParams): void;

  getConfig(): FactoryConfig;

  getNamespaceHandle(label: string): INameRegistry | null;

  listNamespaces(): NamespaceInfo[];
}
