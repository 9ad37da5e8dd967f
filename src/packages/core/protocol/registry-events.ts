/**
 * Registry Events
 *
 * Observable side effects for external indexers. Each event carries the
 * identifiers, timestamps and amounts exactly as produced by the triggering
 * operation. Amounts are serialized as decimal strings so payloads survive
 * JSON round-trips without precision loss.
 *
 * @module packages/core/protocol/registry-events
 */

import type { Address } from 'viem';
import type { NameHash } from './name-hash.js';

interface EventBase<T extends string, P> {
  type: T;
  /** Address of the emitting registry or factory */
  source: Address;
  payload: P;
}

export type DomainRegisteredEvent = EventBase<'DomainRegistered', {
  name: string;
  nameHash: NameHash;
  tokenId: number;
  owner: Address;
  price: string;
  expires: number;
}>;

export type DomainRenewedEvent = EventBase<'DomainRenewed', {
  name: string;
  nameHash: NameHash;
  tokenId: number;
  price: string;
  expires: number;
}>;

export type ResolverSetEvent = EventBase<'ResolverSet', {
  nameHash: NameHash;
  resolver: Address;
}>;

export type RecordAddedEvent = EventBase<'RecordAdded', {
  index: number;
  fullName: string;
  owner: Address;
  registrationDate: number;
  expirationDate: number;
  registrationPrice: string;
}>;

export type NamespaceDeployedEvent = EventBase<'NamespaceDeployed', {
  label: string;
  registry: Address;
  admin: Address;
  fee: string;
}>;

export type SubDomainCreatedEvent = EventBase<'SubDomainCreated', {
  name: string;
  parentHash: NameHash;
  nameHash: NameHash;
  tokenId: number;
  owner: Address;
  expires: number;
}>;

export type PrimaryDomainSetEvent = EventBase<'PrimaryDomainSet', {
  owner: Address;
  nameHash: NameHash;
}>;

export type DomainBurnedEvent = EventBase<'DomainBurned', {
  nameHash: NameHash;
  tokenId: number;
}>;

export type PriceUpdatedEvent = EventBase<'PriceUpdated', {
  length: number;
  price: string;
}>;

export type AdminTransferredEvent = EventBase<'AdminTransferred', {
  previousAdmin: Address;
  newAdmin: Address;
}>;

export type RegistryEvent =
  | DomainRegisteredEvent
  | DomainRenewedEvent
  | ResolverSetEvent
  | RecordAddedEvent
  | NamespaceDeployedEvent
  | SubDomainCreatedEvent
  | PrimaryDomainSetEvent
  | DomainBurnedEvent
  | PriceUpdatedEvent
  | AdminTransferredEvent;

export type RegistryEventType = RegistryEvent['type'];

/** Event as read back from the event log */
export interface StoredRegistryEvent {
  id: number;
  type: RegistryEventType;
  source: Address;
  payload: Record<string, unknown>;
  createdAt: number;
}
