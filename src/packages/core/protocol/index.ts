/**
 * Core Protocol
 *
 * Pure naming primitives shared by every adapter.
 *
 * @module packages/core/protocol
 */

export {
  canonicalizeName,
  nameLength,
  hashName,
  hashSubName,
  fullName,
  type NameHash,
} from './name-hash.js';

export type {
  RegistryEvent,
  RegistryEventType,
  StoredRegistryEvent,
  DomainRegisteredEvent,
  DomainRenewedEvent,
  ResolverSetEvent,
  RecordAddedEvent,
  NamespaceDeployedEvent,
  SubDomainCreatedEvent,
  PrimaryDomainSetEvent,
  DomainBurnedEvent,
  PriceUpdatedEvent,
  AdminTransferredEvent,
} from './registry-events.js';

export { MAX_AMOUNT, isValidAmount, assertAmount } from './amount.js';
export { ReentrancyGuard, sharedGuard } from './reentrancy-guard.js';
