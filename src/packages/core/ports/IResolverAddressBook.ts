/**
 * IResolverAddressBook — Owner ↔ Name Address Book Port
 *
 * Shared across every registry a factory deploys. Maps an owner identity
 * to the names linked to it and to its single "primary" display name.
 *
 * @module core/ports/IResolverAddressBook
 */

import type { Address } from 'viem';
import type { NameHash } from '../protocol/name-hash.js';

export interface IResolverAddressBook {
  /** Record that `owner` holds `nameHash` */
  linkNameToOwner(nameHash: NameHash, owner: Address): void;

  /** Drop every link to `nameHash` and any primary name set to it */
  unlinkName(nameHash: NameHash): void;

  /** Mark `nameHash` as the primary display name of `owner` */
  setPrimaryName(owner: Address, nameHash: NameHash): void;

  getPrimaryName(owner: Address): NameHash | null;

  /** Linked names in link order */
  getLinkedNames(owner: Address): NameHash[];
}
