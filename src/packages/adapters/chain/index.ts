/**
 * Chain Collaborator Adapters
 *
 * SQLite-backed stand-ins for the value rail, the ownership-token ledger
 * and the resolver address-book. They share the registry database so
 * registry transactions cover their writes.
 *
 * @module packages/adapters/chain
 */

export { SqliteValueLedger, type ReceiveHook } from './SqliteValueLedger.js';
export { SqliteTokenLedger } from './SqliteTokenLedger.js';
export { SqliteResolverAddressBook } from './SqliteResolverAddressBook.js';
export { isValidAddress, normalizeAddress, deriveChildAddress } from './address-utils.js';
