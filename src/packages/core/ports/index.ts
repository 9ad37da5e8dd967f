/**
 * Core Ports
 *
 * Exports all port interfaces (contracts) for the naming registry.
 * Ports define the boundaries between the core domain and its adapters.
 */

export * from './ITokenLedger.js';
export * from './IResolverAddressBook.js';
export * from './IValueTransfer.js';
export * from './IRecordLedger.js';
export * from './INameRegistry.js';
export * from './INamespaceFactory.js';
