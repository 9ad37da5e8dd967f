/**
 * Registry Adapters
 *
 * Exports:
 * - NameRegistryService: per-namespace registry state machine
 * - RecordLedgerService: append-only registration history
 * - NamespaceFactoryService: one registry per namespace label
 * - PriceTable: length-tiered pricing
 * - RegistryEventEmitter: transactional event log
 *
 * @module packages/adapters/registry
 */

export {
  NameRegistryService,
  type NameRegistryDeps,
  type CreateRegistryOptions,
} from './NameRegistryService.js';
export { RecordLedgerService } from './RecordLedgerService.js';
export {
  NamespaceFactoryService,
  type NamespaceFactoryDeps,
  type NamespaceFactoryOptions,
} from './NamespaceFactoryService.js';
export { PriceTable, priceTierSchema } from './PriceTable.js';
export { RegistryEventEmitter } from './RegistryEventEmitter.js';
