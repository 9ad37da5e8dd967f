/**
 * Hierarchical naming registry
 *
 * @module index
 */

export { loadConfig, type Config } from './config.js';
export { openDatabase } from './db/connection.js';
export { runMigrations } from './db/migrations/index.js';
export { logger, createChildLogger } from './utils/logger.js';
export {
  createRegistrySystem,
  type RegistrySystem,
  type CreateRegistrySystemOptions,
} from './registry-system.js';

export * from './packages/core/ports/index.js';
export * from './packages/core/protocol/index.js';
export {
  RegistryError,
  RegistryErrors,
  isRegistryError,
  type RegistryErrorCode,
} from './packages/core/errors/RegistryError.js';
export * from './packages/adapters/chain/index.js';
export * from './packages/adapters/registry/index.js';
