/**
 * Registry System Composition Root
 *
 * Wires one database, the chain collaborator adapters, the shared record
 * ledger and address-book, and a namespace factory from configuration.
 *
 * @module registry-system
 */

import type Database from 'better-sqlite3';
import type { Config } from './config.js';
import { openDatabase } from './db/connection.js';
import { logger } from './utils/logger.js';
import {
  SqliteResolverAddressBook,
  SqliteTokenLedger,
  SqliteValueLedger,
  deriveChildAddress,
  normalizeAddress,
} from './packages/adapters/chain/index.js';
import { NamespaceFactoryService } from './packages/adapters/registry/NamespaceFactoryService.js';
import { RecordLedgerService } from './packages/adapters/registry/RecordLedgerService.js';
import { RegistryEventEmitter } from './packages/adapters/registry/RegistryEventEmitter.js';

export interface RegistrySystem {
  db: Database.Database;
  value: SqliteValueLedger;
  tokens: SqliteTokenLedger;
  resolverBook: SqliteResolverAddressBook;
  recordLedger: RecordLedgerService;
  events: RegistryEventEmitter;
  factory: NamespaceFactoryService;
}

export interface CreateRegistrySystemOptions {
  /** Use an already-open database instead of `config.dbPath` */
  db?: Database.Database;
  /** Unix seconds */
  clock?: () => number;
}

export function createRegistrySystem(
  config: Config,
  options: CreateRegistrySystemOptions = {},
): RegistrySystem {
  logger.level = config.logLevel;

  const db = options.db ?? openDatabase(config.dbPath);
  const clock = options.clock;

  const events = new RegistryEventEmitter(db, clock);
  const value = new SqliteValueLedger(db);
  const tokens = new SqliteTokenLedger(db, clock);
  const resolverBook = new SqliteResolverAddressBook(db);
  const recordLedger = new RecordLedgerService(db, events);

  const admin = normalizeAddress(config.factoryAdmin);
  const factoryAddress = config.factoryAddress
    ? normalizeAddress(config.factoryAddress)
    : deriveChildAddress(admin, 'namespace-factory');

  const factory = new NamespaceFactoryService(
    { db, tokens, value, events, clock },
    {
      address: factoryAddress,
      admin,
      resolverBook,
      recordLedger,
      feeReceiver: normalizeAddress(config.feeReceiver),
      fee: config.namespaceFee,
      registrationPeriod: config.registrationPeriodSeconds,
      defaultPriceTiers: config.defaultPriceTiers,
    },
  );

  logger.info(
    { factory: factory.address, env: config.nodeEnv },
    'Registry system ready',
  );

  return { db, value, tokens, resolverBook, recordLedger, events, factory };
}
