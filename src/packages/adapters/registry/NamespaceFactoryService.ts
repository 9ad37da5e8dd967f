/**
 * NamespaceFactoryService — Spawns one registry per namespace label
 *
 * All registries share the factory's current configuration at deployment
 * time: resolver address-book, record ledger, fee receiver, registration
 * period and default price tiers.
 *
 * Deployment algorithm:
 *   guard → tx: label uniqueness → exact fee → collect payment →
 *       forward payment to fee receiver → create registry (admin = caller) →
 *       record label → event
 *
 * Labels are never reused: there is no path that removes a namespace row.
 *
 * @module adapters/registry/NamespaceFactoryService
 */

import type Database from 'better-sqlite3';
import type { Logger } from 'pino';
import type { Address } from 'viem';
import { createChildLogger } from '../../../utils/logger.js';
import { RegistryErrors } from '../../core/errors/RegistryError.js';
import { assertAmount } from '../../core/protocol/amount.js';
import { canonicalizeName } from '../../core/protocol/name-hash.js';
import { sharedGuard, type ReentrancyGuard } from '../../core/protocol/reentrancy-guard.js';
import type { ITokenLedger } from '../../core/ports/ITokenLedger.js';
import type { IValueTransfer } from '../../core/ports/IValueTransfer.js';
import type { PriceTier } from '../../core/ports/INameRegistry.js';
import type {
  DeployNamespaceParams,
  FactoryConfig,
  INamespaceFactory,
  NamespaceInfo,
  SetFactoryConfigParams,
} from '../../core/ports/INamespaceFactory.js';
import { deriveChildAddress, isValidAddress, normalizeAddress } from '../chain/address-utils.js';
import { NameRegistryService, type NameRegistryDeps } from './NameRegistryService.js';
import type { RegistryEventEmitter } from './RegistryEventEmitter.js';

// =============================================================================
// Types
// =============================================================================

export interface NamespaceFactoryDeps {
  db: Database.Database;
  tokens: ITokenLedger;
  value: IValueTransfer;
  events?: RegistryEventEmitter;
  /** Unix seconds */
  clock?: () => number;
  logger?: Logger;
}

export interface NamespaceFactoryOptions extends FactoryConfig {
  address: Address;
  admin: Address;
  /** Registration period handed to every deployed registry (seconds) */
  registrationPeriod: number;
  /** Price tiers every deployed registry starts with */
  defaultPriceTiers?: PriceTier[];
}

interface NamespaceRow {
  label: string;
  registry_address: string;
  collection_name: string;
  collection_symbol: string;
  created_at: number;
}

// =============================================================================
// NamespaceFactoryService
// =============================================================================

export class NamespaceFactoryService implements INamespaceFactory {
  readonly address: Address;

  private deps: NamespaceFactoryDeps;
  private config: FactoryConfig;
  private admin: Address;
  private registrationPeriod: number;
  private defaultPriceTiers: PriceTier[];
  private handles = new Map<string, NameRegistryService>();
  private guard: ReentrancyGuard;
  private clock: () => number;
  private log: Logger;

  constructor(deps: NamespaceFactoryDeps, options: NamespaceFactoryOptions) {
    this.deps = deps;
    this.address = normalizeAddress(options.address);
    this.admin = normalizeAddress(options.admin);
    this.config = validateConfig(options);
    this.guard = sharedGuard(deps.db, `factory:${this.address}`);
    this.registrationPeriod = options.registrationPeriod;
    this.defaultPriceTiers = [...(options.defaultPriceTiers ?? [])];
    this.clock = deps.clock ?? (() => Math.floor(Date.now() / 1000));
    this.log = deps.logger ?? createChildLogger({
      module: 'NamespaceFactoryService',
      factory: this.address,
    });
  }

  // ---------------------------------------------------------------------------
  // Deployment
  // ---------------------------------------------------------------------------

  deployNamespace(params: DeployNamespaceParams): NameRegistryService {
    const caller = normalizeAddress(params.caller);
    const label = canonicalizeName(params.label);
    if (label.length === 0 || label.includes('.')) {
      throw RegistryErrors.invalidInput(`Invalid namespace label '${params.label}'`);
    }
    assertAmount(params.payment, 'payment');

    const config = this.config;
    const registry = this.mutate('deployNamespace', () => {
      if (this.findNamespace(label)) {
        throw RegistryErrors.labelTaken(label);
      }
      if (params.payment !== config.fee) {
        throw RegistryErrors.wrongFee(config.fee, params.payment);
      }

      this.moveValue(caller, this.address, params.payment, 'payment');
      this.moveValue(this.address, config.feeReceiver, params.payment, 'fee');

      const created = NameRegistryService.create(this.registryDeps(config), {
        address: deriveChildAddress(this.address, label),
        namespace: label,
        name: params.name,
        symbol: params.symbol,
        admin: caller,
        feeReceiver: config.feeReceiver,
        registrationPeriod: this.registrationPeriod,
        priceTiers: this.defaultPriceTiers,
      });

      this.deps.db.prepare(
        `INSERT INTO namespaces (factory_address, label, registry_address, created_at)
         VALUES (?, ?, ?, ?)`
      ).run(this.address, label, created.address, this.clock());

      this.deps.events?.emit({
        type: 'NamespaceDeployed',
        source: this.address,
        payload: { label, registry: created.address, admin: caller, fee: config.fee.toString() },
      });

      return created;
    });

    this.handles.set(label, registry);
    this.log.info({ label, registry: registry.address, admin: caller }, 'Namespace deployed');
    return registry;
  }

  // ---------------------------------------------------------------------------
  // Fees & Configuration
  // ---------------------------------------------------------------------------

  withdraw(params: { caller: Address }): bigint {
    const amount = this.mutate('withdraw', () => {
      const receiver = this.config.feeReceiver;
      if (!isValidAddress(params.caller) || normalizeAddress(params.caller) !== receiver) {
        throw RegistryErrors.unauthorized(params.caller, 'withdraw factory balance');
      }
      const balance = this.deps.value.balanceOf(this.address);
      if (balance > 0n) {
        this.moveValue(this.address, receiver, balance, 'withdraw');
      }
      return balance;
    });

    this.log.info({ amount: amount.toString() }, 'Factory balance withdrawn');
    return amount;
  }

  setConfig(params: SetFactoryConfigParams): void {
    const next = validateConfig(params);
    this.mutate('setConfig', () => {
      this.requireAdmin(params.caller, 'set factory config');
      this.config = next;
    });
    // Handles opened under the old config keep its resolver book and ledger
    this.handles.clear();

    this.log.info(
      { feeReceiver: next.feeReceiver, fee: next.fee.toString() },
      'Factory config replaced',
    );
  }

  getConfig(): FactoryConfig {
    return { ...this.config };
  }

  getAdmin(): Address {
    return this.admin;
  }

  // ---------------------------------------------------------------------------
  // Lookup
  // ---------------------------------------------------------------------------

  getNamespaceHandle(label: string): NameRegistryService | null {
    const key = canonicalizeName(label);
    const cached = this.handles.get(key);
    if (cached) return cached;

    const row = this.findNamespace(key);
    if (!row) return null;

    const handle = NameRegistryService.open(
      this.registryDeps(this.config),
      normalizeAddress(row.registry_address),
    );
    this.handles.set(key, handle);
    return handle;
  }

  listNamespaces(): NamespaceInfo[] {
    const rows = this.deps.db.prepare(
      `SELECT n.label, n.registry_address, r.collection_name, r.collection_symbol, n.created_at
       FROM namespaces n
       JOIN registries r ON r.address = n.registry_address
       WHERE n.factory_address = ?
       ORDER BY n.created_at, n.label`
    ).all(this.address) as NamespaceRow[];
    return rows.map(rowToInfo);
  }

  // ---------------------------------------------------------------------------
  // Internal
  // ---------------------------------------------------------------------------

  private mutate<T>(operation: string, fn: () => T): T {
    try {
      return this.guard.run(operation, () => this.deps.db.transaction(fn)());
    } catch (err) {
      this.log.warn({ err, operation }, 'Factory operation rejected');
      throw err;
    }
  }

  private registryDeps(config: FactoryConfig): NameRegistryDeps {
    return {
      db: this.deps.db,
      tokens: this.deps.tokens,
      value: this.deps.value,
      resolverBook: config.resolverBook,
      recordLedger: config.recordLedger,
      events: this.deps.events,
      clock: this.deps.clock,
    };
  }

  private moveValue(from: Address, to: Address, amount: bigint, purpose: string): void {
    if (!this.deps.value.transfer(from, to, amount)) {
      throw RegistryErrors.transferFailed(to, amount, purpose);
    }
  }

  private findNamespace(label: string): NamespaceRow | undefined {
    return this.deps.db.prepare(
      `SELECT n.label, n.registry_address, r.collection_name, r.collection_symbol, n.created_at
       FROM namespaces n
       JOIN registries r ON r.address = n.registry_address
       WHERE n.factory_address = ? AND n.label = ?`
    ).get(this.address, label) as NamespaceRow | undefined;
  }

  private requireAdmin(caller: Address, action: string): void {
    if (!isValidAddress(caller) || normalizeAddress(caller) !== this.admin) {
      throw RegistryErrors.unauthorized(caller, action);
    }
  }
}

function validateConfig(config: FactoryConfig): FactoryConfig {
  assertAmount(config.fee, 'fee');
  return {
    resolverBook: config.resolverBook,
    recordLedger: config.recordLedger,
    feeReceiver: normalizeAddress(config.feeReceiver),
    fee: config.fee,
  };
}

function rowToInfo(row: NamespaceRow): NamespaceInfo {
  return {
    label: row.label,
    registry: normalizeAddress(row.registry_address),
    name: row.collection_name,
    symbol: row.collection_symbol,
    createdAt: row.created_at,
  };
}
