/**
 * NameRegistryService — Per-namespace registry state machine
 *
 * States per name-hash: Unregistered → Active → (Active, extended) | Burned.
 * Nothing moves a record out of Active on expiry; expired records still
 * exist for ownership and renewal, and only `resolveName` treats them as
 * absent.
 *
 * Transition algorithm (registerDomain):
 *   guard → tx: uniqueness → price → payment check → collect payment →
 *       mint token → write record → forward fee → refund excess →
 *       link owner → ledger append → events
 *
 * Atomicity: every mutating operation runs inside one better-sqlite3
 * transaction. Value transfers, token mints, address-book links, ledger
 * entries and events all write to the same database, so any thrown error
 * (a failed transfer included) rolls the whole transition back.
 *
 * Reentrancy: the guard is held for the whole operation. A transfer
 * recipient that calls back into any mutating method of this registry,
 * through this handle or any other handle on the same database and
 * address, while the outer call is in flight gets REENTRANCY_BLOCKED.
 *
 * @module adapters/registry/NameRegistryService
 */

import type Database from 'better-sqlite3';
import type { Logger } from 'pino';
import type { Address } from 'viem';
import { createChildLogger } from '../../../utils/logger.js';
import { RegistryErrors } from '../../core/errors/RegistryError.js';
import { assertAmount } from '../../core/protocol/amount.js';
import {
  canonicalizeName,
  fullName,
  hashName,
  hashSubName,
  nameLength,
  type NameHash,
} from '../../core/protocol/name-hash.js';
import { sharedGuard, type ReentrancyGuard } from '../../core/protocol/reentrancy-guard.js';
import type { ITokenLedger, TokenId } from '../../core/ports/ITokenLedger.js';
import type { IValueTransfer } from '../../core/ports/IValueTransfer.js';
import type { IResolverAddressBook } from '../../core/ports/IResolverAddressBook.js';
import type { IRecordLedger } from '../../core/ports/IRecordLedger.js';
import type {
  BurnDomainParams,
  CreateSubDomainParams,
  CreateSubDomainResult,
  DomainRecord,
  INameRegistry,
  PriceTier,
  RegisterDomainParams,
  RegisterDomainResult,
  RenewDomainParams,
  RenewDomainResult,
  SetPriceConfigParams,
  SetPrimaryDomainParams,
  SetResolverParams,
  TransferAdminParams,
} from '../../core/ports/INameRegistry.js';
import { isValidAddress, normalizeAddress } from '../chain/address-utils.js';
import { PriceTable } from './PriceTable.js';
import type { RegistryEventEmitter } from './RegistryEventEmitter.js';

// =============================================================================
// Types
// =============================================================================

export interface NameRegistryDeps {
  db: Database.Database;
  tokens: ITokenLedger;
  value: IValueTransfer;
  resolverBook: IResolverAddressBook;
  recordLedger: IRecordLedger;
  events?: RegistryEventEmitter;
  /** Unix seconds */
  clock?: () => number;
  logger?: Logger;
}

export interface CreateRegistryOptions {
  address: Address;
  namespace: string;
  /** Token collection name */
  name: string;
  /** Token collection symbol */
  symbol: string;
  admin: Address;
  feeReceiver: Address;
  /** Seconds added to `expires` on registration and renewal */
  registrationPeriod: number;
  priceTiers?: PriceTier[];
}

interface RegistryRow {
  address: string;
  namespace: string;
  collection_name: string;
  collection_symbol: string;
  admin: string;
  fee_receiver: string;
  registration_period: number;
  created_at: number;
}

interface DomainRow {
  name_hash: NameHash;
  name: string;
  resolver: string;
  expires: number;
  token_id: number;
}

// =============================================================================
// NameRegistryService
// =============================================================================

export class NameRegistryService implements INameRegistry {
  readonly address: Address;
  readonly namespace: string;
  readonly collectionName: string;
  readonly collectionSymbol: string;
  readonly registrationPeriod: number;
  readonly feeReceiver: Address;

  private db: Database.Database;
  private tokens: ITokenLedger;
  private value: IValueTransfer;
  private resolverBook: IResolverAddressBook;
  private recordLedger: IRecordLedger;
  private events: RegistryEventEmitter | null;
  private clock: () => number;
  private log: Logger;
  private prices: PriceTable;
  private guard: ReentrancyGuard;

  /**
   * Persist a new registry and return its service.
   *
   * @throws RegistryError INVALID_INPUT on a malformed namespace, address or period
   */
  static create(deps: NameRegistryDeps, options: CreateRegistryOptions): NameRegistryService {
    const address = normalizeAddress(options.address);
    const namespace = canonicalizeName(options.namespace);
    if (namespace.length === 0 || namespace.includes('.')) {
      throw RegistryErrors.invalidInput(`Invalid namespace label '${options.namespace}'`);
    }
    if (!Number.isInteger(options.registrationPeriod) || options.registrationPeriod <= 0) {
      throw RegistryErrors.invalidInput('registrationPeriod must be a positive integer', {
        registrationPeriod: options.registrationPeriod,
      });
    }
    const now = (deps.clock ?? unixNow)();

    deps.db.transaction(() => {
      deps.db.prepare(
        `INSERT INTO registries
         (address, namespace, collection_name, collection_symbol, admin,
          fee_receiver, registration_period, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
      ).run(
        address,
        namespace,
        options.name,
        options.symbol,
        normalizeAddress(options.admin),
        normalizeAddress(options.feeReceiver),
        options.registrationPeriod,
        now,
      );

      const prices = new PriceTable(deps.db, address);
      for (const tier of options.priceTiers ?? []) {
        prices.upsert(tier.length, tier.price);
      }
    })();

    return NameRegistryService.open(deps, address);
  }

  /**
   * Load an existing registry.
   *
   * @throws RegistryError NOT_FOUND when no registry lives at `address`
   */
  static open(deps: NameRegistryDeps, address: Address): NameRegistryService {
    const row = deps.db.prepare(
      `SELECT * FROM registries WHERE address = ?`
    ).get(normalizeAddress(address)) as RegistryRow | undefined;
    if (!row) {
      throw RegistryErrors.notFound('Registry', { address });
    }
    return new NameRegistryService(deps, row);
  }

  private constructor(deps: NameRegistryDeps, row: RegistryRow) {
    this.db = deps.db;
    this.tokens = deps.tokens;
    this.value = deps.value;
    this.resolverBook = deps.resolverBook;
    this.recordLedger = deps.recordLedger;
    this.events = deps.events ?? null;
    this.clock = deps.clock ?? unixNow;

    this.address = normalizeAddress(row.address);
    this.namespace = row.namespace;
    this.collectionName = row.collection_name;
    this.collectionSymbol = row.collection_symbol;
    this.registrationPeriod = row.registration_period;
    this.feeReceiver = normalizeAddress(row.fee_receiver);

    this.log = deps.logger ?? createChildLogger({
      module: 'NameRegistryService',
      registry: this.address,
      namespace: this.namespace,
    });
    this.prices = new PriceTable(this.db, this.address);
    this.guard = sharedGuard(this.db, `registry:${this.address}`);
  }

  // ---------------------------------------------------------------------------
  // Registration
  // ---------------------------------------------------------------------------

  registerDomain(params: RegisterDomainParams): RegisterDomainResult {
    const result = this.mutate('registerDomain', () => {
      const owner = normalizeAddress(params.caller);
      assertAmount(params.payment, 'payment');

      const name = canonicalizeName(params.name);
      const nameHash = this.generateHash(name);
      const display = fullName(name, this.namespace);

      if (this.findDomain(nameHash)) {
        throw RegistryErrors.alreadyRegistered(display);
      }

      const price = this.prices.priceFor(nameLength(name));
      if (params.payment < price) {
        throw RegistryErrors.insufficientPayment(display, price, params.payment);
      }

      const now = this.clock();
      const expires = now + this.registrationPeriod;

      this.moveValue(owner, this.address, params.payment, 'payment');

      const tokenId = this.tokens.mint(this.address, owner);
      this.db.prepare(
        `INSERT INTO domains (registry_address, name_hash, name, resolver, expires, token_id)
         VALUES (?, ?, ?, ?, ?, ?)`
      ).run(this.address, nameHash, name, owner, expires, tokenId);

      this.moveValue(this.address, this.feeReceiver, price, 'fee');
      const refund = params.payment - price;
      if (refund > 0n) {
        this.moveValue(this.address, owner, refund, 'refund');
      }

      this.resolverBook.linkNameToOwner(nameHash, owner);

      this.recordLedger.append({
        fullName: display,
        owner,
        registrationDate: now,
        expirationDate: expires,
        registrationPrice: price,
        source: this.address,
      });

      this.events?.emit({
        type: 'DomainRegistered',
        source: this.address,
        payload: { name: display, nameHash, tokenId, owner, price: price.toString(), expires },
      });

      return { nameHash, tokenId, expires, price, refund };
    });

    this.log.info(
      { nameHash: result.nameHash, tokenId: result.tokenId, expires: result.expires },
      'Domain registered',
    );
    return result;
  }

  renewDomain(params: RenewDomainParams): RenewDomainResult {
    const result = this.mutate('renewDomain', () => {
      const caller = normalizeAddress(params.caller);
      assertAmount(params.payment, 'payment');

      const name = canonicalizeName(params.name);
      const nameHash = this.generateHash(name);
      const display = fullName(name, this.namespace);
      const domain = this.requireHolder(nameHash, display, caller);

      const price = this.prices.priceFor(nameLength(name));
      if (params.payment < price) {
        throw RegistryErrors.insufficientPayment(display, price, params.payment);
      }

      // Additive: an already-expired name is extended from its stale expiry
      const expires = domain.expires + this.registrationPeriod;

      this.moveValue(caller, this.address, params.payment, 'payment');

      this.db.prepare(
        `UPDATE domains SET expires = ? WHERE registry_address = ? AND name_hash = ?`
      ).run(expires, this.address, nameHash);

      this.moveValue(this.address, this.feeReceiver, price, 'fee');
      const refund = params.payment - price;
      if (refund > 0n) {
        this.moveValue(this.address, caller, refund, 'refund');
      }

      this.events?.emit({
        type: 'DomainRenewed',
        source: this.address,
        payload: { name: display, nameHash, tokenId: domain.tokenId, price: price.toString(), expires },
      });

      return { nameHash, tokenId: domain.tokenId, expires, price, refund };
    });

    this.log.info({ nameHash: result.nameHash, expires: result.expires }, 'Domain renewed');
    return result;
  }

  // ---------------------------------------------------------------------------
  // Holder Operations
  // ---------------------------------------------------------------------------

  setResolver(params: SetResolverParams): void {
    const resolver = normalizeAddress(params.resolver);
    const nameHash = this.mutate('setResolver', () => {
      const name = canonicalizeName(params.name);
      const hash = this.generateHash(name);
      this.requireHolder(hash, fullName(name, this.namespace), normalizeAddress(params.caller));

      this.db.prepare(
        `UPDATE domains SET resolver = ? WHERE registry_address = ? AND name_hash = ?`
      ).run(resolver, this.address, hash);

      this.events?.emit({
        type: 'ResolverSet',
        source: this.address,
        payload: { nameHash: hash, resolver },
      });
      return hash;
    });

    this.log.info({ nameHash, resolver }, 'Resolver set');
  }

  setPrimaryDomain(params: SetPrimaryDomainParams): void {
    const caller = normalizeAddress(params.caller);
    const nameHash = this.mutate('setPrimaryDomain', () => {
      const name = canonicalizeName(params.name);
      const hash = this.generateHash(name);
      this.requireHolder(hash, fullName(name, this.namespace), caller);

      this.resolverBook.setPrimaryName(caller, hash);

      this.events?.emit({
        type: 'PrimaryDomainSet',
        source: this.address,
        payload: { owner: caller, nameHash: hash },
      });
      return hash;
    });

    this.log.info({ nameHash, owner: caller }, 'Primary domain set');
  }

  /**
   * Create `<subName>.<parentName>` for `owner`. No payment, no ledger entry.
   */
  createSubDomain(params: CreateSubDomainParams): CreateSubDomainResult {
    const result = this.mutate('createSubDomain', () => {
      const caller = normalizeAddress(params.caller);
      const owner = normalizeAddress(params.owner);
      const subName = canonicalizeName(params.subName);
      if (subName.length === 0) {
        throw RegistryErrors.invalidInput('Sub-name must not be empty');
      }

      const parentName = canonicalizeName(params.parentName);
      const parentHash = this.generateHash(parentName);
      const parent = this.requireHolder(parentHash, fullName(parentName, this.namespace), caller);

      const nameHash = hashSubName(parentHash, subName);
      const name = `${subName}.${parent.name}`;
      if (this.findDomain(nameHash)) {
        throw RegistryErrors.alreadyRegistered(fullName(name, this.namespace));
      }

      const expires = this.clock() + this.registrationPeriod;
      const tokenId = this.tokens.mint(this.address, owner);
      this.db.prepare(
        `INSERT INTO domains (registry_address, name_hash, name, resolver, expires, token_id)
         VALUES (?, ?, ?, ?, ?, ?)`
      ).run(this.address, nameHash, name, owner, expires, tokenId);

      this.resolverBook.linkNameToOwner(nameHash, owner);

      this.events?.emit({
        type: 'SubDomainCreated',
        source: this.address,
        payload: { name: fullName(name, this.namespace), parentHash, nameHash, tokenId, owner, expires },
      });

      return { nameHash, tokenId, expires };
    });

    this.log.info({ nameHash: result.nameHash, tokenId: result.tokenId }, 'Sub-domain created');
    return result;
  }

  // ---------------------------------------------------------------------------
  // Reads
  // ---------------------------------------------------------------------------

  getDomainPrice(name: string): bigint {
    return this.prices.priceFor(nameLength(name));
  }

  generateHash(name: string): NameHash {
    return hashName(name, this.namespace);
  }

  /** Hash of `<subName>.<parentName>` in this namespace */
  generateSubHash(parentName: string, subName: string): NameHash {
    return hashSubName(this.generateHash(parentName), subName);
  }

  getExpiration(name: string): number {
    return this.requireDomain(this.generateHash(name), name).expires;
  }

  getResolver(name: string): Address {
    return this.requireDomain(this.generateHash(name), name).resolver;
  }

  checkOwnership(name: string, caller: Address): boolean {
    if (!isValidAddress(caller)) return false;
    const holder = this.ownerOf(name);
    return holder !== null && holder === normalizeAddress(caller);
  }

  getDomain(name: string): DomainRecord | null {
    return this.findDomain(this.generateHash(name));
  }

  getDomainByHash(nameHash: NameHash): DomainRecord | null {
    return this.findDomain(nameHash);
  }

  resolveName(name: string): Address | null {
    const domain = this.getDomain(name);
    if (!domain || domain.expires <= this.clock()) return null;
    return domain.resolver;
  }

  isAvailable(name: string): boolean {
    return this.getDomain(name) === null;
  }

  getTokenId(name: string): TokenId | null {
    return this.getDomain(name)?.tokenId ?? null;
  }

  getNameHashByToken(tokenId: TokenId): NameHash | null {
    const row = this.db.prepare(
      `SELECT name_hash FROM domains WHERE registry_address = ? AND token_id = ?`
    ).get(this.address, tokenId) as { name_hash: NameHash } | undefined;
    return row?.name_hash ?? null;
  }

  ownerOf(name: string): Address | null {
    const domain = this.getDomain(name);
    if (!domain) return null;
    return this.tokens.ownerOf(this.address, domain.tokenId);
  }

  getPriceTiers(): PriceTier[] {
    return this.prices.tiers();
  }

  getAdmin(): Address {
    const row = this.db.prepare(
      `SELECT admin FROM registries WHERE address = ?`
    ).get(this.address) as { admin: string };
    return normalizeAddress(row.admin);
  }

  // ---------------------------------------------------------------------------
  // Administration
  // ---------------------------------------------------------------------------

  /**
   * Remove the token binding, the record and the address-book links
   * (including any primary name pointing at it). The ledger keeps its entry.
   */
  burnDomain(params: BurnDomainParams): void {
    const burned = this.mutate('burnDomain', () => {
      this.requireAdmin(params.caller, 'burn domains');
      const nameHash = this.generateHash(params.name);
      const domain = this.requireDomain(nameHash, params.name);

      this.tokens.burn(this.address, domain.tokenId);
      this.resolverBook.unlinkName(nameHash);
      this.db.prepare(
        `DELETE FROM domains WHERE registry_address = ? AND name_hash = ?`
      ).run(this.address, nameHash);

      this.events?.emit({
        type: 'DomainBurned',
        source: this.address,
        payload: { nameHash, tokenId: domain.tokenId },
      });
      return domain;
    });

    this.log.warn({ nameHash: burned.nameHash, tokenId: burned.tokenId }, 'Domain burned');
  }

  setPriceConfig(params: SetPriceConfigParams): void {
    this.mutate('setPriceConfig', () => {
      this.requireAdmin(params.caller, 'set prices');
      this.prices.upsert(params.length, params.price);

      this.events?.emit({
        type: 'PriceUpdated',
        source: this.address,
        payload: { length: params.length, price: params.price.toString() },
      });
    });

    this.log.info({ length: params.length, price: params.price.toString() }, 'Price tier updated');
  }

  transferAdmin(params: TransferAdminParams): void {
    const newAdmin = normalizeAddress(params.newAdmin);
    const previousAdmin = this.mutate('transferAdmin', () => {
      const current = this.requireAdmin(params.caller, 'transfer admin');
      this.db.prepare(
        `UPDATE registries SET admin = ? WHERE address = ?`
      ).run(newAdmin, this.address);

      this.events?.emit({
        type: 'AdminTransferred',
        source: this.address,
        payload: { previousAdmin: current, newAdmin },
      });
      return current;
    });

    this.log.info({ previousAdmin, newAdmin }, 'Registry admin transferred');
  }

  // ---------------------------------------------------------------------------
  // Internal
  // ---------------------------------------------------------------------------

  /**
   * Guarded, transactional execution. Rejections are logged, then rethrown.
   */
  private mutate<T>(operation: string, fn: () => T): T {
    try {
      return this.guard.run(operation, () => this.db.transaction(fn)());
    } catch (err) {
      this.log.warn({ err, operation }, 'Registry operation rejected');
      throw err;
    }
  }

  private moveValue(from: Address, to: Address, amount: bigint, purpose: string): void {
    if (!this.value.transfer(from, to, amount)) {
      throw RegistryErrors.transferFailed(to, amount, purpose);
    }
  }

  private findDomain(nameHash: NameHash): DomainRecord | null {
    const row = this.db.prepare(
      `SELECT name_hash, name, resolver, expires, token_id
       FROM domains
       WHERE registry_address = ? AND name_hash = ?`
    ).get(this.address, nameHash) as DomainRow | undefined;
    return row ? rowToDomain(row) : null;
  }

  private requireDomain(nameHash: NameHash, name: string): DomainRecord {
    const domain = this.findDomain(nameHash);
    if (!domain) {
      throw RegistryErrors.notFound(`Domain '${name}'`, { nameHash });
    }
    return domain;
  }

  private requireHolder(nameHash: NameHash, name: string, caller: Address): DomainRecord {
    const domain = this.requireDomain(nameHash, name);
    if (this.tokens.ownerOf(this.address, domain.tokenId) !== caller) {
      throw RegistryErrors.notOwner(name, caller);
    }
    return domain;
  }

  private requireAdmin(caller: Address, action: string): Address {
    const admin = this.getAdmin();
    if (!isValidAddress(caller) || normalizeAddress(caller) !== admin) {
      throw RegistryErrors.unauthorized(caller, action);
    }
    return admin;
  }
}

function rowToDomain(row: DomainRow): DomainRecord {
  return {
    nameHash: row.name_hash,
    name: row.name,
    resolver: normalizeAddress(row.resolver),
    expires: row.expires,
    tokenId: row.token_id,
  };
}

function unixNow(): number {
  return Math.floor(Date.now() / 1000);
}
