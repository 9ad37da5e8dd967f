/**
 * SqliteValueLedger — In-process value rail
 *
 * Balances per address in `value_balances`. A transfer debits the sender,
 * credits the recipient and then runs the recipient's receive hook, if one
 * is registered. The hook plays the part of a contract's receive function:
 * it may reject the value (return false), or try to call back into the
 * system that is paying it.
 *
 * Each transfer runs as its own (possibly nested) transaction, so a failed
 * transfer leaves balances untouched and reports `false`. When called
 * inside a registry operation, the whole transfer also rolls back with the
 * outer transaction.
 *
 * @module adapters/chain/SqliteValueLedger
 */

import type Database from 'better-sqlite3';
import type { Address } from 'viem';
import { createChildLogger } from '../../../utils/logger.js';
import type { IValueTransfer } from '../../core/ports/IValueTransfer.js';
import { assertAmount } from '../../core/protocol/amount.js';
import { normalizeAddress } from './address-utils.js';

const logger = createChildLogger({ module: 'SqliteValueLedger' });

/**
 * Invoked after the recipient is credited. Return false to reject.
 */
export type ReceiveHook = (from: Address, amount: bigint) => boolean;

class TransferRejected extends Error {
  constructor(reason: string) {
    super(reason);
    this.name = 'TransferRejected';
  }
}

export class SqliteValueLedger implements IValueTransfer {
  private db: Database.Database;
  private hooks = new Map<Address, ReceiveHook>();

  constructor(db: Database.Database) {
    this.db = db;
  }

  // ---------------------------------------------------------------------------
  // Funding & Hooks
  // ---------------------------------------------------------------------------

  /**
   * Mint `amount` into an account (dev/test funding).
   */
  credit(address: Address, amount: bigint): void {
    assertAmount(amount, 'amount');
    this.addBalance(normalizeAddress(address), amount);
  }

  onReceive(address: Address, hook: ReceiveHook): void {
    this.hooks.set(normalizeAddress(address), hook);
  }

  removeReceiveHook(address: Address): void {
    this.hooks.delete(normalizeAddress(address));
  }

  // ---------------------------------------------------------------------------
  // IValueTransfer
  // ---------------------------------------------------------------------------

  balanceOf(address: Address): bigint {
    const row = this.db.prepare(
      `SELECT balance FROM value_balances WHERE address = ?`
    ).safeIntegers(true).get(normalizeAddress(address)) as { balance: bigint } | undefined;
    return row?.balance ?? 0n;
  }

  transfer(from: Address, to: Address, amount: bigint): boolean {
    try {
      const sender = normalizeAddress(from);
      const recipient = normalizeAddress(to);
      assertAmount(amount, 'amount');

      this.db.transaction(() => {
        const balance = this.balanceOf(sender);
        if (balance < amount) {
          throw new TransferRejected(`insufficient balance: ${balance} < ${amount}`);
        }

        this.db.prepare(
          `UPDATE value_balances SET balance = balance - ? WHERE address = ?`
        ).run(amount, sender);
        this.addBalance(recipient, amount);

        const hook = this.hooks.get(recipient);
        if (hook && !hook(sender, amount)) {
          throw new TransferRejected('recipient rejected value');
        }
      })();

      return true;
    } catch (err) {
      logger.warn(
        { err, from, to, amount: amount.toString() },
        'Value transfer failed',
      );
      return false;
    }
  }

  // ---------------------------------------------------------------------------
  // Internal
  // ---------------------------------------------------------------------------

  private addBalance(address: Address, amount: bigint): void {
    this.db.prepare(
      `INSERT INTO value_balances (address, balance) VALUES (?, ?)
       ON CONFLICT(address) DO UPDATE SET balance = balance + excluded.balance`
    ).run(address, amount);
  }
}
