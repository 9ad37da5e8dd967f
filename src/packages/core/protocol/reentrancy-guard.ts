/**
 * Reentrancy Guard
 *
 * Operation-scoped mutual exclusion for synchronous state transitions.
 * A mutating operation holds the lock for its whole duration, including
 * the value transfers and notifications it performs mid-transition. Any
 * nested attempt to enter while the lock is held fails immediately with
 * REENTRANCY_BLOCKED. The lock is released in `finally`, on success and
 * on every error path.
 *
 * Services take their guard from `sharedGuard`, keyed by database and
 * address, so two handles to one registry hold the same lock.
 *
 * @module packages/core/protocol/reentrancy-guard
 */

import { RegistryErrors } from '../errors/RegistryError.js';

export class ReentrancyGuard {
  private activeOperation: string | null = null;

  get locked(): boolean {
    return this.activeOperation !== null;
  }

  run<T>(operation: string, fn: () => T): T {
    if (this.activeOperation !== null) {
      throw RegistryErrors.reentrancyBlocked(operation);
    }
    this.activeOperation = operation;
    try {
      return fn();
    } finally {
      this.activeOperation = null;
    }
  }
}

const scopes = new WeakMap<object, Map<string, ReentrancyGuard>>();

/**
 * The guard for `key` within `scope`, created on first use.
 */
export function sharedGuard(scope: object, key: string): ReentrancyGuard {
  let guards = scopes.get(scope);
  if (!guards) {
    guards = new Map();
    scopes.set(scope, guards);
  }
  let guard = guards.get(key);
  if (!guard) {
    guard = new ReentrancyGuard();
    guards.set(key, guard);
  }
  return guard;
}
