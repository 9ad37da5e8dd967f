/**
 * RegistryError — Unified error type for the naming registry
 *
 * Every failure aborts the enclosing operation. Because each mutating
 * operation runs inside a single SQLite transaction, throwing a
 * RegistryError rolls back token allocation, record writes, ledger
 * appends, value transfers and events together.
 *
 * @module packages/core/errors/RegistryError
 */

/**
 * Machine-readable error codes
 */
export type RegistryErrorCode =
  | 'ALREADY_REGISTERED'
  | 'INSUFFICIENT_PAYMENT'
  | 'INVALID_LENGTH'
  | 'NOT_OWNER'
  | 'NOT_FOUND'
  | 'TRANSFER_FAILED'
  | 'REENTRANCY_BLOCKED'
  | 'UNAUTHORIZED'
  | 'LABEL_TAKEN'
  | 'WRONG_FEE'
  | 'INVALID_INPUT';

export class RegistryError extends Error {
  public readonly code: RegistryErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(code: RegistryErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'RegistryError';
    this.code = code;
    this.details = details;
  }
}

/**
 * Type guard, optionally narrowed to a single code.
 */
export function isRegistryError(err: unknown, code?: RegistryErrorCode): err is RegistryError {
  if (!(err instanceof RegistryError)) return false;
  return code === undefined || err.code === code;
}

// =============================================================================
// Factories
// =============================================================================

export const RegistryErrors = {
  alreadyRegistered: (name: string) =>
    new RegistryError('ALREADY_REGISTERED', `Name '${name}' is already registered`, { name }),

  insufficientPayment: (name: string, price: bigint, payment: bigint) =>
    new RegistryError(
      'INSUFFICIENT_PAYMENT',
      `Payment ${payment} is below the price ${price} for '${name}'`,
      { name, price: price.toString(), payment: payment.toString() },
    ),

  invalidLength: (length: number) =>
    new RegistryError('INVALID_LENGTH', `No price tier configured for length ${length}`, { length }),

  notOwner: (name: string, caller: string) =>
    new RegistryError('NOT_OWNER', `${caller} does not hold the token for '${name}'`, { name, caller }),

  notFound: (what: string, details?: Record<string, unknown>) =>
    new RegistryError('NOT_FOUND', `${what} not found`, details),

  transferFailed: (to: string, amount: bigint, purpose: string) =>
    new RegistryError(
      'TRANSFER_FAILED',
      `Transfer of ${amount} to ${to} failed (${purpose})`,
      { to, amount: amount.toString(), purpose },
    ),

  reentrancyBlocked: (operation: string) =>
    new RegistryError('REENTRANCY_BLOCKED', `Reentrant call to ${operation} blocked`, { operation }),

  unauthorized: (caller: string, action: string) =>
    new RegistryError('UNAUTHORIZED', `${caller} is not allowed to ${action}`, { caller, action }),

  labelTaken: (label: string) =>
    new RegistryError('LABEL_TAKEN', `Namespace '${label}' already has a registry`, { label }),

  wrongFee: (fee: bigint, payment: bigint) =>
    new RegistryError(
      'WRONG_FEE',
      `Namespace fee is exactly ${fee}, got ${payment}`,
      { fee: fee.toString(), payment: payment.toString() },
    ),

  invalidInput: (message: string, details?: Record<string, unknown>) =>
    new RegistryError('INVALID_INPUT', message, details),
};
