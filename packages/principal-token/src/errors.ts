/**
 * errors.ts
 *
 * Typed failures for the principal-token engine and its collaborators.
 * Every failure aborts the whole operation; callers branch on `code`.
 */

import type { Account } from "@maturity/types";

// -----------------------------------------------------------------------
// Error codes
// -----------------------------------------------------------------------

export enum PrincipalTokenErrorCode {
  BEFORE_MATURITY = "BEFORE_MATURITY",
  INSUFFICIENT_ALLOWANCE = "INSUFFICIENT_ALLOWANCE",
  INSUFFICIENT_BALANCE = "INSUFFICIENT_BALANCE",
  ZERO_ASSETS = "ZERO_ASSETS",
  TRANSFER_FAILED = "TRANSFER_FAILED",
  INVALID_AMOUNT = "INVALID_AMOUNT",
  INVALID_MATURITY = "INVALID_MATURITY",
  INVALID_CONVERSION = "INVALID_CONVERSION",
  REENTRANT_CALL = "REENTRANT_CALL",
}

// -----------------------------------------------------------------------
// Base class
// -----------------------------------------------------------------------

export class PrincipalTokenError extends Error {
  readonly code: PrincipalTokenErrorCode;
  readonly details: Record<string, unknown>;

  constructor(
    code: PrincipalTokenErrorCode,
    message: string,
    details: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = "PrincipalTokenError";
    this.code = code;
    this.details = details;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

// -----------------------------------------------------------------------
// Specialized errors
// -----------------------------------------------------------------------

export class BeforeMaturityError extends PrincipalTokenError {
  constructor(now: number, maturity: number) {
    super(
      PrincipalTokenErrorCode.BEFORE_MATURITY,
      `Principal token matures at ${maturity}; current time is ${now}`,
      { now, maturity }
    );
    this.name = "BeforeMaturityError";
  }
}

export class InsufficientAllowanceError extends PrincipalTokenError {
  constructor(owner: Account, spender: Account, requested: bigint, available: bigint) {
    super(
      PrincipalTokenErrorCode.INSUFFICIENT_ALLOWANCE,
      `Spender ${spender} may spend ${available} of ${owner}'s tokens, requested ${requested}`,
      { owner, spender, requested: requested.toString(), available: available.toString() }
    );
    this.name = "InsufficientAllowanceError";
  }
}

export class InsufficientBalanceError extends PrincipalTokenError {
  constructor(account: Account, requested: bigint, available: bigint) {
    super(
      PrincipalTokenErrorCode.INSUFFICIENT_BALANCE,
      `Account ${account} has insufficient balance: requested ${requested}, available ${available}`,
      { account, requested: requested.toString(), available: available.toString() }
    );
    this.name = "InsufficientBalanceError";
  }
}

export class ZeroAssetsError extends PrincipalTokenError {
  constructor(principalAmount: bigint, underlyingAmount: bigint) {
    super(
      PrincipalTokenErrorCode.ZERO_ASSETS,
      `Redemption of ${principalAmount} principal releases ${underlyingAmount} underlying`,
      { principalAmount: principalAmount.toString(), underlyingAmount: underlyingAmount.toString() }
    );
    this.name = "ZeroAssetsError";
  }
}

export class TransferFailedError extends PrincipalTokenError {
  constructor(to: Account, amount: bigint, reason: string) {
    super(
      PrincipalTokenErrorCode.TRANSFER_FAILED,
      `Transfer of ${amount} underlying to ${to} failed: ${reason}`,
      { to, amount: amount.toString(), reason }
    );
    this.name = "TransferFailedError";
  }
}

export class InvalidAmountError extends PrincipalTokenError {
  constructor(amount: bigint, reason: string) {
    super(
      PrincipalTokenErrorCode.INVALID_AMOUNT,
      `Invalid amount ${amount}: ${reason}`,
      { amount: amount.toString(), reason }
    );
    this.name = "InvalidAmountError";
  }
}

export class InvalidMaturityError extends PrincipalTokenError {
  constructor(maturity: number) {
    super(
      PrincipalTokenErrorCode.INVALID_MATURITY,
      `Invalid maturity ${maturity}: must be a non-negative safe integer`,
      { maturity }
    );
    this.name = "InvalidMaturityError";
  }
}

export class InvalidConversionError extends PrincipalTokenError {
  constructor(reason: string) {
    super(PrincipalTokenErrorCode.INVALID_CONVERSION, `Invalid conversion: ${reason}`, { reason });
    this.name = "InvalidConversionError";
  }
}

export class ReentrantCallError extends PrincipalTokenError {
  constructor(operation: string) {
    super(
      PrincipalTokenErrorCode.REENTRANT_CALL,
      `${operation}() called while another redemption is in progress`,
      { operation }
    );
    this.name = "ReentrantCallError";
  }
}

// -----------------------------------------------------------------------
// Guards
// -----------------------------------------------------------------------

export function isPrincipalTokenError(
  err: unknown,
  code?: PrincipalTokenErrorCode
): err is PrincipalTokenError {
  if (!(err instanceof PrincipalTokenError)) return false;
  return code === undefined || err.code === code;
}

/** Largest Clarity uint; every amount must fit one. */
export const MAX_AMOUNT = 2n ** 128n - 1n;

/** Throw InvalidAmountError unless 0 <= amount <= MAX_AMOUNT. */
export function assertAmount(amount: bigint, label = "amount"): void {
  if (amount < 0n) {
    throw new InvalidAmountError(amount, `${label} must not be negative`);
  }
  if (amount > MAX_AMOUNT) {
    throw new InvalidAmountError(amount, `${label} exceeds the Clarity uint range`);
  }
}
