/**
 * conversion.ts
 *
 * Exchange between principal units (PT) and underlying units.
 *
 * The engine only depends on ConversionStrategy; fee-bearing or
 * rate-bearing variants plug in here. Each direction takes an explicit
 * rounding mode so that previews can round against the caller:
 *   previewRedeem   → floor (never release more underlying than owed)
 *   previewWithdraw → ceil  (never burn fewer PT than owed)
 */

import { InvalidConversionError } from "./errors";

export type Rounding = "floor" | "ceil";

export const BPS_DENOMINATOR = 10_000n;

export interface ConversionStrategy {
  toUnderlying(principalAmount: bigint, rounding: Rounding): bigint;
  toPrincipal(underlyingAmount: bigint, rounding: Rounding): bigint;
}

/** a * b / d, rounded in the requested direction. Operands are non-negative. */
export function mulDiv(a: bigint, b: bigint, d: bigint, rounding: Rounding): bigint {
  if (d <= 0n) throw new InvalidConversionError(`divisor must be positive, got ${d}`);
  const product = a * b;
  const quotient = product / d;
  if (rounding === "ceil" && product % d !== 0n) return quotient + 1n;
  return quotient;
}

// -----------------------------------------------------------------------
// Strategies
// -----------------------------------------------------------------------

/** 1 PT = 1 underlying, in both directions. */
export class IdentityConversion implements ConversionStrategy {
  toUnderlying(principalAmount: bigint): bigint {
    return principalAmount;
  }

  toPrincipal(underlyingAmount: bigint): bigint {
    return underlyingAmount;
  }
}

/**
 * Charges `feeBps` basis points on every redemption.
 *
 *   toUnderlying(p) = p × (10 000 − fee) / 10 000
 *   toPrincipal(u)  = u × 10 000 / (10 000 − fee)
 *
 * With fee = 30 bps, redeeming 10 000 PT releases 9 970 underlying and
 * withdrawing 9 970 underlying burns 10 000 PT.
 */
export class FeeConversion implements ConversionStrategy {
  readonly feeBps: bigint;

  constructor(feeBps: bigint) {
    if (feeBps < 0n || feeBps >= BPS_DENOMINATOR) {
      throw new InvalidConversionError(`fee must be in [0, ${BPS_DENOMINATOR}) bps, got ${feeBps}`);
    }
    this.feeBps = feeBps;
  }

  toUnderlying(principalAmount: bigint, rounding: Rounding): bigint {
    return mulDiv(principalAmount, BPS_DENOMINATOR - this.feeBps, BPS_DENOMINATOR, rounding);
  }

  toPrincipal(underlyingAmount: bigint, rounding: Rounding): bigint {
    return mulDiv(underlyingAmount, BPS_DENOMINATOR, BPS_DENOMINATOR - this.feeBps, rounding);
  }
}
