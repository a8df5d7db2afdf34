/**
 * principal-token.ts
 *
 * Redemption accounting for a principal token (PT): a claim on a fixed
 * amount of an underlying asset, redeemable once `maturity` is reached.
 *
 * Gating policy, held across every entry point:
 *   - before maturity, previews and max queries return 0
 *   - before maturity, redeem() and withdraw() fail with BeforeMaturityError
 *
 * Mutating calls run gate → allowance → preview → burn → record → transfer
 * and either complete or leave the ledger and the log exactly as they were.
 */

import type {
  Account,
  PrincipalPosition,
  PrincipalTokenState,
  RedeemRecord,
} from "@maturity/types";
import type { AssetTransfer } from "./asset";
import type { Clock } from "./clock";
import { IdentityConversion, type ConversionStrategy } from "./conversion";
import {
  BeforeMaturityError,
  InvalidMaturityError,
  ReentrantCallError,
  ZeroAssetsError,
  assertAmount,
} from "./errors";
import { RedeemLog } from "./events";
import type { FungibleLedger } from "./ledger";

export interface PrincipalTokenOptions {
  /** Identifier of the underlying asset (e.g. a SIP-010 contract id). */
  underlying: string;
  /** Clock value at or after which PT becomes redeemable. */
  maturity: number;
  ledger: FungibleLedger;
  assets: AssetTransfer;
  clock: Clock;
  /** Defaults to 1 PT = 1 underlying. */
  conversion?: ConversionStrategy;
  /** Supply a log to share it with an indexer; a fresh one is created otherwise. */
  events?: RedeemLog;
}

interface Settlement {
  record: RedeemRecord;
  result: bigint;
}

export class PrincipalToken {
  readonly underlying: string;
  readonly maturity: number;

  private readonly ledger: FungibleLedger;
  private readonly assets: AssetTransfer;
  private readonly clock: Clock;
  private readonly conversion: ConversionStrategy;
  readonly events: RedeemLog;

  private redeeming = false;

  constructor(options: PrincipalTokenOptions) {
    if (!Number.isSafeInteger(options.maturity) || options.maturity < 0) {
      throw new InvalidMaturityError(options.maturity);
    }
    this.underlying = options.underlying;
    this.maturity = options.maturity;
    this.ledger = options.ledger;
    this.assets = options.assets;
    this.clock = options.clock;
    this.conversion = options.conversion ?? new IdentityConversion();
    this.events = options.events ?? new RedeemLog();
  }

  // -----------------------------------------------------------------------
  // Conversion (not time-gated)
  // -----------------------------------------------------------------------

  convertToUnderlying(principalAmount: bigint): bigint {
    assertAmount(principalAmount, "principal amount");
    return this.conversion.toUnderlying(principalAmount, "floor");
  }

  convertToPrincipal(underlyingAmount: bigint): bigint {
    assertAmount(underlyingAmount, "underlying amount");
    return this.conversion.toPrincipal(underlyingAmount, "floor");
  }

  // -----------------------------------------------------------------------
  // Previews
  // -----------------------------------------------------------------------

  /** Underlying released by redeem(principalAmount) right now; rounds down. */
  previewRedeem(principalAmount: bigint): bigint {
    assertAmount(principalAmount, "principal amount");
    if (!this.isMatured()) return 0n;
    return this.conversion.toUnderlying(principalAmount, "floor");
  }

  /** PT burned by withdraw(underlyingAmount) right now; rounds up. */
  previewWithdraw(underlyingAmount: bigint): bigint {
    assertAmount(underlyingAmount, "underlying amount");
    if (!this.isMatured()) return 0n;
    return this.conversion.toPrincipal(underlyingAmount, "ceil");
  }

  // -----------------------------------------------------------------------
  // Max amounts
  // -----------------------------------------------------------------------

  maxRedeem(owner: Account): bigint {
    if (!this.isMatured()) return 0n;
    return this.ledger.balanceOf(owner);
  }

  maxWithdraw(owner: Account): bigint {
    return this.previewWithdraw(this.maxRedeem(owner));
  }

  // -----------------------------------------------------------------------
  // Read models
  // -----------------------------------------------------------------------

  isMatured(): boolean {
    return this.clock.now() >= this.maturity;
  }

  state(): PrincipalTokenState {
    const now = this.clock.now();
    return {
      underlying: this.underlying,
      maturity: this.maturity,
      now,
      matured: now >= this.maturity,
      totalSupply: this.ledger.totalSupply(),
    };
  }

  position(account: Account): PrincipalPosition {
    return {
      account,
      principalBalance: this.ledger.balanceOf(account),
      maxRedeem: this.maxRedeem(account),
      maxWithdraw: this.maxWithdraw(account),
    };
  }

  records(): readonly RedeemRecord[] {
    return this.events.records();
  }

  // -----------------------------------------------------------------------
  // Mutating entry points
  // -----------------------------------------------------------------------

  /**
   * Burn `principalAmount` PT from `from` and send the underlying to `to`.
   * `sender` is the caller; when it is not `from` the (from, sender)
   * allowance is consumed. Returns the underlying released.
   */
  redeem(principalAmount: bigint, from: Account, to: Account, sender: Account): bigint {
    assertAmount(principalAmount, "principal amount");
    return this.atomically("redeem", () => {
      this.assertMatured();
      if (sender !== from) {
        this.ledger.decreaseAllowance(from, sender, principalAmount);
      }

      const underlyingAmount = this.previewRedeem(principalAmount);
      if (underlyingAmount === 0n) {
        throw new ZeroAssetsError(principalAmount, underlyingAmount);
      }

      return {
        record: this.settle(principalAmount, underlyingAmount, from, to),
        result: underlyingAmount,
      };
    });
  }

  /**
   * Burn as much PT from `from` as it takes to send exactly
   * `underlyingAmount` to `to`. Returns the PT burned.
   */
  withdraw(underlyingAmount: bigint, from: Account, to: Account, sender: Account): bigint {
    assertAmount(underlyingAmount, "underlying amount");
    return this.atomically("withdraw", () => {
      this.assertMatured();
      const principalAmount = this.previewWithdraw(underlyingAmount);
      if (sender !== from) {
        this.ledger.decreaseAllowance(from, sender, principalAmount);
      }

      if (underlyingAmount === 0n || principalAmount === 0n) {
        throw new ZeroAssetsError(principalAmount, underlyingAmount);
      }

      return {
        record: this.settle(principalAmount, underlyingAmount, from, to),
        result: principalAmount,
      };
    });
  }

  // -----------------------------------------------------------------------
  // Internals
  // -----------------------------------------------------------------------

  /** Gate for every mutating entry point. */
  private assertMatured(): void {
    const now = this.clock.now();
    if (now < this.maturity) {
      throw new BeforeMaturityError(now, this.maturity);
    }
  }

  /** Burn, record, release. Never reordered. */
  private settle(
    principalAmount: bigint,
    underlyingAmount: bigint,
    from: Account,
    to: Account
  ): RedeemRecord {
    this.ledger.burn(from, principalAmount);
    const record: RedeemRecord = { from, to, underlyingAmount };
    this.events.append(record);
    this.assets.transferOut(to, underlyingAmount);
    return record;
  }

  /**
   * Run `body` with rollback: on any throw the ledger and the log are
   * restored and the error is rethrown. Subscribers only see records of
   * calls that completed, and a subscriber that throws cannot fail the call.
   */
  private atomically(operation: string, body: () => Settlement): bigint {
    const { record, result } = this.guarded(operation, body);
    this.events.publish(record);
    return result;
  }

  private guarded(operation: string, body: () => Settlement): Settlement {
    if (this.redeeming) throw new ReentrantCallError(operation);
    this.redeeming = true;

    const checkpoint = this.ledger.checkpoint();
    const logLength = this.events.length;
    try {
      const settlement = body();
      checkpoint.release();
      return settlement;
    } catch (err) {
      checkpoint.restore();
      this.events.truncate(logLength);
      throw err;
    } finally {
      this.redeeming = false;
    }
  }
}
