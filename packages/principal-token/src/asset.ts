/**
 * asset.ts
 *
 * Outbound movement of the underlying asset. A transfer either completes
 * or throws TransferFailedError with nothing moved.
 */

import type { Account } from "@maturity/types";
import { InvalidAmountError, MAX_AMOUNT, TransferFailedError, assertAmount } from "./errors";

export interface AssetTransfer {
  transferOut(to: Account, amount: bigint): void;
}

/**
 * Escrow of underlying held on behalf of PT holders, mirroring a
 * redemption pool: funded up front, drained by redemptions.
 */
export class ReserveAssetTransfer implements AssetTransfer {
  private held: bigint;
  private readonly paid = new Map<Account, bigint>();
  private readonly rejected = new Set<Account>();

  constructor(initialReserve = 0n) {
    assertAmount(initialReserve, "initial reserve");
    this.held = initialReserve;
  }

  /** Underlying currently escrowed. */
  reserve(): bigint {
    return this.held;
  }

  /** Underlying paid out to `account` so far. */
  received(account: Account): bigint {
    return this.paid.get(account) ?? 0n;
  }

  fund(amount: bigint): bigint {
    assertAmount(amount);
    if (this.held + amount > MAX_AMOUNT) {
      throw new InvalidAmountError(amount, `reserve would exceed ${MAX_AMOUNT}`);
    }
    this.held += amount;
    return this.held;
  }

  /** Make every later transfer to `account` fail, as a rejecting recipient would. */
  reject(account: Account): void {
    this.rejected.add(account);
  }

  transferOut(to: Account, amount: bigint): void {
    assertAmount(amount);
    if (this.rejected.has(to)) {
      throw new TransferFailedError(to, amount, "recipient rejected the transfer");
    }
    if (amount > this.held) {
      throw new TransferFailedError(to, amount, `reserve holds only ${this.held}`);
    }
    this.held -= amount;
    this.paid.set(to, this.received(to) + amount);
  }
}
