/**
 * ledger.ts
 *
 * Fungible ledger for principal-token balances and allowances.
 *
 * The engine never writes balances directly: it burns through this
 * interface and trusts its conservation invariant
 * (sum of balances == totalSupply, burns decrease both).
 */

import type { Account } from "@maturity/types";
import {
  InsufficientAllowanceError,
  InsufficientBalanceError,
  InvalidAmountError,
  MAX_AMOUNT,
  assertAmount,
} from "./errors";

/** Largest Clarity uint. An allowance at this value is unlimited. */
export const MAX_ALLOWANCE = MAX_AMOUNT;

/**
 * Undo handle returned by FungibleLedger.checkpoint(). Exactly one of
 * restore() or release() settles it; later calls are no-ops.
 */
export interface LedgerCheckpoint {
  /** Revert every balance, supply and allowance change made since the checkpoint. */
  restore(): void;
  /** Keep the changes and stop tracking them. */
  release(): void;
}

export interface FungibleLedger {
  balanceOf(account: Account): bigint;
  totalSupply(): bigint;
  mint(account: Account, amount: bigint): void;
  burn(account: Account, amount: bigint): void;
  transfer(from: Account, to: Account, amount: bigint): void;
  approve(owner: Account, spender: Account, amount: bigint): void;
  allowance(owner: Account, spender: Account): bigint;
  decreaseAllowance(owner: Account, spender: Account, amount: bigint): void;
  checkpoint(): LedgerCheckpoint;
}

// -----------------------------------------------------------------------
// In-memory implementation
// -----------------------------------------------------------------------

/** Writes are journaled, one undo entry each, only while a checkpoint is open. */
export class InMemoryLedger implements FungibleLedger {
  private readonly balances = new Map<Account, bigint>();
  private readonly allowances = new Map<Account, Map<Account, bigint>>();
  private supply = 0n;

  private journal: Array<() => void> = [];
  private openCheckpoints = 0;

  // -----------------------------------------------------------------------
  // Read-only
  // -----------------------------------------------------------------------

  balanceOf(account: Account): bigint {
    return this.balances.get(account) ?? 0n;
  }

  totalSupply(): bigint {
    return this.supply;
  }

  allowance(owner: Account, spender: Account): bigint {
    return this.allowances.get(owner)?.get(spender) ?? 0n;
  }

  /** Accounts with a non-zero balance, in first-credited order. */
  holders(): Account[] {
    return [...this.balances.entries()]
      .filter(([, balance]) => balance > 0n)
      .map(([account]) => account);
  }

  // -----------------------------------------------------------------------
  // Supply
  // -----------------------------------------------------------------------

  mint(account: Account, amount: bigint): void {
    assertAmount(amount);
    if (this.supply + amount > MAX_AMOUNT) {
      throw new InvalidAmountError(amount, `total supply would exceed ${MAX_AMOUNT}`);
    }
    this.setBalance(account, this.balanceOf(account) + amount);
    this.setSupply(this.supply + amount);
  }

  burn(account: Account, amount: bigint): void {
    assertAmount(amount);
    const balance = this.balanceOf(account);
    if (amount > balance) {
      throw new InsufficientBalanceError(account, amount, balance);
    }
    this.setBalance(account, balance - amount);
    this.setSupply(this.supply - amount);
  }

  // -----------------------------------------------------------------------
  // Transfers and allowances
  // -----------------------------------------------------------------------

  transfer(from: Account, to: Account, amount: bigint): void {
    assertAmount(amount);
    const balance = this.balanceOf(from);
    if (amount > balance) {
      throw new InsufficientBalanceError(from, amount, balance);
    }
    this.setBalance(from, balance - amount);
    this.setBalance(to, this.balanceOf(to) + amount);
  }

  approve(owner: Account, spender: Account, amount: bigint): void {
    assertAmount(amount);
    this.setAllowance(owner, spender, amount);
  }

  decreaseAllowance(owner: Account, spender: Account, amount: bigint): void {
    assertAmount(amount);
    const current = this.allowance(owner, spender);
    // MAX_ALLOWANCE = unlimited (skip deduction)
    if (current === MAX_ALLOWANCE) return;
    if (amount > current) {
      throw new InsufficientAllowanceError(owner, spender, amount, current);
    }
    this.setAllowance(owner, spender, current - amount);
  }

  // -----------------------------------------------------------------------
  // Rollback
  // -----------------------------------------------------------------------

  checkpoint(): LedgerCheckpoint {
    const mark = this.journal.length;
    this.openCheckpoints++;
    let settled = false;

    const settle = (undo: boolean) => {
      if (settled) return;
      settled = true;
      if (undo) {
        while (this.journal.length > mark) this.journal.pop()?.();
      }
      this.openCheckpoints--;
      if (this.openCheckpoints === 0) this.journal = [];
    };

    return {
      restore: () => settle(true),
      release: () => settle(false),
    };
  }

  // -----------------------------------------------------------------------
  // Journaled writes
  // -----------------------------------------------------------------------

  private record(undo: () => void): void {
    if (this.openCheckpoints > 0) this.journal.push(undo);
  }

  private setBalance(account: Account, value: bigint): void {
    const previous = this.balances.get(account);
    this.record(() => {
      if (previous === undefined) this.balances.delete(account);
      else this.balances.set(account, previous);
    });
    this.balances.set(account, value);
  }

  private setSupply(value: bigint): void {
    const previous = this.supply;
    this.record(() => {
      this.supply = previous;
    });
    this.supply = value;
  }

  private setAllowance(owner: Account, spender: Account, value: bigint): void {
    let spenders = this.allowances.get(owner);
    if (!spenders) {
      spenders = new Map<Account, bigint>();
      this.allowances.set(owner, spenders);
    }
    const target = spenders;
    const previous = target.get(spender);
    this.record(() => {
      if (previous === undefined) target.delete(spender);
      else target.set(spender, previous);
    });
    target.set(spender, value);
  }
}
