import type { Account } from "./principal";

/**
 * Emitted once per successful redeem() or withdraw().
 *
 * Append-only; kept for off-engine indexers and never read back by the
 * engine to make a decision.
 */
export interface RedeemRecord {
  from: Account;            // holder whose PT was burned
  to: Account;              // recipient of the underlying asset
  underlyingAmount: bigint; // underlying released
}

export type RedeemListener = (record: RedeemRecord) => void;
