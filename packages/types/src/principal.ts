// Types for the principal-token engine (maturity-gated redemption)

/** Opaque account handle, e.g. a Stacks principal. */
export type Account = string;

/**
 * Global state of a principal token.
 * Derived from the engine's read-only functions.
 */
export interface PrincipalTokenState {
  underlying: string;   // identifier of the underlying asset
  maturity: number;     // clock value at which PT becomes redeemable
  now: number;          // current clock value
  matured: boolean;     // now >= maturity
  totalSupply: bigint;  // outstanding principal units
}

/**
 * An account's position in the principal token.
 */
export interface PrincipalPosition {
  account: Account;
  principalBalance: bigint;  // PT held
  maxRedeem: bigint;         // PT redeemable right now (0 before maturity)
  maxWithdraw: bigint;       // previewWithdraw(maxRedeem)
}
