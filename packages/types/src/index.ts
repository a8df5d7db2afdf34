export type { Account, PrincipalTokenState, PrincipalPosition } from "./principal";
export type { RedeemRecord, RedeemListener } from "./redeem";
