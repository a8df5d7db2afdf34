export { PrincipalToken, type PrincipalTokenOptions } from "./principal-token";
export {
  InMemoryLedger,
  MAX_ALLOWANCE,
  type FungibleLedger,
  type LedgerCheckpoint,
} from "./ledger";
export { ReserveAssetTransfer, type AssetTransfer } from "./asset";
export { ManualClock, SystemClock, type Clock } from "./clock";
export {
  BPS_DENOMINATOR,
  FeeConversion,
  IdentityConversion,
  mulDiv,
  type ConversionStrategy,
  type Rounding,
} from "./conversion";
export {
  RedeemLog,
  toClarityValue,
  toPrintEvent,
  type ListenerErrorSink,
  type RedeemLogOptions,
} from "./events";
export * from "./errors";
