export { PrimitiveActions } from "./actions";
export type { ActionCollaborators, ActionSettings } from "./actions";
export { computeBorrowAmount } from "./borrow-sizing";
export type { BorrowSizingInput } from "./borrow-sizing";
export {
  assertInitializable,
  assertInitialized,
  ComparisonContext,
  healthFactorBand,
} from "./comparator";
export type { DepositPolicy, HealthFactorBand, HealthFactorPolicy, UnwindOutcome } from "./comparator";
export { DEFAULT_VAULT_CONFIG, loadVaultConfig, validateVaultConfig } from "./config";
export type { VaultConfig } from "./config";
export { errorMessage, isVaultError, VaultError } from "./errors";
export type { ErrorCategory, VaultErrorCode } from "./errors";
export { computeFeeAccrual, FeeAccrualEngine } from "./fees";
export type { FeeAccrual } from "./fees";
export * from "./math";
export { register } from "./metrics";
export { CappedRateProvider, computeMaxRate, systemClock } from "./rate-cap";
export type { RateCapParams } from "./rate-cap";
export { SessionLedger } from "./session-ledger";
export type { SessionAsset } from "./session-ledger";
export { ShareLedger } from "./share-ledger";
export {
  assetsToShares,
  depositShares,
  exchangeRate,
  navOf,
  sharesToAssets,
} from "./share-math";
export { SnapshotReader } from "./snapshot-reader";
export * from "./types";
export { LoopVault } from "./vault";
