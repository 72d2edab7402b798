/**
 * Loop Vault - Shared Types
 *
 * Data model of the engine and the narrow interfaces of its collaborators.
 * All amounts are integer base units; rates and health factors are WAD.
 */

import type { PrimitiveActions } from "./actions";

export type Address = string;

// ============================================================
//                     POSITION DATA
// ============================================================

/** Immutable point-in-time view of the vault's lending position. */
export interface PositionSnapshot {
  /** Collateral held in the market, native collateral-asset units */
  readonly collateral: bigint;
  /** Collateral valued in the borrowed asset at `referenceRate` */
  readonly collateralValue: bigint;
  /** Debt owed, borrowed-asset units */
  readonly debt: bigint;
  /** Loan-to-value as a WAD ratio */
  readonly ltv: bigint;
  /** Liquidation threshold as a WAD ratio */
  readonly liquidationThreshold: bigint;
  /** WAD; MAX_UINT256 when there is no debt */
  readonly healthFactor: bigint;
  /** Remaining borrow headroom, market base currency */
  readonly availableBorrow: bigint;
  /** Outstanding shares including fee shares not yet minted */
  readonly totalSupply: bigint;
  readonly pendingFeeShares: bigint;
  /** Collateral → borrowed-asset rate (WAD) used to value collateral */
  readonly referenceRate: bigint;
  readonly collateralScaled: bigint;
  readonly collateralIndex: bigint;
  readonly debtScaled: bigint;
  readonly debtIndex: bigint;
}

/** Single mutable session record, alive for one top-level operation. */
export interface SessionState {
  locked: boolean;
  caller: Address | null;
  borrowBalance: bigint;
  collateralBalance: bigint;
}

/**
 * Handle issued when a session opens. Primitive actions are bound to it and
 * only the handle of the open session is accepted; an equal-looking object
 * is not.
 */
export interface SessionToken {
  readonly caller: Address;
  readonly serial: number;
}

export interface FeeState {
  /** WAD fraction of new rate growth taken as fee */
  feeRate: bigint;
  /** Highest exchange rate (WAD) fees were charged up to */
  allTimeHigh: bigint;
  recipient: Address;
}

export type OperationKind = "initialize" | "deposit" | "withdraw" | "unwind" | "donate";

// ============================================================
//                     COLLABORATORS
// ============================================================

export interface MarketPositionData {
  /** Market base currency */
  collateralValue: bigint;
  debtValue: bigint;
  availableBorrow: bigint;
  /** Basis points */
  liquidationThreshold: bigint;
  ltv: bigint;
  /** WAD */
  healthFactor: bigint;
}

export interface ScaledBalances {
  collateralScaled: bigint;
  /** RAY */
  collateralIndex: bigint;
  debtScaled: bigint;
  /** RAY */
  debtIndex: bigint;
}

/** Lending market, bound to the vault as the acting account. */
export interface LendingMarket {
  supply(asset: Address, amount: bigint): Promise<void>;
  withdraw(asset: Address, amount: bigint): Promise<bigint>;
  borrow(asset: Address, amount: bigint): Promise<void>;
  repay(asset: Address, amount: bigint): Promise<bigint>;
  positionData(owner: Address): Promise<MarketPositionData>;
  scaledBalances(owner: Address): Promise<ScaledBalances>;
}

/** Liquid-staking token, bound to the vault as the acting account. */
export interface StakingToken {
  stake(amount: bigint): Promise<bigint>;
  convertToAssets(shares: bigint): Promise<bigint>;
  convertToShares(assets: bigint): Promise<bigint>;
  /** Assets per share, WAD */
  currentRate(): Promise<bigint>;
}

export interface RateCapInputs {
  snapshotRate: bigint;
  snapshotTimestamp: bigint;
  maxYearlyGrowthBps: bigint;
  now: bigint;
}

/**
 * Reference-rate source. `at` pins the evaluation time (unix seconds) so
 * every read within one session sees the same rate; omitted, it is now.
 */
export interface RateProvider {
  currentRate(at?: bigint): Promise<bigint>;
  isCapped(at?: bigint): Promise<boolean>;
  rateInputs(at?: bigint): Promise<RateCapInputs>;
}

/** Unix seconds. */
export type Clock = () => bigint;

/** ERC20 transfers made by the vault. */
export interface TokenTransfers {
  transfer(asset: Address, to: Address, amount: bigint): Promise<void>;
  transferFrom(asset: Address, from: Address, to: Address, amount: bigint): Promise<void>;
}

/** Host snapshot/revert facility backing all-or-nothing operations. */
export interface StateJournal {
  checkpoint(): Promise<string>;
  revert(id: string): Promise<void>;
  /** Drop a checkpoint once its operation has committed. */
  discard(id: string): Promise<void>;
}

export interface VaultCollaborators {
  market: LendingMarket;
  staking: StakingToken;
  rateProvider: RateProvider;
  tokens: TokenTransfers;
  journal: StateJournal;
  /** Session timestamps; defaults to the system clock */
  clock?: Clock;
}

// ============================================================
//                     CALLBACK CONTRACT
// ============================================================

export interface SessionContext<TData = unknown> {
  readonly kind: OperationKind;
  readonly caller: Address;
  readonly before: PositionSnapshot;
  readonly actions: PrimitiveActions;
  readonly data: TData;
}

/**
 * Caller-supplied logic run inside an open session. It may invoke any
 * sequence of primitive actions; throwing aborts the whole operation.
 * Unwind callbacks may return the proceeds they realized.
 */
export interface SessionCallback<TData = unknown> {
  run(ctx: SessionContext<TData>): Promise<bigint | void>;
}

// ============================================================
//                     OPERATION RECORDS
// ============================================================

interface RecordBase {
  caller: Address;
  navBefore: bigint;
  navAfter: bigint;
  collateral: bigint;
  debt: bigint;
  totalSupply: bigint;
  healthFactor: bigint;
}

export interface InitializeRecord extends RecordBase {
  kind: "initialize";
  receiver: Address;
  sharesMinted: bigint;
}

export interface DepositRecord extends RecordBase {
  kind: "deposit";
  receiver: Address;
  sharesMinted: bigint;
  supplyBefore: bigint;
  feeSharesMinted: bigint;
}

export interface WithdrawRecord extends RecordBase {
  kind: "withdraw";
  sharesBurned: bigint;
  supplyBefore: bigint;
  collateralBefore: bigint;
  debtBefore: bigint;
  feeSharesMinted: bigint;
}

export interface UnwindRecord extends RecordBase {
  kind: "unwind";
  collateralSold: bigint;
  proceeds: bigint;
  minProceeds: bigint;
}

export interface DonateRecord extends RecordBase {
  kind: "donate";
}

export type OperationRecord =
  | InitializeRecord
  | DepositRecord
  | WithdrawRecord
  | UnwindRecord
  | DonateRecord;

export type RecordListener = (record: OperationRecord) => void;
