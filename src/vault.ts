/**
 * Loop Vault - Operation Orchestrator
 *
 * Top-level protocols over a leveraged staking loop position:
 *   initialize, deposit, withdraw, unwind, donate
 *
 * Each one:
 *   1. Opens a session for the caller, pins its timestamp and checkpoints
 *      host state
 *   2. Reads the before-snapshot (accruing fees where applicable)
 *   3. Runs the caller's callback, the only place primitive actions happen
 *   4. Reads the after-snapshot and applies the operation's predicate
 *   5. Updates share supply and closes the session
 *
 * Any failure reverts the checkpoint and restores share/fee state, so a
 * rejected operation leaves no trace.
 */

import { ethers } from "ethers";
import { ActionSettings, PrimitiveActions } from "./actions";
import {
  assertInitializable,
  assertInitialized,
  ComparisonContext,
} from "./comparator";
import { validateVaultConfig, VaultConfig } from "./config";
import { errorMessage, isVaultError, VaultError } from "./errors";
import { FeeAccrualEngine } from "./fees";
import { createModuleLogger } from "./logger";
import { WAD } from "./math";
import {
  healthFactorGauge,
  navGauge,
  operationRejectionsTotal,
  operationsTotal,
} from "./metrics";
import { systemClock } from "./rate-cap";
import { SessionLedger } from "./session-ledger";
import { ShareLedger } from "./share-ledger";
import {
  assetsToShares,
  depositShares,
  exchangeRate,
  navOf,
  sharesToAssets,
} from "./share-math";
import { SnapshotReader } from "./snapshot-reader";
import type {
  Address,
  Clock,
  DepositRecord,
  DonateRecord,
  FeeState,
  InitializeRecord,
  OperationKind,
  OperationRecord,
  PositionSnapshot,
  RecordListener,
  SessionCallback,
  UnwindRecord,
  VaultCollaborators,
  WithdrawRecord,
} from "./types";

const logger = createModuleLogger("VAULT");

function fmt(wad: bigint): string {
  return ethers.formatUnits(wad, 18);
}

/** What an operation body gets for the session it runs in. */
interface OpenSession {
  caller: Address;
  actions: PrimitiveActions;
  /** Reference-rate time of every read in this session */
  at: bigint;
}

export class LoopVault {
  private readonly ledger = new SessionLedger();
  private readonly shares = new ShareLedger();
  private readonly fees: FeeAccrualEngine;
  private readonly reader: SnapshotReader;
  private readonly listeners = new Set<RecordListener>();
  private readonly unwindOperators: Set<Address>;
  private readonly actionSettings: ActionSettings;
  private readonly clock: Clock;

  constructor(
    private readonly config: VaultConfig,
    private readonly deps: VaultCollaborators
  ) {
    validateVaultConfig(config);
    this.fees = new FeeAccrualEngine({
      feeRate: config.feeRate,
      allTimeHigh: WAD,
      recipient: ethers.getAddress(config.feeRecipient),
    });
    this.reader = new SnapshotReader(
      deps.market,
      deps.rateProvider,
      config.vaultAddress,
      this.shares,
      this.fees
    );
    this.actionSettings = {
      vaultAddress: config.vaultAddress,
      borrowAsset: config.borrowAsset,
      collateralAsset: config.collateralAsset,
      minStakeAmount: config.minStakeAmount,
    };
    this.clock = deps.clock ?? systemClock;
    this.unwindOperators = new Set(config.unwindOperators.map((op) => ethers.getAddress(op)));
  }

  // ----------------------------------------------------------
  //  STATE ALWAYS READABLE
  // ----------------------------------------------------------

  get isLocked(): boolean {
    return this.ledger.isLocked;
  }

  get feeState(): Readonly<FeeState> {
    return this.fees.feeState;
  }

  balanceOf(holder: Address): bigint {
    return this.shares.balanceOf(holder);
  }

  /** Subscribe to committed operation records. Returns an unsubscribe function. */
  onRecord(listener: RecordListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // ----------------------------------------------------------
  //  CONSISTENT-VIEW READS (blocked while a session is open)
  // ----------------------------------------------------------

  async snapshot(): Promise<PositionSnapshot> {
    this.requireUnlocked("snapshot");
    return this.reader.read(this.clock());
  }

  /** NAV in borrowed-asset units. */
  async totalAssets(): Promise<bigint> {
    return navOf(await this.snapshot());
  }

  /** Supply including fee shares not yet minted. */
  async totalSupply(): Promise<bigint> {
    return (await this.snapshot()).totalSupply;
  }

  async exchangeRate(): Promise<bigint> {
    const snap = await this.snapshot();
    return exchangeRate(navOf(snap), snap.totalSupply);
  }

  async convertToShares(assets: bigint): Promise<bigint> {
    const snap = await this.snapshot();
    return assetsToShares(assets, navOf(snap), snap.totalSupply);
  }

  async convertToAssets(shares: bigint): Promise<bigint> {
    const snap = await this.snapshot();
    return sharesToAssets(shares, navOf(snap), snap.totalSupply);
  }

  async previewFeeShares(): Promise<bigint> {
    return (await this.snapshot()).pendingFeeShares;
  }

  // ----------------------------------------------------------
  //  OPERATIONS
  // ----------------------------------------------------------

  /** Seed an empty vault. Shares are minted 1:1 with the resulting NAV. */
  async initialize<T>(
    caller: Address,
    receiver: Address,
    callback: SessionCallback<T>,
    data: T
  ): Promise<InitializeRecord> {
    return this.atomically("initialize", caller, async ({ caller: who, actions, at }) => {
      const before = await this.reader.read(at);
      assertInitializable(before);
      this.fees.accrue(navOf(before), this.shares.totalSupply, this.shares);

      await callback.run({ kind: "initialize", caller: who, before, actions, data });

      const after = await this.reader.read(at);
      const cmp = new ComparisonContext(before, after);
      cmp.assertRateUnchanged();
      assertInitialized(after, this.config.minDepositValue);

      const navAfter = cmp.navAfter;
      const minted = assetsToShares(navAfter, 0n, 0n);
      this.shares.mint(receiver, minted);

      return {
        kind: "initialize",
        caller: who,
        receiver: ethers.getAddress(receiver),
        sharesMinted: minted,
        navBefore: cmp.navBefore,
        navAfter,
        collateral: after.collateral,
        debt: after.debt,
        totalSupply: this.shares.totalSupply,
        healthFactor: after.healthFactor,
      };
    });
  }

  /** Grow the position; shares are minted in proportion to NAV created. */
  async deposit<T>(
    caller: Address,
    receiver: Address,
    callback: SessionCallback<T>,
    data: T
  ): Promise<DepositRecord> {
    return this.atomically("deposit", caller, async ({ caller: who, actions, at }) => {
      const before = await this.reader.read(at);
      if (before.totalSupply === 0n) {
        throw new VaultError("NotInitialized", "deposit before initialize");
      }
      const navBefore = navOf(before);
      const feeShares = this.fees.accrue(navBefore, this.shares.totalSupply, this.shares);
      const supplyBefore = this.shares.totalSupply;

      await callback.run({ kind: "deposit", caller: who, before, actions, data });

      const after = await this.reader.read(at);
      const cmp = new ComparisonContext(before, after);
      cmp.assertRateUnchanged();
      cmp.assertDeposit(this.config);

      const navAfter = cmp.navAfter;
      const minted = depositShares(supplyBefore, navAfter - navBefore, navBefore);
      this.shares.mint(receiver, minted);

      return {
        kind: "deposit",
        caller: who,
        receiver: ethers.getAddress(receiver),
        sharesMinted: minted,
        supplyBefore,
        feeSharesMinted: feeShares,
        navBefore,
        navAfter,
        collateral: after.collateral,
        debt: after.debt,
        totalSupply: this.shares.totalSupply,
        healthFactor: after.healthFactor,
      };
    });
  }

  /**
   * Burn `shares` of the caller, then let the callback shrink debt and
   * collateral by exactly that fraction of the pre-burn supply.
   */
  async withdraw<T>(
    caller: Address,
    shares: bigint,
    callback: SessionCallback<T>,
    data: T
  ): Promise<WithdrawRecord> {
    return this.atomically("withdraw", caller, async ({ caller: who, actions, at }) => {
      if (shares <= 0n) {
        throw new VaultError("ZeroAmount", "withdraw shares must be > 0");
      }
      const before = await this.reader.read(at);
      if (before.totalSupply === 0n) {
        throw new VaultError("NotInitialized", "withdraw before initialize");
      }
      const navBefore = navOf(before);
      const feeShares = this.fees.accrue(navBefore, this.shares.totalSupply, this.shares);
      const supplyBefore = this.shares.totalSupply;
      this.shares.burn(who, shares);

      await callback.run({ kind: "withdraw", caller: who, before, actions, data });

      const after = await this.reader.read(at);
      const cmp = new ComparisonContext(before, after, shares);
      cmp.assertRateUnchanged();
      cmp.assertWithdraw();

      return {
        kind: "withdraw",
        caller: who,
        sharesBurned: shares,
        supplyBefore,
        collateralBefore: before.collateral,
        debtBefore: before.debt,
        feeSharesMinted: feeShares,
        navBefore,
        navAfter: cmp.navAfter,
        collateral: after.collateral,
        debt: after.debt,
        totalSupply: this.shares.totalSupply,
        healthFactor: after.healthFactor,
      };
    });
  }

  /**
   * Sell a slice of collateral through an operator. The vault releases the
   * slice to the operator, whose callback must repay at least its
   * redemption value less slippage.
   */
  async unwind<T>(
    caller: Address,
    collateralAmount: bigint,
    callback: SessionCallback<T>,
    data: T
  ): Promise<UnwindRecord> {
    return this.atomically("unwind", caller, async ({ caller: who, actions, at }) => {
      if (!this.unwindOperators.has(who)) {
        throw new VaultError("NotPermitted", `${who} is not an unwind operator`);
      }
      if (collateralAmount <= 0n) {
        throw new VaultError("ZeroAmount", "unwind amount must be > 0");
      }
      const before = await this.reader.read(at);
      if (collateralAmount > before.collateral) {
        throw new VaultError(
          "AmountExceedsCollateral",
          `unwind ${collateralAmount} exceeds collateral ${before.collateral}`
        );
      }
      const redemptionValue = await this.deps.staking.convertToAssets(collateralAmount);

      const released = await actions.withdrawCollateral(collateralAmount);
      await actions.send(this.config.collateralAsset, who, released);

      const returned = await callback.run({
        kind: "unwind",
        caller: who,
        before,
        actions,
        data,
      });

      const after = await this.reader.read(at);
      const cmp = new ComparisonContext(before, after);
      cmp.assertRateUnchanged();
      const { proceeds, minProceeds } = cmp.assertUnwind(
        collateralAmount,
        redemptionValue,
        this.config.unwindSlippageBps,
        typeof returned === "bigint" ? returned : undefined
      );

      return {
        kind: "unwind",
        caller: who,
        collateralSold: collateralAmount,
        proceeds,
        minProceeds,
        navBefore: cmp.navBefore,
        navAfter: cmp.navAfter,
        collateral: after.collateral,
        debt: after.debt,
        totalSupply: this.shares.totalSupply,
        healthFactor: after.healthFactor,
      };
    });
  }

  /** Add value to the position without minting shares. */
  async donate<T>(caller: Address, callback: SessionCallback<T>, data: T): Promise<DonateRecord> {
    return this.atomically("donate", caller, async ({ caller: who, actions, at }) => {
      const before = await this.reader.read(at);
      if (before.totalSupply === 0n) {
        throw new VaultError("NotInitialized", "donate before initialize");
      }

      await callback.run({ kind: "donate", caller: who, before, actions, data });

      const after = await this.reader.read(at);
      const cmp = new ComparisonContext(before, after);
      cmp.assertRateUnchanged();
      cmp.assertDonation(this.config);

      return {
        kind: "donate",
        caller: who,
        navBefore: cmp.navBefore,
        navAfter: cmp.navAfter,
        collateral: after.collateral,
        debt: after.debt,
        totalSupply: this.shares.totalSupply,
        healthFactor: after.healthFactor,
      };
    });
  }

  // ----------------------------------------------------------
  //  INTERNALS
  // ----------------------------------------------------------

  private requireUnlocked(what: string): void {
    if (this.ledger.isLocked) {
      throw new VaultError("SessionOpen", `${what} is unavailable while a session is open`);
    }
  }

  /**
   * Run `body` as one all-or-nothing operation. The session is released
   * only after a successful body; on failure host state is reverted and
   * share/fee state restored before the lock is dropped. The body's
   * actions are bound to this session's token alone.
   */
  private async atomically<R extends OperationRecord>(
    kind: OperationKind,
    caller: Address,
    body: (session: OpenSession) => Promise<R>
  ): Promise<R> {
    let checkpoint: string;
    let session: OpenSession;
    let acquired = false;
    try {
      const token = this.ledger.acquire(caller);
      acquired = true;
      session = {
        caller: token.caller,
        actions: new PrimitiveActions(this.ledger, token, this.deps, this.actionSettings),
        at: this.clock(),
      };
      checkpoint = await this.deps.journal.checkpoint();
    } catch (err) {
      if (acquired) this.ledger.abort();
      this.recordRejection(kind, err);
      throw err;
    }
    const savedShares = this.shares.save();
    const savedFees = this.fees.save();

    let record: R;
    try {
      record = await body(session);
      this.ledger.release();
    } catch (err) {
      try {
        await this.deps.journal.revert(checkpoint);
      } catch (revertErr) {
        logger.error(`${kind} rollback failed: ${errorMessage(revertErr)}`);
        this.ledger.abort();
        throw new AggregateError([err, revertErr], `${kind} failed and could not be rolled back`);
      }
      this.shares.restore(savedShares);
      this.fees.restore(savedFees);
      this.ledger.abort();
      this.recordRejection(kind, err);
      throw err;
    }

    try {
      await this.deps.journal.discard(checkpoint);
    } catch (err) {
      // Already committed; only the checkpoint is left behind.
      logger.warn(`${kind} committed but checkpoint ${checkpoint} was not discarded: ${errorMessage(err)}`);
    }
    this.committed(session.caller, record);
    return record;
  }

  private committed(who: Address, record: OperationRecord): void {
    operationsTotal.inc({ kind: record.kind, status: "committed" });
    healthFactorGauge.set(record.debt === 0n ? Infinity : Number(fmt(record.healthFactor)));
    navGauge.set(Number(fmt(record.navAfter)));
    logger.info(
      `${record.kind} by ${who}: nav ${fmt(record.navBefore)} → ${fmt(record.navAfter)}, ` +
        `collateral ${fmt(record.collateral)}, debt ${fmt(record.debt)}, supply ${fmt(record.totalSupply)}`
    );
    this.publish(record);
  }

  private recordRejection(kind: OperationKind, err: unknown): void {
    const code = isVaultError(err) ? err.code : "external";
    operationsTotal.inc({ kind, status: "rejected" });
    operationRejectionsTotal.inc({ kind, code });
    logger.warn(`${kind} rejected [${code}]: ${errorMessage(err)}`);
  }

  private publish(record: OperationRecord): void {
    for (const listener of this.listeners) {
      try {
        listener(record);
      } catch (err) {
        logger.error(`record listener failed on ${record.kind}: ${errorMessage(err)}`);
      }
    }
  }
}
