/**
 * Loop Vault - Snapshot Comparator
 *
 * Accept/reject rules evaluated on a (before, after) pair of snapshots.
 * Each rule throws a VaultError naming the violated condition.
 */

import { VaultError } from "./errors";
import { applyBps, BPS, checkedSub, min, mulDiv, Rounding } from "./math";
import { navOf } from "./share-math";
import type { PositionSnapshot } from "./types";

export interface HealthFactorPolicy {
  targetHealthFactor: bigint;
  hfLowerToleranceBps: bigint;
  hfUpperToleranceBps: bigint;
}

export interface DepositPolicy extends HealthFactorPolicy {
  minDepositValue: bigint;
}

export interface HealthFactorBand {
  lower: bigint;
  upper: bigint;
}

/** [target·(1 - ε_lo), target·(1 + ε_hi)] */
export function healthFactorBand(policy: HealthFactorPolicy): HealthFactorBand {
  return {
    lower: applyBps(policy.targetHealthFactor, BPS - policy.hfLowerToleranceBps, Rounding.Floor),
    upper: applyBps(policy.targetHealthFactor, BPS + policy.hfUpperToleranceBps, Rounding.Floor),
  };
}

export interface UnwindOutcome {
  proceeds: bigint;
  minProceeds: bigint;
}

export class ComparisonContext {
  constructor(
    readonly before: PositionSnapshot,
    readonly after: PositionSnapshot,
    /** Shares burned by a withdraw; absent for other operations */
    readonly shares?: bigint
  ) {}

  get navBefore(): bigint {
    return navOf(this.before);
  }

  get navAfter(): bigint {
    return navOf(this.after);
  }

  /** Signed: negative when the operation destroyed value. */
  get navDelta(): bigint {
    return this.navAfter - this.navBefore;
  }

  /** debt0 - ceil(debt0 · s / T) */
  expectedDebtAfterWithdraw(): bigint {
    const s = this.requireShares();
    const owed = mulDiv(this.before.debt, s, this.before.totalSupply, Rounding.Ceil);
    return checkedSub(this.before.debt, owed, "expected debt");
  }

  /** collateral0 - floor(collateral0 · s / T) */
  expectedCollateralAfterWithdraw(): bigint {
    const s = this.requireShares();
    const released = mulDiv(this.before.collateral, s, this.before.totalSupply, Rounding.Floor);
    return checkedSub(this.before.collateral, released, "expected collateral");
  }

  /** The reference rate must not move while a session is open. */
  assertRateUnchanged(): void {
    if (this.before.referenceRate !== this.after.referenceRate) {
      throw new VaultError(
        "RateChangedDuringSession",
        `reference rate moved from ${this.before.referenceRate} to ${this.after.referenceRate}`
      );
    }
  }

  /**
   * Deposits must move HF toward target and land inside the tolerance band,
   * and must create at least `minDepositValue` of NAV.
   */
  assertDeposit(policy: DepositPolicy): void {
    const { lower, upper } = healthFactorBand(policy);
    const hf0 = this.before.healthFactor;
    const hf1 = this.after.healthFactor;

    if (hf0 < policy.targetHealthFactor) {
      if (hf1 < hf0 || hf1 > upper) {
        throw new VaultError(
          "HealthFactorOutOfRange",
          `hf ${hf0} → ${hf1} must not fall and must stay ≤ ${upper}`
        );
      }
    } else if (hf1 < lower || hf1 > upper) {
      throw new VaultError(
        "HealthFactorOutOfRange",
        `hf ${hf1} outside [${lower}, ${upper}]`
      );
    }

    const delta = this.navDelta;
    if (delta < policy.minDepositValue) {
      throw new VaultError(
        "NavIncreaseBelowMin",
        `nav delta ${delta} below minimum ${policy.minDepositValue}`
      );
    }
  }

  /** Donations must add value and may not push HF below the band or hf0. */
  assertDonation(policy: HealthFactorPolicy): void {
    const delta = this.navDelta;
    if (delta <= 0n) {
      throw new VaultError("NavIncreaseBelowMin", `donation nav delta ${delta} must be > 0`);
    }
    const floor = min(this.before.healthFactor, healthFactorBand(policy).lower);
    if (this.after.healthFactor < floor) {
      throw new VaultError(
        "HealthFactorOutOfRange",
        `donation dropped hf to ${this.after.healthFactor} (floor ${floor})`
      );
    }
  }

  /**
   * Debt and collateral must shrink by exactly the withdrawn share of the
   * pre-burn supply, allowing one unit of market rounding in the vault's
   * favor: less debt left, more collateral left.
   */
  assertWithdraw(): void {
    const expectedDebt = this.expectedDebtAfterWithdraw();
    const debt = this.after.debt;
    if (debt > expectedDebt || expectedDebt - debt > 1n) {
      throw new VaultError(
        "InvalidDebtAfterWithdraw",
        `debt ${debt}, expected ${expectedDebt}`,
        { actual: debt.toString(), expected: expectedDebt.toString() }
      );
    }

    const expectedCollateral = this.expectedCollateralAfterWithdraw();
    const collateral = this.after.collateral;
    if (collateral < expectedCollateral || collateral - expectedCollateral > 1n) {
      throw new VaultError(
        "InvalidCollateralAfterWithdraw",
        `collateral ${collateral}, expected ${expectedCollateral}`,
        { actual: collateral.toString(), expected: expectedCollateral.toString() }
      );
    }
  }

  /**
   * Proceeds are the debt actually repaid. A reported amount may not exceed
   * them (one unit of market rounding aside), and the result must cover the
   * redemption value less slippage.
   */
  assertUnwind(
    collateralSold: bigint,
    redemptionValue: bigint,
    slippageBps: bigint,
    reportedProceeds?: bigint
  ): UnwindOutcome {
    const expectedCollateral = checkedSub(this.before.collateral, collateralSold, "collateral");
    const collateral = this.after.collateral;
    if (collateral < expectedCollateral || collateral - expectedCollateral > 1n) {
      throw new VaultError(
        "InvalidCollateralAfterUnwind",
        `collateral ${collateral}, expected ${expectedCollateral}`
      );
    }

    const realized = this.before.debt > this.after.debt ? this.before.debt - this.after.debt : 0n;
    if (reportedProceeds !== undefined && reportedProceeds > realized + 1n) {
      throw new VaultError(
        "InsufficientProceeds",
        `reported proceeds ${reportedProceeds} exceed debt repaid ${realized}`
      );
    }
    const proceeds = reportedProceeds ?? realized;
    const minProceeds = applyBps(redemptionValue, BPS - slippageBps, Rounding.Ceil);
    if (proceeds < minProceeds) {
      throw new VaultError(
        "InsufficientProceeds",
        `proceeds ${proceeds} below minimum ${minProceeds}`,
        { proceeds: proceeds.toString(), minProceeds: minProceeds.toString() }
      );
    }
    return { proceeds, minProceeds };
  }

  private requireShares(): bigint {
    if (this.shares === undefined) {
      throw new VaultError("ZeroAmount", "withdraw comparison needs a share amount");
    }
    return this.shares;
  }
}

/** Initialize runs only on an empty vault. */
export function assertInitializable(before: PositionSnapshot): void {
  if (before.totalSupply !== 0n) {
    throw new VaultError("AlreadyInitialized", `supply is ${before.totalSupply}`);
  }
  if (before.collateral !== 0n) {
    throw new VaultError("CollateralNonZero", `collateral is ${before.collateral}`);
  }
}

export function assertInitialized(after: PositionSnapshot, minValue: bigint): void {
  if (after.debt !== 0n) {
    throw new VaultError("DebtAfterInitNonZero", `debt is ${after.debt}`);
  }
  const nav = navOf(after);
  if (nav < minValue) {
    throw new VaultError("NavIncreaseBelowMin", `initial nav ${nav} below minimum ${minValue}`);
  }
}
