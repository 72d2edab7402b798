/**
 * Loop Vault - Snapshot Reader
 *
 * Builds an immutable PositionSnapshot from the lending market and the
 * rate-cap provider. Collateral is valued at the provider's reference rate,
 * not at the market's own price feed, so the rate can be compared across a
 * session.
 */

import type { FeeAccrualEngine } from "./fees";
import { bpsToWad, rayMul, Rounding, wadMul } from "./math";
import type { ShareLedger } from "./share-ledger";
import type { Address, LendingMarket, PositionSnapshot, RateProvider } from "./types";

export class SnapshotReader {
  constructor(
    private readonly market: LendingMarket,
    private readonly rateProvider: RateProvider,
    private readonly vaultAddress: Address,
    private readonly shares: ShareLedger,
    private readonly fees: FeeAccrualEngine
  ) {}

  /** `at` pins the reference-rate time; every read of one session passes the same value. */
  async read(at?: bigint): Promise<PositionSnapshot> {
    const [data, balances, referenceRate] = await Promise.all([
      this.market.positionData(this.vaultAddress),
      this.market.scaledBalances(this.vaultAddress),
      this.rateProvider.currentRate(at),
    ]);

    const collateral = rayMul(balances.collateralScaled, balances.collateralIndex);
    const debt = rayMul(balances.debtScaled, balances.debtIndex);
    const collateralValue = wadMul(collateral, referenceRate, Rounding.Floor);

    const minted = this.shares.totalSupply;
    // A deficit position has no fee to preview; NAV math on it fails later.
    const pendingFeeShares =
      collateralValue >= debt ? this.fees.preview(collateralValue - debt, minted).feeShares : 0n;

    return Object.freeze({
      collateral,
      collateralValue,
      debt,
      ltv: bpsToWad(data.ltv),
      liquidationThreshold: bpsToWad(data.liquidationThreshold),
      healthFactor: data.healthFactor,
      availableBorrow: data.availableBorrow,
      totalSupply: minted + pendingFeeShares,
      pendingFeeShares,
      referenceRate,
      collateralScaled: balances.collateralScaled,
      collateralIndex: balances.collateralIndex,
      debtScaled: balances.debtScaled,
      debtIndex: balances.debtIndex,
    });
  }
}
