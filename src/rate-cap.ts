/**
 * Loop Vault - Capped Rate Provider
 *
 * Values collateral at the staking token's own exchange rate, capped by a
 * maximum yearly growth from a recorded snapshot. The cap is computed from
 * raw inputs, independently of the lending market's price feed.
 */

import { BPS, min, SECONDS_PER_YEAR } from "./math";
import type { Clock, RateCapInputs, RateProvider, StakingToken } from "./types";

export interface RateCapParams {
  /** Rate (WAD) recorded at `snapshotTimestamp` */
  snapshotRate: bigint;
  /** Unix seconds */
  snapshotTimestamp: bigint;
  /** Max annual growth of the rate, bps */
  maxYearlyGrowthBps: bigint;
}

/** Upper bound the rate may have reached by `now`. */
export function computeMaxRate(params: RateCapParams, now: bigint): bigint {
  if (now <= params.snapshotTimestamp) return params.snapshotRate;
  const elapsed = now - params.snapshotTimestamp;
  const growth =
    (params.snapshotRate * params.maxYearlyGrowthBps * elapsed) / (BPS * SECONDS_PER_YEAR);
  return params.snapshotRate + growth;
}

export const systemClock: Clock = () => BigInt(Math.floor(Date.now() / 1000));

export class CappedRateProvider implements RateProvider {
  constructor(
    private readonly staking: StakingToken,
    private readonly params: RateCapParams,
    private readonly clock: Clock = systemClock
  ) {}

  async currentRate(at: bigint = this.clock()): Promise<bigint> {
    const raw = await this.staking.currentRate();
    return min(raw, computeMaxRate(this.params, at));
  }

  async isCapped(at: bigint = this.clock()): Promise<boolean> {
    const raw = await this.staking.currentRate();
    return raw > computeMaxRate(this.params, at);
  }

  async rateInputs(at: bigint = this.clock()): Promise<RateCapInputs> {
    return { ...this.params, now: at };
  }
}
