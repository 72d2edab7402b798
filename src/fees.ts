/**
 * Loop Vault - Fee Accrual
 *
 * High-water-mark performance fee. Only exchange-rate growth above the
 * all-time high is charged, and the fee is paid by minting dilutive shares
 * to the fee recipient.
 *
 *   ownership = (rate - ath) · feeRate / rate
 *   feeShares = supply · ownership / (1 - ownership)
 */

import { createModuleLogger } from "./logger";
import { max, mulDiv, Rounding, WAD } from "./math";
import { exchangeRate } from "./share-math";
import type { ShareLedger } from "./share-ledger";
import type { FeeState } from "./types";

const logger = createModuleLogger("FEES");

export interface FeeAccrual {
  /** Exchange rate before fee shares (WAD) */
  rate: bigint;
  feeShares: bigint;
  /** High-water mark after minting */
  allTimeHigh: bigint;
}

export function computeFeeAccrual(nav: bigint, totalShares: bigint, fee: FeeState): FeeAccrual {
  const rate = exchangeRate(nav, totalShares);
  if (rate <= fee.allTimeHigh || fee.feeRate === 0n) {
    return { rate, feeShares: 0n, allTimeHigh: fee.allTimeHigh };
  }
  const ownership = mulDiv(rate - fee.allTimeHigh, fee.feeRate, rate, Rounding.Floor);
  const feeShares = mulDiv(totalShares, ownership, WAD - ownership, Rounding.Floor);
  const rateAfter = exchangeRate(nav, totalShares + feeShares);
  return { rate, feeShares, allTimeHigh: max(fee.allTimeHigh, rateAfter) };
}

export class FeeAccrualEngine {
  private state: FeeState;

  constructor(initial: FeeState) {
    this.state = { ...initial };
  }

  get feeState(): Readonly<FeeState> {
    return { ...this.state };
  }

  /** Fee shares that accrual would mint right now. */
  preview(nav: bigint, totalShares: bigint): FeeAccrual {
    return computeFeeAccrual(nav, totalShares, this.state);
  }

  /**
   * Mint outstanding fee shares and raise the high-water mark.
   * `totalShares` must be the minted supply, without pending fee shares.
   */
  accrue(nav: bigint, totalShares: bigint, shares: ShareLedger): bigint {
    const accrual = computeFeeAccrual(nav, totalShares, this.state);
    if (accrual.feeShares > 0n) {
      shares.mint(this.state.recipient, accrual.feeShares);
      logger.info(
        `minted ${accrual.feeShares} fee shares to ${this.state.recipient} (rate ${accrual.rate}, ath ${this.state.allTimeHigh} → ${accrual.allTimeHigh})`
      );
    }
    this.state.allTimeHigh = accrual.allTimeHigh;
    return accrual.feeShares;
  }

  save(): FeeState {
    return { ...this.state };
  }

  restore(state: FeeState): void {
    this.state = { ...state };
  }
}
