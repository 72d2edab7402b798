/**
 * Loop Vault - Borrow Sizing
 *
 * How much a deposit callback should borrow (and re-stake) next so the
 * position lands on the target health factor. Re-supplying a borrow `b`
 * moves HF from hf·D/D to (hf·D + b·lt)/(D + b); solving for target gives
 *
 *   b = (hf - target) · D / (target - lt)
 *
 * capped by the market's borrow headroom less a small buffer.
 */

import { applyBps, BPS, min, mulDiv, Rounding } from "./math";

export interface BorrowSizingInput {
  /** Current debt, market base currency */
  debt: bigint;
  /** Borrow headroom from LTV, market base currency */
  availableBorrow: bigint;
  /** WAD */
  healthFactor: bigint;
  /** WAD ratio */
  liquidationThreshold: bigint;
  /** WAD */
  targetHealthFactor: bigint;
  /** Haircut on the headroom, bps */
  bufferBps: bigint;
}

export function computeBorrowAmount(input: BorrowSizingInput): bigint {
  const { debt, availableBorrow, healthFactor, liquidationThreshold, targetHealthFactor } = input;
  if (healthFactor < targetHealthFactor || availableBorrow === 0n) return 0n;

  const capped = applyBps(availableBorrow, BPS - input.bufferBps, Rounding.Floor);
  if (debt === 0n) return capped;

  // No finite borrow reaches a target at or below the liquidation threshold.
  if (targetHealthFactor <= liquidationThreshold) return 0n;

  const targetAmount = mulDiv(
    healthFactor - targetHealthFactor,
    debt,
    targetHealthFactor - liquidationThreshold,
    Rounding.Floor
  );
  return min(capped, targetAmount);
}
