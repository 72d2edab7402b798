/**
 * Loop Vault - Share Math
 *
 * Proportional share accounting over NAV, the borrowed-asset value of the
 * position net of debt. All conversions round down.
 */

import { checkedSub, mulDiv, Rounding, WAD } from "./math";
import type { PositionSnapshot } from "./types";

/** Collateral value minus debt; a deficit throws ArithmeticUnderflow. */
export function navOf(snapshot: Pick<PositionSnapshot, "collateralValue" | "debt">): bigint {
  return checkedSub(snapshot.collateralValue, snapshot.debt, "nav");
}

/** NAV per share (WAD); 1.0 when either side is zero. */
export function exchangeRate(nav: bigint, totalShares: bigint): bigint {
  if (nav === 0n || totalShares === 0n) return WAD;
  return mulDiv(nav, WAD, totalShares, Rounding.Floor);
}

export function assetsToShares(assets: bigint, nav: bigint, totalShares: bigint): bigint {
  if (nav === 0n || totalShares === 0n) return assets;
  return mulDiv(assets, totalShares, nav, Rounding.Floor);
}

export function sharesToAssets(shares: bigint, nav: bigint, totalShares: bigint): bigint {
  if (nav === 0n || totalShares === 0n) return shares;
  return mulDiv(shares, nav, totalShares, Rounding.Floor);
}

/** Shares owed for a NAV increase: supply · navDelta / navBefore, floored. */
export function depositShares(supplyBefore: bigint, navDelta: bigint, navBefore: bigint): bigint {
  return mulDiv(supplyBefore, navDelta, navBefore, Rounding.Floor);
}
