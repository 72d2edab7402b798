/**
 * Loop Vault - Fixed-Point Math
 *
 * Integer helpers used by every accounting path. Every division takes an
 * explicit rounding direction: debt owed rounds up, collateral released
 * rounds down, shares minted round down.
 */

import { VaultError } from "./errors";

/** 1e18: rates, health factors, fee fractions */
export const WAD = 10n ** 18n;

/** 1e27: lending-market accrual indices */
export const RAY = 10n ** 27n;

/** Basis points denominator */
export const BPS = 10_000n;

/** Seconds per year (365.25 days) */
export const SECONDS_PER_YEAR = 31_557_600n;

/** What a lending market reports as the health factor of a debt-free position */
export const MAX_UINT256 = 2n ** 256n - 1n;

export enum Rounding {
  Floor = "floor",
  Ceil = "ceil",
}

/**
 * (a * b) / d with the requested rounding.
 * Operands are expected to be non-negative.
 */
export function mulDiv(a: bigint, b: bigint, d: bigint, rounding: Rounding): bigint {
  if (d === 0n) {
    throw new VaultError("DivisionByZero", `mulDiv(${a}, ${b}, 0)`);
  }
  const product = a * b;
  const quotient = product / d;
  if (rounding === Rounding.Ceil && product % d !== 0n) {
    return quotient + 1n;
  }
  return quotient;
}

export function wadMul(a: bigint, b: bigint, rounding: Rounding): bigint {
  return mulDiv(a, b, WAD, rounding);
}

export function wadDiv(a: bigint, b: bigint, rounding: Rounding): bigint {
  return mulDiv(a, WAD, b, rounding);
}

/** Half-up ray multiplication, the way scaled balances accrue. */
export function rayMul(a: bigint, b: bigint): bigint {
  return (a * b + RAY / 2n) / RAY;
}

/** Half-up ray division. */
export function rayDiv(a: bigint, b: bigint): bigint {
  if (b === 0n) {
    throw new VaultError("DivisionByZero", `rayDiv(${a}, 0)`);
  }
  return (a * RAY + b / 2n) / b;
}

/** 9500 bps → 0.95e18 */
export function bpsToWad(bps: bigint): bigint {
  return (bps * WAD) / BPS;
}

/** x * bps / 10_000 */
export function applyBps(x: bigint, bps: bigint, rounding: Rounding): bigint {
  return mulDiv(x, bps, BPS, rounding);
}

/** a - b, failing loudly instead of going negative. */
export function checkedSub(a: bigint, b: bigint, what = "value"): bigint {
  if (b > a) {
    throw new VaultError("ArithmeticUnderflow", `${what}: ${a} - ${b} underflows`, {
      minuend: a.toString(),
      subtrahend: b.toString(),
    });
  }
  return a - b;
}

export function min(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}

export function max(a: bigint, b: bigint): bigint {
  return a > b ? a : b;
}

export function absDiff(a: bigint, b: bigint): bigint {
  return a > b ? a - b : b - a;
}
