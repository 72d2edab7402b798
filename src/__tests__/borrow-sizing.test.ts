import { computeBorrowAmount } from "../borrow-sizing";
import { MAX_UINT256, WAD } from "../math";

const base = {
  debt: 10n * WAD,
  availableBorrow: 100n * WAD,
  healthFactor: 1_500_000_000_000_000_000n,
  liquidationThreshold: 950_000_000_000_000_000n,
  targetHealthFactor: 1_300_000_000_000_000_000n,
  bufferBps: 10n,
};

describe("computeBorrowAmount", () => {
  it("solves for the borrow that lands on target", () => {
    // (1.5 - 1.3) · 10 / (1.3 - 0.95)
    expect(computeBorrowAmount(base)).toBe(5_714_285_714_285_714_285n);
  });

  it("is capped by headroom less the buffer", () => {
    expect(computeBorrowAmount({ ...base, availableBorrow: 5n * WAD })).toBe(4_995_000_000_000_000_000n);
  });

  it("borrows the buffered headroom when there is no debt yet", () => {
    expect(
      computeBorrowAmount({ ...base, debt: 0n, availableBorrow: 5n * WAD, healthFactor: MAX_UINT256 })
    ).toBe(4_995_000_000_000_000_000n);
  });

  it("returns zero below target", () => {
    expect(computeBorrowAmount({ ...base, healthFactor: 1_299_999_999_999_999_999n })).toBe(0n);
  });

  it("returns zero exactly at target", () => {
    expect(computeBorrowAmount({ ...base, healthFactor: base.targetHealthFactor })).toBe(0n);
  });

  it("returns zero without headroom", () => {
    expect(computeBorrowAmount({ ...base, availableBorrow: 0n })).toBe(0n);
  });

  it("returns zero when the target is not above the liquidation threshold", () => {
    expect(computeBorrowAmount({ ...base, liquidationThreshold: base.targetHealthFactor })).toBe(0n);
  });

  it("lands the position on target when re-supplied at the same value", () => {
    const borrow = computeBorrowAmount(base);
    // collateral·lt = hf·D; adding borrow·lt of threshold value and borrow of debt
    const weighted = base.healthFactor * base.debt + borrow * base.liquidationThreshold;
    const hf = weighted / (base.debt + borrow);
    expect(hf >= base.targetHealthFactor).toBe(true);
    expect(hf - base.targetHealthFactor <= 1n).toBe(true);
  });
});
