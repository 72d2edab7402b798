import { FeeAccrualEngine } from "../fees";
import { MAX_UINT256, RAY } from "../math";
import { ShareLedger } from "../share-ledger";
import { SnapshotReader } from "../snapshot-reader";
import type { RateProvider } from "../types";
import { ADDR, InMemoryChain } from "./helpers/in-memory-chain";
import { ETH } from "./helpers/fixtures";

function fixedRate(chain: InMemoryChain): RateProvider {
  return {
    currentRate: async () => chain.state.stakingRate,
    isCapped: async () => false,
    rateInputs: async () => ({
      snapshotRate: chain.state.stakingRate,
      snapshotTimestamp: 0n,
      maxYearlyGrowthBps: 0n,
      now: 0n,
    }),
  };
}

describe("SnapshotReader", () => {
  let chain: InMemoryChain;
  let shares: ShareLedger;
  let reader: SnapshotReader;

  beforeEach(async () => {
    chain = new InMemoryChain();
    shares = new ShareLedger();
    const fees = new FeeAccrualEngine({
      feeRate: 100_000_000_000_000_000n,
      allTimeHigh: ETH,
      recipient: ADDR.feeRecipient,
    });
    reader = new SnapshotReader(chain.market(ADDR.vault), fixedRate(chain), ADDR.vault, shares, fees);

    chain.state.liquidityIndex = (RAY * 105n) / 100n;
    chain.mint(ADDR.wsteth, ADDR.vault, 10n * ETH);
    await chain.market(ADDR.vault).supply(ADDR.wsteth, 10n * ETH);
  });

  it("reconstructs balances from scaled amounts and indices", async () => {
    const snap = await reader.read();
    expect(snap.collateralScaled).toBe(9_523_809_523_809_523_810n);
    expect(snap.collateralIndex).toBe(1_050_000_000_000_000_000_000_000_000n);
    expect(snap.collateral).toBe(10_000_000_000_000_000_001n);
    expect(snap.debt).toBe(0n);
    expect(snap.healthFactor).toBe(MAX_UINT256);
  });

  it("values collateral at the reference rate", async () => {
    const snap = await reader.read();
    expect(snap.referenceRate).toBe(1_200_000_000_000_000_000n);
    expect(snap.collateralValue).toBe(12_000_000_000_000_000_001n);
  });

  it("reports market ratios as WAD", async () => {
    const snap = await reader.read();
    expect(snap.ltv).toBe(930_000_000_000_000_000n);
    expect(snap.liquidationThreshold).toBe(950_000_000_000_000_000n);
  });

  it("follows index growth between reads", async () => {
    chain.state.liquidityIndex = (RAY * 11n) / 10n;
    const snap = await reader.read();
    expect(snap.collateral).toBe(10_476_190_476_190_476_191n);
    expect(snap.collateralValue).toBe(12_571_428_571_428_571_429n);
  });

  it("counts fee shares that are owed but not minted", async () => {
    shares.mint(ADDR.alice, 10n * ETH);
    chain.state.liquidityIndex = (RAY * 11n) / 10n;
    const snap = await reader.read();
    expect(snap.pendingFeeShares).toBe(208_816_705_336_426_908n);
    expect(snap.totalSupply).toBe(10n * ETH + 208_816_705_336_426_908n);
    // nothing minted by reading
    expect(shares.totalSupply).toBe(10n * ETH);
  });

  it("returns a frozen snapshot", async () => {
    expect(Object.isFrozen(await reader.read())).toBe(true);
  });

  it("asks the rate provider for the rate at the pinned time", async () => {
    const asked: Array<bigint | undefined> = [];
    const provider: RateProvider = {
      ...fixedRate(chain),
      currentRate: async (at) => {
        asked.push(at);
        return chain.state.stakingRate;
      },
    };
    const pinned = new SnapshotReader(
      chain.market(ADDR.vault),
      provider,
      ADDR.vault,
      shares,
      new FeeAccrualEngine({ feeRate: 0n, allTimeHigh: ETH, recipient: ADDR.feeRecipient })
    );
    await pinned.read(1_700_000_000n);
    await pinned.read();
    expect(asked).toEqual([1_700_000_000n, undefined]);
  });
});
