import { computeBorrowAmount } from "../../borrow-sizing";
import type { VaultConfig } from "../../config";
import { VaultError, VaultErrorCode } from "../../errors";
import { bpsToWad, mulDiv, Rounding, SECONDS_PER_YEAR } from "../../math";
import { CappedRateProvider } from "../../rate-cap";
import type { Address, Clock, SessionCallback, SessionContext } from "../../types";
import { LoopVault } from "../../vault";
import { ADDR, InMemoryChain } from "./in-memory-chain";

export const ETH = 10n ** 18n;
export const T0 = 1_700_000_000n;

export const TEST_CONFIG: VaultConfig = {
  vaultAddress: ADDR.vault,
  borrowAsset: ADDR.weth,
  collateralAsset: ADDR.wsteth,
  targetHealthFactor: 1_300_000_000_000_000_000n,
  hfLowerToleranceBps: 10n,
  hfUpperToleranceBps: 1n,
  minDepositValue: 10n ** 15n,
  minStakeAmount: 100n,
  unwindSlippageBps: 50n,
  borrowBufferBps: 10n,
  feeRate: 100_000_000_000_000_000n,
  feeRecipient: ADDR.feeRecipient,
  unwindOperators: [ADDR.operator],
};

export interface Deployment {
  chain: InMemoryChain;
  vault: LoopVault;
  config: VaultConfig;
}

/** Starts a year after the cap snapshot; pass a clock to move time. */
export function deployVault(
  overrides: Partial<VaultConfig> = {},
  clock: Clock = () => T0 + SECONDS_PER_YEAR
): Deployment {
  const chain = new InMemoryChain();
  chain.mint(ADDR.weth, ADDR.alice, 100n * ETH);
  chain.mint(ADDR.weth, ADDR.bob, 100n * ETH);
  chain.mint(ADDR.weth, ADDR.market, 1_000_000n * ETH);
  chain.mint(ADDR.weth, ADDR.dex, 1_000_000n * ETH);

  const config = { ...TEST_CONFIG, ...overrides };
  // Cap grows 10% a year from the starting rate.
  const rateProvider = new CappedRateProvider(
    chain.staking(ADDR.vault),
    { snapshotRate: chain.state.stakingRate, snapshotTimestamp: T0, maxYearlyGrowthBps: 1000n },
    clock
  );
  const vault = new LoopVault(config, {
    market: chain.market(ADDR.vault),
    staking: chain.staking(ADDR.vault),
    rateProvider,
    tokens: chain.tokens(ADDR.vault),
    journal: chain,
    clock,
  });
  return { chain, vault, config };
}

// ============================================================
//  CALLBACKS
// ============================================================

export interface FundingData {
  from: Address;
  amount: bigint;
}

/** Pull the borrowed asset, stake it and supply the result. */
export const stakeAndSupply: SessionCallback<FundingData> = {
  async run({ actions, data }) {
    await actions.pull(ADDR.weth, data.from, data.amount);
    const received = await actions.stake(data.amount);
    await actions.supplyCollateral(received);
  },
};

/**
 * Deposit router: stake the user's funds, then borrow-stake-supply until
 * the borrow sizing says stop.
 */
export function loopingDeposit(chain: InMemoryChain, config: VaultConfig, maxLoops = 20): SessionCallback<FundingData> {
  return {
    async run(ctx) {
      await stakeAndSupply.run(ctx);
      const { actions } = ctx;
      for (let i = 0; i < maxLoops; i++) {
        const pos = chain.positionOf(config.vaultAddress);
        const amount = computeBorrowAmount({
          debt: pos.debtValue,
          availableBorrow: pos.availableBorrow,
          healthFactor: pos.healthFactor,
          liquidationThreshold: bpsToWad(pos.liquidationThreshold),
          targetHealthFactor: config.targetHealthFactor,
          bufferBps: config.borrowBufferBps,
        });
        if (amount < config.minStakeAmount) break;
        await actions.borrow(amount);
        const received = await actions.stake(amount);
        await actions.supplyCollateral(received);
      }
    },
  };
}

export interface WithdrawData {
  shares: bigint;
  receiver: Address;
}

/**
 * Withdraw router: flash-swap the debt share from the DEX, repay it,
 * release the collateral share, pay the DEX in collateral and send the
 * remainder to the receiver.
 */
export function proportionalWithdraw(chain: InMemoryChain): SessionCallback<WithdrawData> {
  return {
    async run({ actions, before, data }: SessionContext<WithdrawData>) {
      const repay = mulDiv(before.debt, data.shares, before.totalSupply, Rounding.Ceil);
      const release = mulDiv(before.collateral, data.shares, before.totalSupply, Rounding.Floor);
      let owedToDex = 0n;
      if (repay > 0n) {
        await actions.pull(ADDR.weth, ADDR.dex, repay);
        await actions.repay(repay);
        owedToDex = (repay * ETH) / chain.state.stakingRate + 1n;
      }
      await actions.withdrawCollateral(release);
      if (owedToDex > 0n) {
        await actions.send(ADDR.wsteth, ADDR.dex, owedToDex);
      }
      await actions.send(ADDR.wsteth, data.receiver, release - owedToDex);
    },
  };
}

export interface UnwindData {
  amount: bigint;
  haircutBps?: bigint;
  /** Proceeds to report instead of what was realized */
  report?: bigint;
}

/** Operator sells the released slice on the DEX and repays debt with it. */
export function operatorUnwind(chain: InMemoryChain): SessionCallback<UnwindData> {
  return {
    async run({ caller, actions, data }) {
      const proceeds = chain.swapCollateral(caller, data.amount, data.haircutBps ?? 0n);
      await actions.pull(ADDR.weth, caller, proceeds);
      await actions.repay(proceeds);
      return data.report ?? proceeds;
    },
  };
}

/** Stakes and supplies half of what it pulls; the other half stays in the session. */
export const leaveBalance: SessionCallback<FundingData> = {
  async run({ actions, data }) {
    await actions.pull(ADDR.weth, data.from, data.amount);
    const half = data.amount / 2n;
    const received = await actions.stake(half);
    await actions.supplyCollateral(received);
  },
};

export const noop: SessionCallback<null> = {
  async run() {
    return undefined;
  },
};

export async function expectVaultError(promise: Promise<unknown>, code: VaultErrorCode): Promise<VaultError> {
  try {
    await promise;
  } catch (err) {
    expect(err).toBeInstanceOf(VaultError);
    if (err instanceof VaultError) {
      expect(err.code).toBe(code);
      return err;
    }
  }
  throw new Error(`expected VaultError ${code}, but the call succeeded`);
}

/** Initialize with `amount` of alice's borrowed asset. */
export async function seed(deployment: Deployment, amount = ETH) {
  return deployment.vault.initialize(ADDR.alice, ADDR.alice, stakeAndSupply, {
    from: ADDR.alice,
    amount,
  });
}
