/**
 * Loop Vault - Configuration
 *
 * Policy for one vault instance. Reads from environment variables with
 * defaults; tolerances are basis points, ratios are WAD.
 */

import { ethers } from "ethers";
import { BPS, WAD } from "./math";
import type { Address } from "./types";

export interface VaultConfig {
  /** Account the vault acts as in the lending market */
  vaultAddress: Address;
  /** Asset borrowed from the market and staked (e.g. WETH) */
  borrowAsset: Address;
  /** Yield-bearing collateral asset (e.g. wstETH) */
  collateralAsset: Address;
  /** Health factor deposits steer toward (WAD) */
  targetHealthFactor: bigint;
  /** Deposit band below target, bps of target */
  hfLowerToleranceBps: bigint;
  /** Deposit band above target, bps of target */
  hfUpperToleranceBps: bigint;
  /** Smallest NAV increase a deposit must create */
  minDepositValue: bigint;
  /** Staking floor enforced by stake() */
  minStakeAmount: bigint;
  /** Max shortfall of unwind proceeds vs redemption value, bps */
  unwindSlippageBps: bigint;
  /** Safety haircut on borrow headroom for oracle precision, bps */
  borrowBufferBps: bigint;
  /** Performance fee on new rate growth (WAD fraction) */
  feeRate: bigint;
  feeRecipient: Address;
  /** Identities allowed to run unwind */
  unwindOperators: Address[];
}

/** Built-in policy; loadVaultConfig() overlays the environment on it. */
export const DEFAULT_VAULT_CONFIG: Readonly<VaultConfig> = Object.freeze({
  vaultAddress: ethers.ZeroAddress,
  borrowAsset: ethers.ZeroAddress,
  collateralAsset: ethers.ZeroAddress,
  targetHealthFactor: 1_300_000_000_000_000_000n, // 1.3
  hfLowerToleranceBps: 10n,
  hfUpperToleranceBps: 1n,
  minDepositValue: 10n ** 15n,
  minStakeAmount: 100n,
  unwindSlippageBps: 50n,
  borrowBufferBps: 10n,
  feeRate: 100_000_000_000_000_000n, // 10%
  feeRecipient: ethers.ZeroAddress,
  unwindOperators: [],
});

function envAddress(value: string | undefined, fallback: Address): Address {
  return value && value.trim() ? value.trim() : fallback;
}

function envBigInt(name: string, value: string | undefined, fallback: bigint): bigint {
  if (!value || !value.trim()) return fallback;
  try {
    return BigInt(value.trim());
  } catch {
    throw new Error(`${name} must be an integer, got "${value}"`);
  }
}

/** Parse a decimal string such as "1.3" into WAD. */
function envWad(name: string, value: string | undefined, fallback: bigint): bigint {
  if (!value || !value.trim()) return fallback;
  try {
    return ethers.parseUnits(value.trim(), 18);
  } catch {
    throw new Error(`${name} must be a decimal number, got "${value}"`);
  }
}

export function loadVaultConfig(env: NodeJS.ProcessEnv = process.env): VaultConfig {
  const d = DEFAULT_VAULT_CONFIG;
  return {
    vaultAddress: envAddress(env.VAULT_ADDRESS, d.vaultAddress),
    borrowAsset: envAddress(env.VAULT_BORROW_ASSET, d.borrowAsset),
    collateralAsset: envAddress(env.VAULT_COLLATERAL_ASSET, d.collateralAsset),
    targetHealthFactor: envWad("VAULT_TARGET_HF", env.VAULT_TARGET_HF, d.targetHealthFactor),
    hfLowerToleranceBps: envBigInt(
      "VAULT_HF_LOWER_TOLERANCE_BPS",
      env.VAULT_HF_LOWER_TOLERANCE_BPS,
      d.hfLowerToleranceBps
    ),
    hfUpperToleranceBps: envBigInt(
      "VAULT_HF_UPPER_TOLERANCE_BPS",
      env.VAULT_HF_UPPER_TOLERANCE_BPS,
      d.hfUpperToleranceBps
    ),
    minDepositValue: envBigInt("VAULT_MIN_DEPOSIT_VALUE", env.VAULT_MIN_DEPOSIT_VALUE, d.minDepositValue),
    minStakeAmount: envBigInt("VAULT_MIN_STAKE_AMOUNT", env.VAULT_MIN_STAKE_AMOUNT, d.minStakeAmount),
    unwindSlippageBps: envBigInt(
      "VAULT_UNWIND_SLIPPAGE_BPS",
      env.VAULT_UNWIND_SLIPPAGE_BPS,
      d.unwindSlippageBps
    ),
    borrowBufferBps: envBigInt("VAULT_BORROW_BUFFER_BPS", env.VAULT_BORROW_BUFFER_BPS, d.borrowBufferBps),
    feeRate: envWad("VAULT_FEE_RATE", env.VAULT_FEE_RATE, d.feeRate),
    feeRecipient: envAddress(env.VAULT_FEE_RECIPIENT, d.feeRecipient),
    unwindOperators: env.VAULT_UNWIND_OPERATORS
      ? env.VAULT_UNWIND_OPERATORS.split(",")
          .map((s) => s.trim())
          .filter(Boolean)
      : [...d.unwindOperators],
  };
}

/**
 * Validate that the configuration is usable.
 * Throws on the first problem found.
 */
export function validateVaultConfig(config: VaultConfig): void {
  const addresses: Array<[string, Address]> = [
    ["VAULT_ADDRESS", config.vaultAddress],
    ["VAULT_BORROW_ASSET", config.borrowAsset],
    ["VAULT_COLLATERAL_ASSET", config.collateralAsset],
    ["VAULT_FEE_RECIPIENT", config.feeRecipient],
  ];
  for (const [name, value] of addresses) {
    if (!ethers.isAddress(value) || value === ethers.ZeroAddress) {
      throw new Error(`${name} must be a non-zero address, got "${value}"`);
    }
  }
  if (ethers.getAddress(config.borrowAsset) === ethers.getAddress(config.collateralAsset)) {
    throw new Error("VAULT_BORROW_ASSET and VAULT_COLLATERAL_ASSET must differ");
  }
  for (const op of config.unwindOperators) {
    if (!ethers.isAddress(op)) {
      throw new Error(`VAULT_UNWIND_OPERATORS contains an invalid address: "${op}"`);
    }
  }
  if (config.targetHealthFactor <= WAD) {
    throw new Error("VAULT_TARGET_HF must be > 1.0");
  }
  const bpsFields: Array<[string, bigint]> = [
    ["VAULT_HF_LOWER_TOLERANCE_BPS", config.hfLowerToleranceBps],
    ["VAULT_HF_UPPER_TOLERANCE_BPS", config.hfUpperToleranceBps],
    ["VAULT_UNWIND_SLIPPAGE_BPS", config.unwindSlippageBps],
    ["VAULT_BORROW_BUFFER_BPS", config.borrowBufferBps],
  ];
  for (const [name, value] of bpsFields) {
    if (value < 0n || value >= BPS) {
      throw new Error(`${name} must be in [0, 10000), got ${value}`);
    }
  }
  if (config.feeRate < 0n || config.feeRate >= WAD) {
    throw new Error("VAULT_FEE_RATE must be in [0, 1)");
  }
  if (config.minStakeAmount < 0n || config.minDepositValue < 0n) {
    throw new Error("VAULT_MIN_STAKE_AMOUNT and VAULT_MIN_DEPOSIT_VALUE must be >= 0");
  }
}
