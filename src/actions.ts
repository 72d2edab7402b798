/**
 * Loop Vault - Primitive Actions
 *
 * The only state-mutating calls a session callback can make. A set of
 * actions is bound to the token of one session and stops working once that
 * session closes. Each call moves one running balance and performs the
 * matching collaborator call.
 */

import { ethers } from "ethers";
import { VaultError } from "./errors";
import { sessionActionsTotal } from "./metrics";
import type { SessionAsset, SessionLedger } from "./session-ledger";
import type {
  Address,
  LendingMarket,
  SessionToken,
  StakingToken,
  TokenTransfers,
} from "./types";

export interface ActionSettings {
  vaultAddress: Address;
  borrowAsset: Address;
  collateralAsset: Address;
  minStakeAmount: bigint;
}

export interface ActionCollaborators {
  market: LendingMarket;
  staking: StakingToken;
  tokens: TokenTransfers;
}

function requirePositive(amount: bigint, action: string): void {
  if (amount <= 0n) {
    throw new VaultError("ZeroAmount", `${action} amount must be > 0`);
  }
}

function requireAddress(addr: Address, what: string): Address {
  if (!ethers.isAddress(addr) || addr === ethers.ZeroAddress) {
    throw new VaultError("ZeroAddress", `${what} must be a non-zero address`);
  }
  return ethers.getAddress(addr);
}

export class PrimitiveActions {
  constructor(
    private readonly ledger: SessionLedger,
    private readonly token: SessionToken,
    private readonly deps: ActionCollaborators,
    private readonly settings: ActionSettings
  ) {}

  /** Caller of the session these actions are bound to. */
  get caller(): Address {
    return this.token.caller;
  }

  /** Stake borrowed asset into collateral; returns collateral received. */
  async stake(amount: bigint): Promise<bigint> {
    this.ledger.requireSession(this.token);
    requirePositive(amount, "stake");
    if (amount < this.settings.minStakeAmount) {
      throw new VaultError(
        "AmountBelowMinimum",
        `stake ${amount} below minimum ${this.settings.minStakeAmount}`
      );
    }
    this.ledger.debit("borrow", amount);
    const received = await this.deps.staking.stake(amount);
    this.ledger.credit("collateral", received);
    sessionActionsTotal.inc({ action: "stake" });
    return received;
  }

  async supplyCollateral(amount: bigint): Promise<void> {
    this.ledger.requireSession(this.token);
    requirePositive(amount, "supplyCollateral");
    this.ledger.debit("collateral", amount);
    await this.deps.market.supply(this.settings.collateralAsset, amount);
    sessionActionsTotal.inc({ action: "supplyCollateral" });
  }

  /** Returns the amount the market actually released. */
  async withdrawCollateral(amount: bigint): Promise<bigint> {
    this.ledger.requireSession(this.token);
    requirePositive(amount, "withdrawCollateral");
    const actual = await this.deps.market.withdraw(this.settings.collateralAsset, amount);
    this.ledger.credit("collateral", actual);
    sessionActionsTotal.inc({ action: "withdrawCollateral" });
    return actual;
  }

  async borrow(amount: bigint): Promise<void> {
    this.ledger.requireSession(this.token);
    requirePositive(amount, "borrow");
    await this.deps.market.borrow(this.settings.borrowAsset, amount);
    this.ledger.credit("borrow", amount);
    sessionActionsTotal.inc({ action: "borrow" });
  }

  /**
   * Repay debt from the session's borrowed-asset balance.
   * Returns the amount the market actually took.
   */
  async repay(amount: bigint): Promise<bigint> {
    this.ledger.requireSession(this.token);
    requirePositive(amount, "repay");
    if (amount > this.ledger.balanceOf("borrow")) {
      throw new VaultError(
        "InsufficientSessionBalance",
        `borrow session balance ${this.ledger.balanceOf("borrow")} cannot cover repay ${amount}`
      );
    }
    const actual = await this.deps.market.repay(this.settings.borrowAsset, amount);
    this.ledger.debit("borrow", actual);
    sessionActionsTotal.inc({ action: "repay" });
    return actual;
  }

  /** Send session funds to an external holder. */
  async send(asset: Address, to: Address, amount: bigint): Promise<void> {
    this.ledger.requireSession(this.token);
    const recipient = requireAddress(to, "recipient");
    requirePositive(amount, "send");
    const kind = this.resolveAsset(asset);
    this.ledger.debit(kind, amount);
    await this.deps.tokens.transfer(this.tokenOf(kind), recipient, amount);
    sessionActionsTotal.inc({ action: "send" });
  }

  /** Pull funds from an external holder into the session. */
  async pull(asset: Address, from: Address, amount: bigint): Promise<void> {
    this.ledger.requireSession(this.token);
    const source = requireAddress(from, "source");
    requirePositive(amount, "pull");
    const kind = this.resolveAsset(asset);
    await this.deps.tokens.transferFrom(
      this.tokenOf(kind),
      source,
      this.settings.vaultAddress,
      amount
    );
    this.ledger.credit(kind, amount);
    sessionActionsTotal.inc({ action: "pull" });
  }

  private resolveAsset(asset: Address): SessionAsset {
    if (!ethers.isAddress(asset) || asset === ethers.ZeroAddress) {
      throw new VaultError("ZeroAddress", "asset must be a non-zero address");
    }
    const normalized = ethers.getAddress(asset);
    if (normalized === ethers.getAddress(this.settings.borrowAsset)) return "borrow";
    if (normalized === ethers.getAddress(this.settings.collateralAsset)) return "collateral";
    throw new VaultError("UnsupportedAsset", `${asset} is neither the borrowed nor the collateral asset`);
  }

  private tokenOf(kind: SessionAsset): Address {
    return kind === "borrow" ? this.settings.borrowAsset : this.settings.collateralAsset;
  }
}
