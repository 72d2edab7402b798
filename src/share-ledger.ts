import { ethers } from "ethers";
import { VaultError } from "./errors";
import type { Address } from "./types";

export interface ShareLedgerState {
  balances: Map<Address, bigint>;
  totalSupply: bigint;
}

/** Vault share balances. Holders are keyed by checksummed address. */
export class ShareLedger {
  private balances = new Map<Address, bigint>();
  private supply = 0n;

  get totalSupply(): bigint {
    return this.supply;
  }

  balanceOf(holder: Address): bigint {
    return this.balances.get(ethers.getAddress(holder)) ?? 0n;
  }

  mint(to: Address, shares: bigint): void {
    if (!ethers.isAddress(to) || to === ethers.ZeroAddress) {
      throw new VaultError("ZeroAddress", "cannot mint shares to the zero address");
    }
    if (shares === 0n) return;
    const holder = ethers.getAddress(to);
    this.balances.set(holder, (this.balances.get(holder) ?? 0n) + shares);
    this.supply += shares;
  }

  burn(from: Address, shares: bigint): void {
    const holder = ethers.getAddress(from);
    const balance = this.balances.get(holder) ?? 0n;
    if (shares > balance) {
      throw new VaultError("InsufficientShares", `${holder} holds ${balance} shares, burning ${shares}`);
    }
    const remaining = balance - shares;
    if (remaining === 0n) {
      this.balances.delete(holder);
    } else {
      this.balances.set(holder, remaining);
    }
    this.supply -= shares;
  }

  save(): ShareLedgerState {
    return { balances: new Map(this.balances), totalSupply: this.supply };
  }

  restore(state: ShareLedgerState): void {
    this.balances = new Map(state.balances);
    this.supply = state.totalSupply;
  }
}
