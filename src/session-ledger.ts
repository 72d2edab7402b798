/**
 * Loop Vault - Session Ledger
 *
 * Lock and running balances for one top-level operation.
 *
 *   Unlocked ──acquire(caller)──▶ Locked(caller) ──release()──▶ Unlocked
 *
 * While locked, only actions bound to the session's token may run, and the
 * two running balances (borrowed asset, collateral asset) must both be back
 * at zero before the session can be released.
 */

import { ethers } from "ethers";
import { VaultError } from "./errors";
import { createModuleLogger } from "./logger";
import type { Address, SessionState, SessionToken } from "./types";

const logger = createModuleLogger("SESSION");

export type SessionAsset = "borrow" | "collateral";

function emptySession(): SessionState {
  return { locked: false, caller: null, borrowBalance: 0n, collateralBalance: 0n };
}

export class SessionLedger {
  private state: SessionState = emptySession();
  private token: SessionToken | null = null;
  private serial = 0;

  get isLocked(): boolean {
    return this.state.locked;
  }

  get caller(): Address | null {
    return this.state.caller;
  }

  /** Copy of the current record, for inspection. */
  view(): Readonly<SessionState> {
    return { ...this.state };
  }

  balanceOf(asset: SessionAsset): bigint {
    return asset === "borrow" ? this.state.borrowBalance : this.state.collateralBalance;
  }

  /** Open a session for `caller`; the returned token is its only handle. */
  acquire(caller: Address): SessionToken {
    if (this.state.locked) {
      throw new VaultError("AlreadyLocked", `session held by ${this.state.caller}`);
    }
    if (!ethers.isAddress(caller) || caller === ethers.ZeroAddress) {
      throw new VaultError("ZeroAddress", `invalid session caller "${caller}"`);
    }
    this.state = {
      locked: true,
      caller: ethers.getAddress(caller),
      borrowBalance: 0n,
      collateralBalance: 0n,
    };
    const token: SessionToken = Object.freeze({
      caller: ethers.getAddress(caller),
      serial: ++this.serial,
    });
    this.token = token;
    logger.debug(`session ${token.serial} acquired by ${token.caller}`);
    return token;
  }

  release(): void {
    if (!this.state.locked) {
      throw new VaultError("NotLocked", "release without an open session");
    }
    if (this.state.borrowBalance !== 0n || this.state.collateralBalance !== 0n) {
      throw new VaultError(
        "SessionBalanceNonZero",
        `borrow=${this.state.borrowBalance} collateral=${this.state.collateralBalance}`,
        {
          borrowBalance: this.state.borrowBalance.toString(),
          collateralBalance: this.state.collateralBalance.toString(),
        }
      );
    }
    logger.debug(`released by ${this.state.caller}`);
    this.state = emptySession();
    this.token = null;
  }

  /** Drop the session unconditionally; used when an operation is rolled back. */
  abort(): void {
    if (this.state.locked) {
      logger.debug(`aborted session of ${this.state.caller}`);
    }
    this.state = emptySession();
    this.token = null;
  }

  /** Throws unless a session is open and `token` is the one it issued. */
  requireSession(token: SessionToken): void {
    if (!this.state.locked) {
      throw new VaultError("NotLocked", "primitive action outside a session");
    }
    if (token !== this.token) {
      throw new VaultError(
        "NotPermitted",
        `handle of ${token.caller} (session ${token.serial}) does not hold the open session`
      );
    }
  }

  credit(asset: SessionAsset, amount: bigint): void {
    if (asset === "borrow") {
      this.state.borrowBalance += amount;
    } else {
      this.state.collateralBalance += amount;
    }
  }

  debit(asset: SessionAsset, amount: bigint): void {
    const balance = this.balanceOf(asset);
    if (amount > balance) {
      throw new VaultError(
        "InsufficientSessionBalance",
        `${asset} session balance ${balance} cannot cover ${amount}`
      );
    }
    if (asset === "borrow") {
      this.state.borrowBalance = balance - amount;
    } else {
      this.state.collateralBalance = balance - amount;
    }
  }
}
