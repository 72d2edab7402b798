import { isVaultError } from "../errors";
import { SessionLedger } from "../session-ledger";
import { ADDR } from "./helpers/in-memory-chain";

const ALICE = ADDR.alice;
const lower = ALICE.toLowerCase();

describe("SessionLedger", () => {
  let ledger: SessionLedger;

  beforeEach(() => {
    ledger = new SessionLedger();
  });

  it("starts unlocked with zero balances", () => {
    expect(ledger.view()).toEqual({
      locked: false,
      caller: null,
      borrowBalance: 0n,
      collateralBalance: 0n,
    });
  });

  it("records the checksummed caller on acquire", () => {
    ledger.acquire(lower);
    expect(ledger.isLocked).toBe(true);
    expect(ledger.caller).toBe(ALICE);
  });

  it("rejects a second acquire while locked", () => {
    ledger.acquire(ALICE);
    expect(() => ledger.acquire(ADDR.bob)).toThrow("AlreadyLocked");
    expect(ledger.caller).toBe(ALICE);
  });

  it("rejects the zero address and malformed callers", () => {
    expect(() => ledger.acquire("0x0000000000000000000000000000000000000000")).toThrow("ZeroAddress");
    expect(() => ledger.acquire("not-an-address")).toThrow("ZeroAddress");
    expect(ledger.isLocked).toBe(false);
  });

  it("release without a session fails with NotLocked", () => {
    expect(() => ledger.release()).toThrow("NotLocked");
  });

  it("release requires both balances at zero", () => {
    ledger.acquire(ALICE);
    ledger.credit("collateral", 7n);
    try {
      ledger.release();
      throw new Error("release should have failed");
    } catch (err) {
      expect(isVaultError(err, "SessionBalanceNonZero")).toBe(true);
      if (isVaultError(err)) {
        expect(err.details).toEqual({ borrowBalance: "0", collateralBalance: "7" });
      }
    }
    expect(ledger.isLocked).toBe(true);

    ledger.debit("collateral", 7n);
    ledger.release();
    expect(ledger.view()).toEqual({
      locked: false,
      caller: null,
      borrowBalance: 0n,
      collateralBalance: 0n,
    });
  });

  it("tracks the two balances independently", () => {
    ledger.acquire(ALICE);
    ledger.credit("borrow", 10n);
    ledger.credit("collateral", 3n);
    ledger.debit("borrow", 4n);
    expect(ledger.balanceOf("borrow")).toBe(6n);
    expect(ledger.balanceOf("collateral")).toBe(3n);
  });

  it("refuses to debit more than the running balance", () => {
    ledger.acquire(ALICE);
    ledger.credit("borrow", 5n);
    expect(() => ledger.debit("borrow", 6n)).toThrow(
      "InsufficientSessionBalance: borrow session balance 5 cannot cover 6"
    );
    expect(ledger.balanceOf("borrow")).toBe(5n);
  });

  it("abort drops the session even with balances outstanding", () => {
    ledger.acquire(ALICE);
    ledger.credit("borrow", 1n);
    ledger.abort();
    expect(ledger.isLocked).toBe(false);
    expect(ledger.balanceOf("borrow")).toBe(0n);
    // and is a no-op when unlocked
    ledger.abort();
    expect(ledger.isLocked).toBe(false);
  });

  describe("requireSession", () => {
    it("fails with NotLocked outside a session", () => {
      const token = ledger.acquire(ALICE);
      ledger.release();
      expect(() => ledger.requireSession(token)).toThrow("NotLocked");
    });

    it("accepts only the token issued for the open session", () => {
      const token = ledger.acquire(lower);
      expect(token).toEqual({ caller: ALICE, serial: 1 });
      expect(() => ledger.requireSession(token)).not.toThrow();
      expect(() => ledger.requireSession({ caller: ALICE, serial: 1 })).toThrow("NotPermitted");
    });

    it("rejects the token of an earlier session", () => {
      const first = ledger.acquire(ALICE);
      ledger.abort();
      const second = ledger.acquire(ALICE);
      expect(second.serial).toBe(2);
      expect(() => ledger.requireSession(first)).toThrow("NotPermitted");
    });
  });

  it("a new session starts from zero balances", () => {
    ledger.acquire(ALICE);
    ledger.credit("borrow", 1n);
    ledger.abort();
    ledger.acquire(ADDR.bob);
    expect(ledger.view()).toEqual({
      locked: true,
      caller: ADDR.bob,
      borrowBalance: 0n,
      collateralBalance: 0n,
    });
  });
});
