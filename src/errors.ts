/**
 * Loop Vault - Error Types
 *
 * Every rejected operation maps to one named code so callers can tell why it
 * was rejected. Lending-market and staking failures are not wrapped here;
 * they propagate as thrown by the collaborator.
 */

export type ErrorCategory = "session" | "input" | "invariant" | "arithmetic";

const ERROR_CATEGORIES = {
  // Session discipline
  AlreadyLocked: "session",
  NotLocked: "session",
  NotPermitted: "session",
  SessionBalanceNonZero: "session",
  RateChangedDuringSession: "session",
  SessionOpen: "session",
  // Input validation
  ZeroAmount: "input",
  ZeroAddress: "input",
  AmountBelowMinimum: "input",
  InsufficientSessionBalance: "input",
  InsufficientShares: "input",
  AmountExceedsCollateral: "input",
  UnsupportedAsset: "input",
  NotInitialized: "input",
  // Invariant violations
  AlreadyInitialized: "invariant",
  CollateralNonZero: "invariant",
  DebtAfterInitNonZero: "invariant",
  HealthFactorOutOfRange: "invariant",
  NavIncreaseBelowMin: "invariant",
  InvalidDebtAfterWithdraw: "invariant",
  InvalidCollateralAfterWithdraw: "invariant",
  InsufficientProceeds: "invariant",
  InvalidCollateralAfterUnwind: "invariant",
  // Arithmetic
  DivisionByZero: "arithmetic",
  ArithmeticUnderflow: "arithmetic",
} as const satisfies Record<string, ErrorCategory>;

export type VaultErrorCode = keyof typeof ERROR_CATEGORIES;

export class VaultError extends Error {
  constructor(
    public readonly code: VaultErrorCode,
    detail?: string,
    public readonly details?: Record<string, string>
  ) {
    super(detail ? `${code}: ${detail}` : code);
    this.name = "VaultError";
  }

  get category(): ErrorCategory {
    return ERROR_CATEGORIES[this.code];
  }
}

export function isVaultError(err: unknown, code?: VaultErrorCode): err is VaultError {
  if (!(err instanceof VaultError)) return false;
  return code === undefined || err.code === code;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
