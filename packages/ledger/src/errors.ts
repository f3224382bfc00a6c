export type LedgerErrorKind =
  | "NotAuthorized"
  | "PoolNotFound"
  | "InvalidAmount"
  | "InsufficientStake"
  | "CooldownActive"
  | "PoolInactive"
  | "NoRewards"
  | "PositionNotFound"
  | "LoyaltyDisabled"
  | "AlreadyInitialized";

/** Stable error codes, as returned by the staking core's `(err uXXXXX)`. */
export const ERROR_CODES: Readonly<Record<LedgerErrorKind, number>> = {
  NotAuthorized:      23001,
  PoolNotFound:       23002,
  InvalidAmount:      23003,
  InsufficientStake:  23004,
  CooldownActive:     23005,
  PoolInactive:       23006,
  NoRewards:          23007,
  PositionNotFound:   23008,
  LoyaltyDisabled:    23009,
  AlreadyInitialized: 23010,
};

/**
 * A rejected ledger operation. Thrown before any state is touched, so a
 * caller that catches it can keep using the ledger.
 */
export class LedgerError extends Error {
  readonly kind: LedgerErrorKind;
  readonly code: number;

  constructor(kind: LedgerErrorKind, message: string) {
    super(message);
    this.name = "LedgerError";
    this.kind = kind;
    this.code = ERROR_CODES[kind];
  }
}

export function isLedgerError(err: unknown): err is LedgerError {
  return err instanceof LedgerError;
}
