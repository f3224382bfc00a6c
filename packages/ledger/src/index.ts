export { Ledger, type LedgerOptions, type Receipt } from "./ledger";
export { ManualClock, monotonic, systemClock, type Clock } from "./clock";
export { CustodyError, InMemoryCustody, type Custody, type Transfer } from "./custody";
export { ERROR_CODES, LedgerError, isLedgerError, type LedgerErrorKind } from "./errors";
export {
  BPS_DENOMINATOR,
  DEFAULT_TIER_BENEFITS,
  EARLY_WITHDRAWAL_PENALTY_BPS,
  REWARD_FEE_BPS,
  SECONDS_PER_DAY,
} from "./constants";
export { applyBps, earlyWithdrawalPenalty, rewardFee, tierDiscountedFee } from "./fees";
export { TIERS, calculateTierBonus, tierForDuration, tierRank } from "./tiers";
export { cooldownPhase } from "./cooldown";
export { pendingRewards, type ClaimResult, type CompoundResult, type TierClaimResult } from "./rewards";
export type { DepositResult } from "./stakes";
