export type { Pool, PoolParams, PoolStatus } from "./pool";
export type {
  CooldownPhase,
  CooldownState,
  Stake,
  UserStats,
  WithdrawalQuote,
} from "./stake";
export type { LoyaltyTierRecord, Tier, TierBenefit, TierInfo } from "./tier";
export type { ProtocolStats } from "./stats";
export type * from "./events";
