import type { Tier, TierBenefit } from "@yieldlock/types";

export const BPS_DENOMINATOR = 10_000n;
export const SECONDS_PER_DAY = 86_400;

export const REWARD_FEE_BPS = 1_000n;               // 10% of gross rewards
export const EARLY_WITHDRAWAL_PENALTY_BPS = 500n;   // 5% of the withdrawn amount

// Minimum continuous days staked for each tier above Bronze.
export const SILVER_MIN_DAYS = 30;
export const GOLD_MIN_DAYS = 90;
export const PLATINUM_MIN_DAYS = 180;

/** Benefits written by init-tier-benefits when the operator passes none. */
export const DEFAULT_TIER_BENEFITS: Readonly<Record<Tier, TierBenefit>> = {
  Bronze:   { name: "Bronze",   rewardBonusBps: 0,     feeDiscountBps: 0,     minDaysStaked: 0 },
  Silver:   { name: "Silver",   rewardBonusBps: 500,   feeDiscountBps: 1_000, minDaysStaked: SILVER_MIN_DAYS },
  Gold:     { name: "Gold",     rewardBonusBps: 1_000, feeDiscountBps: 2_500, minDaysStaked: GOLD_MIN_DAYS },
  Platinum: { name: "Platinum", rewardBonusBps: 2_000, feeDiscountBps: 5_000, minDaysStaked: PLATINUM_MIN_DAYS },
};
