// Types for the loyalty program (duration-based tiers)

export type Tier = "Bronze" | "Silver" | "Gold" | "Platinum";

/**
 * Operator-configured benefits of one tier.
 */
export interface TierBenefit {
  name: string;
  rewardBonusBps: number;      // added on top of base rewards, 500 = +5%
  feeDiscountBps: number;      // taken off the reward fee, 2500 = 25% cheaper
  minDaysStaked: number;
}

/**
 * The tier recorded for a position. Only ever moves up while the position lives.
 */
export interface LoyaltyTierRecord {
  poolId: number;
  staker: string;
  tier: Tier;
  achievedAt: number;
  totalBonusEarned: bigint;
  totalFeeDiscount: bigint;
  lastCheckedAt: number;
}

/** Tier view of a position, as returned by get-tier-info. */
export interface TierInfo {
  liveTier: Tier;              // derived from days staked right now
  recordedTier: Tier | null;   // ratcheted record, null until first check
  daysStaked: number;
  benefit: TierBenefit;        // benefit of liveTier
}
