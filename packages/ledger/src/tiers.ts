/**
 * tiers.ts
 *
 * Loyalty tiers. A position's live tier is recomputed from how long it has
 * been staked continuously; a top-up restarts that clock. The recorded
 * tier is a ratchet that check-tier only ever moves upwards.
 *
 * Rewards use the live tier. The record is bookkeeping for the indexer
 * (achieved time, lifetime bonus and discount).
 */

import type { LoyaltyTierRecord, Stake, Tier, TierBenefit, TierInfo } from "@yieldlock/types";
import {
  DEFAULT_TIER_BENEFITS,
  GOLD_MIN_DAYS,
  PLATINUM_MIN_DAYS,
  SECONDS_PER_DAY,
  SILVER_MIN_DAYS,
} from "./constants";
import { LedgerError } from "./errors";
import { applyBps } from "./fees";
import { requireOperator, requirePool } from "./pools";
import { requirePosition } from "./positions";
import { positionKey, type LedgerState, type OperationContext } from "./state";

export const TIERS: readonly Tier[] = ["Bronze", "Silver", "Gold", "Platinum"];

const NO_BENEFIT: TierBenefit = { name: "None", rewardBonusBps: 0, feeDiscountBps: 0, minDaysStaked: 0 };

export function tierRank(tier: Tier): number {
  switch (tier) {
    case "Bronze":
      return 0;
    case "Silver":
      return 1;
    case "Gold":
      return 2;
    case "Platinum":
      return 3;
  }
}

export function tierForDuration(elapsedDays: number): Tier {
  if (elapsedDays >= PLATINUM_MIN_DAYS) return "Platinum";
  if (elapsedDays >= GOLD_MIN_DAYS) return "Gold";
  if (elapsedDays >= SILVER_MIN_DAYS) return "Silver";
  return "Bronze";
}

/** Whole days since the position's current staking period began. */
export function daysStaked(position: Stake, now: number): number {
  return Math.floor(Math.max(0, now - position.stakedAt) / SECONDS_PER_DAY);
}

export function liveTier(position: Stake, now: number): Tier {
  return tierForDuration(daysStaked(position, now));
}

/**
 * Configured benefit for `tier`. Before init-tier-benefits has run every
 * tier resolves to a benefit with no bonus and no discount.
 */
export function benefitFor(state: LedgerState, tier: Tier): TierBenefit {
  return state.tierBenefits.get(tier) ?? NO_BENEFIT;
}

export function calculateTierBonus(baseReward: bigint, benefit: TierBenefit): bigint {
  return applyBps(baseReward, benefit.rewardBonusBps);
}

// -----------------------------------------------------------------------
// Admin
// -----------------------------------------------------------------------

export function initializeTierBenefits(
  state: LedgerState,
  ctx: OperationContext,
  benefits: Readonly<Record<Tier, TierBenefit>> = DEFAULT_TIER_BENEFITS
): void {
  requireOperator(state, ctx.caller);
  if (state.tierBenefits.size > 0) {
    throw new LedgerError("AlreadyInitialized", "Tier benefits are already configured");
  }
  for (const tier of TIERS) {
    const { rewardBonusBps, feeDiscountBps, minDaysStaked } = benefits[tier];
    if (!isBps(rewardBonusBps) || !isBps(feeDiscountBps) || !Number.isSafeInteger(minDaysStaked) || minDaysStaked < 0) {
      throw new LedgerError("InvalidAmount", `Invalid benefit for ${tier}`);
    }
  }
  for (const tier of TIERS) state.tierBenefits.set(tier, { ...benefits[tier] });
}

export function setLoyaltyEnabled(state: LedgerState, ctx: OperationContext, enabled: boolean): boolean {
  requireOperator(state, ctx.caller);
  state.loyaltyEnabled = enabled;
  return enabled;
}

function isBps(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0 && value <= 10_000;
}

// -----------------------------------------------------------------------
// Ratchet
// -----------------------------------------------------------------------

/**
 * Bring the recorded tier of `position` up to its live tier. Creates the
 * record on first use; never lowers it.
 */
export function ratchetTier(state: LedgerState, ctx: OperationContext, position: Stake): LoyaltyTierRecord {
  const key = positionKey(position.poolId, position.staker);
  const current = liveTier(position, ctx.now);
  const record = state.tierRecords.get(key);

  if (!record) {
    const created: LoyaltyTierRecord = {
      poolId: position.poolId,
      staker: position.staker,
      tier: current,
      achievedAt: ctx.now,
      totalBonusEarned: 0n,
      totalFeeDiscount: 0n,
      lastCheckedAt: ctx.now,
    };
    state.tierRecords.set(key, created);
    state.totals.totalTierUpgrades += 1;
    ctx.events.push({
      event: "tier-initialized",
      "pool-id": position.poolId,
      staker: position.staker,
      tier: current,
      timestamp: ctx.now,
    });
    return created;
  }

  record.lastCheckedAt = ctx.now;
  if (tierRank(current) > tierRank(record.tier)) {
    const previous = record.tier;
    record.tier = current;
    record.achievedAt = ctx.now;
    state.totals.totalTierUpgrades += 1;
    ctx.events.push({
      event: "tier-upgraded",
      "pool-id": position.poolId,
      staker: position.staker,
      "old-tier": previous,
      "new-tier": current,
      timestamp: ctx.now,
    });
  }
  return record;
}

export function checkAndUpgradeTier(state: LedgerState, ctx: OperationContext, poolId: number): Tier {
  requirePool(state, poolId);
  const position = requirePosition(state, poolId, ctx.caller);
  return ratchetTier(state, ctx, position).tier;
}

// -----------------------------------------------------------------------
// Reads
// -----------------------------------------------------------------------

export function getTierInfo(state: LedgerState, poolId: number, staker: string, now: number): TierInfo | undefined {
  const position = state.stakes.get(positionKey(poolId, staker));
  if (!position) return undefined;
  const tier = liveTier(position, now);
  return {
    liveTier: tier,
    recordedTier: state.tierRecords.get(positionKey(poolId, staker))?.tier ?? null,
    daysStaked: daysStaked(position, now),
    benefit: { ...benefitFor(state, tier) },
  };
}
