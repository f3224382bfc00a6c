/**
 * rewards.ts
 *
 * Reward accrual. Yield is simple interest on the position's principal,
 * accruing every second since the last claim:
 *
 *   pending = floor(amount * dailyRateBps * elapsed / (10000 * 86400))
 *
 * Claiming pays the rewards out minus the protocol fee; compounding adds
 * them to the principal instead. Either way the pool's reward balance pays
 * the gross amount and the fee goes to the operator.
 */

import type { Pool, Stake, Tier } from "@yieldlock/types";
import { BPS_DENOMINATOR, SECONDS_PER_DAY } from "./constants";
import { LedgerError } from "./errors";
import { rewardFee, tierDiscountedFee } from "./fees";
import { requireAcceptingStakes, requirePool } from "./pools";
import { requirePosition, touchUser } from "./positions";
import type { LedgerState, OperationContext } from "./state";
import { benefitFor, calculateTierBonus, liveTier, ratchetTier } from "./tiers";

export interface ClaimResult {
  grossRewards: bigint;
  fee: bigint;
  netRewards: bigint;
}

export interface TierClaimResult extends ClaimResult {
  tier: Tier;
  tierBonus: bigint;
  feeDiscount: bigint;
}

export interface CompoundResult extends ClaimResult {
  newStakeAmount: bigint;
}

export function pendingRewards(
  position: Pick<Stake, "amount" | "lastClaimAt">,
  pool: Pick<Pool, "dailyRateBps">,
  now: number
): bigint {
  const elapsed = BigInt(Math.max(0, now - position.lastClaimAt));
  return (position.amount * BigInt(pool.dailyRateBps) * elapsed) / (BPS_DENOMINATOR * BigInt(SECONDS_PER_DAY));
}

function requirePayable(pool: Pool, gross: bigint): void {
  if (gross === 0n) throw new LedgerError("NoRewards", "Nothing has accrued since the last claim");
  if (gross > pool.rewardPoolBalance) {
    throw new LedgerError(
      "NoRewards",
      `Pool ${pool.id} reward balance ${pool.rewardPoolBalance} cannot cover ${gross}`
    );
  }
}

/**
 * Book a payout of `gross` out of the reward pool. `net` is what the staker
 * keeps, whether paid out or compounded.
 */
function bookPayout(
  state: LedgerState,
  ctx: OperationContext,
  pool: Pool,
  position: Stake,
  gross: bigint,
  fee: bigint
): void {
  const net = gross - fee;
  pool.rewardPoolBalance -= gross;
  pool.totalRewardsPaid += net;
  position.lastClaimAt = ctx.now;
  position.totalEarned += net;

  state.totals.totalRewardsPaid += net;
  state.totals.totalFeesCollected += fee;

  const [user] = touchUser(state, position.staker, ctx.now);
  user.totalRewardsEarned += net;
  user.totalFeesPaid += fee;
}

// -----------------------------------------------------------------------
// claim
// -----------------------------------------------------------------------

export function claim(state: LedgerState, ctx: OperationContext, poolId: number): ClaimResult {
  const pool = requirePool(state, poolId);
  const position = requirePosition(state, poolId, ctx.caller);
  const gross = pendingRewards(position, pool, ctx.now);
  requirePayable(pool, gross);

  const fee = rewardFee(gross);
  const net = gross - fee;
  ctx.custody.settle([
    { from: state.custodian, to: ctx.caller, amount: net },
    { from: state.custodian, to: state.operator, amount: fee },
  ]);
  bookPayout(state, ctx, pool, position, gross, fee);

  pushClaimEvents(ctx, poolId, gross, fee);
  return { grossRewards: gross, fee, netRewards: net };
}

/**
 * Claim with the loyalty program applied: the live tier's bonus is added to
 * the base rewards, then the fee on the total is cut by the tier's discount.
 */
export function claimWithTierBonus(state: LedgerState, ctx: OperationContext, poolId: number): TierClaimResult {
  if (!state.loyaltyEnabled) {
    throw new LedgerError("LoyaltyDisabled", "The loyalty program is not enabled");
  }
  const pool = requirePool(state, poolId);
  const position = requirePosition(state, poolId, ctx.caller);
  const base = pendingRewards(position, pool, ctx.now);
  if (base === 0n) throw new LedgerError("NoRewards", "Nothing has accrued since the last claim");

  const tier = liveTier(position, ctx.now);
  const benefit = benefitFor(state, tier);
  const tierBonus = calculateTierBonus(base, benefit);
  const gross = base + tierBonus;
  requirePayable(pool, gross);

  const baseFee = rewardFee(gross);
  const fee = tierDiscountedFee(baseFee, benefit);
  const feeDiscount = baseFee - fee;
  const net = gross - fee;

  ctx.custody.settle([
    { from: state.custodian, to: ctx.caller, amount: net },
    { from: state.custodian, to: state.operator, amount: fee },
  ]);

  const record = ratchetTier(state, ctx, position);
  record.totalBonusEarned += tierBonus;
  record.totalFeeDiscount += feeDiscount;
  bookPayout(state, ctx, pool, position, gross, fee);

  pushClaimEvents(ctx, poolId, gross, fee);
  return { grossRewards: gross, fee, netRewards: net, tier, tierBonus, feeDiscount };
}

function pushClaimEvents(ctx: OperationContext, poolId: number, gross: bigint, fee: bigint): void {
  ctx.events.push({
    event: "rewards-claimed",
    "pool-id": poolId,
    staker: ctx.caller,
    "gross-rewards": gross,
    fee,
    "net-rewards": gross - fee,
    timestamp: ctx.now,
  });
  ctx.events.push({
    event: "fee-collected",
    "pool-id": poolId,
    "fee-type": "reward-fee",
    amount: fee,
    staker: ctx.caller,
    timestamp: ctx.now,
  });
}

// -----------------------------------------------------------------------
// compound
// -----------------------------------------------------------------------

/** Restake pending rewards. Only the fee leaves custody. */
export function compound(state: LedgerState, ctx: OperationContext, poolId: number): CompoundResult {
  const pool = requirePool(state, poolId);
  requireAcceptingStakes(pool, ctx.now);
  const position = requirePosition(state, poolId, ctx.caller);
  const gross = pendingRewards(position, pool, ctx.now);
  requirePayable(pool, gross);

  const fee = rewardFee(gross);
  const net = gross - fee;
  ctx.custody.settle([{ from: state.custodian, to: state.operator, amount: fee }]);
  bookPayout(state, ctx, pool, position, gross, fee);

  position.amount += net;
  pool.totalStaked += net;
  state.totals.totalStaked += net;
  const [user] = touchUser(state, position.staker, ctx.now);
  user.totalStaked += net;

  ctx.events.push({
    event: "rewards-compounded",
    "pool-id": poolId,
    staker: ctx.caller,
    "rewards-compounded": net,
    fee,
    "new-stake-amount": position.amount,
    timestamp: ctx.now,
  });
  if (fee > 0n) {
    ctx.events.push({
      event: "fee-collected",
      "pool-id": poolId,
      "fee-type": "compound-fee",
      amount: fee,
      staker: ctx.caller,
      timestamp: ctx.now,
    });
  }
  return { grossRewards: gross, fee, netRewards: net, newStakeAmount: position.amount };
}
