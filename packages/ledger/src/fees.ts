/**
 * fees.ts
 *
 * Basis-point arithmetic for protocol fees. Every division truncates, so
 * rounding always lands in the staker's favour.
 */

import type { TierBenefit } from "@yieldlock/types";
import { BPS_DENOMINATOR, EARLY_WITHDRAWAL_PENALTY_BPS, REWARD_FEE_BPS } from "./constants";

/** floor(amount * bps / 10000) */
export function applyBps(amount: bigint, bps: bigint | number): bigint {
  return (amount * BigInt(bps)) / BPS_DENOMINATOR;
}

/** Protocol cut of claimed or compounded rewards (10%). */
export function rewardFee(grossRewards: bigint): bigint {
  return applyBps(grossRewards, REWARD_FEE_BPS);
}

/** Charge for leaving before the lock period ends (5%). */
export function earlyWithdrawalPenalty(amount: bigint): bigint {
  return applyBps(amount, EARLY_WITHDRAWAL_PENALTY_BPS);
}

/** `baseFee` reduced by the tier's fee discount. */
export function tierDiscountedFee(baseFee: bigint, benefit: TierBenefit): bigint {
  return baseFee - applyBps(baseFee, benefit.feeDiscountBps);
}
