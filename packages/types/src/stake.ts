// Types for the stake ledger (one position per pool and staker)

/**
 * A staker's position in one pool.
 * Mirrors the `stakes` map of the staking core, keyed by (poolId, staker).
 */
export interface Stake {
  poolId: number;
  staker: string;
  amount: bigint;              // principal, always > 0 while the position exists
  stakedAt: number;            // start of the current continuous staking period
  lastClaimAt: number;         // rewards accrue from here
  totalEarned: bigint;         // net rewards claimed or compounded over the lifetime
  unlockTime: number;          // stakedAt + pool.lockPeriod
  cooldownStart: number | null;
}

/**
 * Running totals for one staker across every pool.
 */
export interface UserStats {
  staker: string;
  totalStaked: bigint;
  totalRewardsEarned: bigint;
  totalFeesPaid: bigint;       // reward fees plus early-withdrawal penalties
  poolsJoined: number;         // positions ever opened
  firstStakeAt: number;
  lastActivityAt: number;
}

/**
 * Cooldown lifecycle of a position:
 *   locked -> unlocked -> cooldown-pending -> withdrawable
 */
export type CooldownPhase = "locked" | "unlocked" | "cooldown-pending" | "withdrawable";

export interface CooldownState {
  phase: CooldownPhase;
  unlockTime: number;
  cooldownEndsAt: number | null;   // set once a cooldown has been started
}

/** What a withdrawal of a given amount would pay out right now. */
export interface WithdrawalQuote {
  amount: bigint;
  penalty: bigint;
  netAmount: bigint;
  isEarly: boolean;
  remaining: bigint;
}
