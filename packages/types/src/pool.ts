// Types for the pool registry (one entry per staking pool)

/**
 * Lifecycle of a pool. `ended` is terminal; `paused` pools keep accruing
 * rewards for existing positions but take no new deposits or compounds.
 */
export type PoolStatus = "active" | "paused" | "ended";

/**
 * A staking pool. Amounts are in the smallest unit of the staked asset,
 * times are unix seconds and periods are seconds.
 */
export interface Pool {
  id: number;
  name: string;
  dailyRateBps: number;        // reward rate per day, 500 = 5% of principal per day
  minStake: bigint;            // smallest accepted deposit
  lockPeriod: number;          // seconds after (re-)staking before penalty-free exit
  cooldownPeriod: number;      // seconds between start-cooldown and withdrawal
  totalStaked: bigint;         // sum of all live position amounts (TVL)
  totalRewardsPaid: bigint;    // net rewards paid out or compounded
  stakerCount: number;         // live positions
  createdAt: number;
  endsAt: number | null;       // deposits stop at this time when set
  status: PoolStatus;
  rewardPoolBalance: bigint;   // funds available to pay yield
}

/** Parameters accepted by create-pool. */
export interface PoolParams {
  name: string;
  dailyRateBps: number;
  minStake: bigint;
  lockPeriod: number;
  cooldownPeriod: number;
  duration?: number | null;    // optional lifetime in seconds, sets endsAt
}
