import type { Stake, UserStats } from "@yieldlock/types";
import { LedgerError } from "./errors";
import { positionKey, type LedgerState } from "./state";

export function findPosition(state: LedgerState, poolId: number, staker: string): Stake | undefined {
  return state.stakes.get(positionKey(poolId, staker));
}

export function requirePosition(state: LedgerState, poolId: number, staker: string): Stake {
  const position = findPosition(state, poolId, staker);
  if (!position) {
    throw new LedgerError("PositionNotFound", `${staker} has no position in pool ${poolId}`);
  }
  return position;
}

/**
 * Stats row for `staker`, created on first activity. The bool tells the
 * caller whether this is a new principal.
 */
export function touchUser(state: LedgerState, staker: string, now: number): [UserStats, boolean] {
  const existing = state.users.get(staker);
  if (existing) {
    existing.lastActivityAt = now;
    return [existing, false];
  }
  const created: UserStats = {
    staker,
    totalStaked: 0n,
    totalRewardsEarned: 0n,
    totalFeesPaid: 0n,
    poolsJoined: 0,
    firstStakeAt: now,
    lastActivityAt: now,
  };
  state.users.set(staker, created);
  return [created, true];
}
