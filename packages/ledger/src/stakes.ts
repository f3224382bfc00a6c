/**
 * stakes.ts
 *
 * Stake ledger: deposits into and withdrawals out of positions, with the
 * pool, user and protocol aggregates kept in step.
 *
 * Conservation: pool.totalStaked is always the sum of amounts over the
 * pool's live positions, and totals.totalStaked the sum over all pools.
 */

import type { WithdrawalQuote } from "@yieldlock/types";
import { cooldownPhase } from "./cooldown";
import { LedgerError } from "./errors";
import { earlyWithdrawalPenalty } from "./fees";
import { requireAcceptingStakes, requirePool } from "./pools";
import { findPosition, touchUser } from "./positions";
import { positionKey, type LedgerState, type OperationContext } from "./state";

export interface DepositResult {
  totalStake: bigint;
  unlockTime: number;
  isNewStaker: boolean;
}

// -----------------------------------------------------------------------
// deposit
// -----------------------------------------------------------------------

/**
 * Open a position or top one up. A top-up leaves `lastClaimAt` where it
 * was, so the added principal accrues from the last claim too: a large
 * top-up just before a claim draws that much more out of the reward
 * balance. Callers that want fresh money to earn from now on claim first.
 */
export function deposit(
  state: LedgerState,
  ctx: OperationContext,
  poolId: number,
  amount: bigint
): DepositResult {
  const pool = requirePool(state, poolId);
  requireAcceptingStakes(pool, ctx.now);
  if (amount <= 0n || amount < pool.minStake) {
    throw new LedgerError("InvalidAmount", `Deposit of ${amount} is below the pool minimum of ${pool.minStake}`);
  }

  const staker = ctx.caller;
  ctx.custody.settle([{ from: staker, to: state.custodian, amount }]);

  const unlockTime = ctx.now + pool.lockPeriod;
  const existing = findPosition(state, poolId, staker);
  let totalStake: bigint;

  if (existing) {
    // A top-up restarts the lock, the loyalty clock and any cooldown.
    existing.amount += amount;
    existing.stakedAt = ctx.now;
    existing.unlockTime = unlockTime;
    existing.cooldownStart = null;
    totalStake = existing.amount;
  } else {
    state.stakes.set(positionKey(poolId, staker), {
      poolId,
      staker,
      amount,
      stakedAt: ctx.now,
      lastClaimAt: ctx.now,
      totalEarned: 0n,
      unlockTime,
      cooldownStart: null,
    });
    pool.stakerCount += 1;
    totalStake = amount;
  }

  pool.totalStaked += amount;
  state.totals.totalStaked += amount;

  const [user, isNewUser] = touchUser(state, staker, ctx.now);
  user.totalStaked += amount;
  if (!existing) user.poolsJoined += 1;
  if (isNewUser) state.totals.totalStakers += 1;

  const isNewStaker = !existing;
  ctx.events.push({
    event: "stake-deposited",
    "pool-id": poolId,
    staker,
    amount,
    "total-stake": totalStake,
    "unlock-time": unlockTime,
    "is-new-staker": isNewStaker,
    timestamp: ctx.now,
  });
  return { totalStake, unlockTime, isNewStaker };
}

// -----------------------------------------------------------------------
// withdraw
// -----------------------------------------------------------------------

/**
 * Work out what withdrawing `amount` would pay, or throw the error the
 * withdrawal itself would throw. Reads only.
 */
export function quoteWithdrawal(
  state: LedgerState,
  poolId: number,
  staker: string,
  amount: bigint,
  now: number
): WithdrawalQuote {
  const pool = requirePool(state, poolId);
  const position = findPosition(state, poolId, staker);
  if (!position) {
    throw new LedgerError("InsufficientStake", `${staker} has nothing staked in pool ${poolId}`);
  }
  if (amount <= 0n) throw new LedgerError("InvalidAmount", "Withdrawal amount must be positive");
  if (amount > position.amount) {
    throw new LedgerError("InsufficientStake", `Requested ${amount}, position holds ${position.amount}`);
  }

  const phase = cooldownPhase(position, pool, now);
  const isEarly = phase === "locked";
  if (!isEarly && phase !== "withdrawable") {
    throw new LedgerError(
      "CooldownActive",
      phase === "unlocked" ? "Start a cooldown before withdrawing" : "Cooldown has not finished"
    );
  }

  const penalty = isEarly ? earlyWithdrawalPenalty(amount) : 0n;
  return {
    amount,
    penalty,
    netAmount: amount - penalty,
    isEarly,
    remaining: position.amount - amount,
  };
}

export function withdraw(
  state: LedgerState,
  ctx: OperationContext,
  poolId: number,
  amount: bigint
): WithdrawalQuote {
  const staker = ctx.caller;
  const quote = quoteWithdrawal(state, poolId, staker, amount, ctx.now);
  const pool = requirePool(state, poolId);
  const key = positionKey(poolId, staker);

  ctx.custody.settle([
    { from: state.custodian, to: staker, amount: quote.netAmount },
    { from: state.custodian, to: state.operator, amount: quote.penalty },
  ]);

  const position = state.stakes.get(key);
  if (quote.remaining === 0n) {
    // Unclaimed rewards and the tier record go with the position.
    state.stakes.delete(key);
    state.tierRecords.delete(key);
    pool.stakerCount -= 1;
  } else if (position) {
    position.amount = quote.remaining;
    position.cooldownStart = null;
  }

  pool.totalStaked -= amount;
  state.totals.totalStaked -= amount;
  state.totals.totalFeesCollected += quote.penalty;

  const [user] = touchUser(state, staker, ctx.now);
  user.totalStaked -= amount;
  user.totalFeesPaid += quote.penalty;

  ctx.events.push({
    event: "stake-withdrawn",
    "pool-id": poolId,
    staker,
    amount,
    penalty: quote.penalty,
    "net-amount": quote.netAmount,
    "is-early-withdrawal": quote.isEarly,
    "remaining-stake": quote.remaining,
    timestamp: ctx.now,
  });
  if (quote.penalty > 0n) {
    ctx.events.push({
      event: "fee-collected",
      "pool-id": poolId,
      "fee-type": "early-withdrawal",
      amount: quote.penalty,
      staker,
      timestamp: ctx.now,
    });
  }
  return quote;
}
