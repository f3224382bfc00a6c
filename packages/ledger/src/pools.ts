/**
 * pools.ts
 *
 * Pool registry: creation, reward funding and the active/paused/ended
 * lifecycle. Admin operations are restricted to the ledger operator.
 */

import type { Pool, PoolParams, PoolStatus } from "@yieldlock/types";
import { LedgerError } from "./errors";
import type { LedgerState, OperationContext } from "./state";

// -----------------------------------------------------------------------
// Guards
// -----------------------------------------------------------------------

export function requireOperator(state: LedgerState, caller: string): void {
  if (caller !== state.operator) {
    throw new LedgerError("NotAuthorized", `${caller} is not the ledger operator`);
  }
}

export function requirePool(state: LedgerState, poolId: number): Pool {
  const pool = state.pools.get(poolId);
  if (!pool) throw new LedgerError("PoolNotFound", `Pool ${poolId} does not exist`);
  return pool;
}

/** True while the pool takes deposits and compounds. */
export function isAcceptingStakes(pool: Pool, now: number): boolean {
  return pool.status === "active" && (pool.endsAt === null || now < pool.endsAt);
}

export function requireAcceptingStakes(pool: Pool, now: number): void {
  if (!isAcceptingStakes(pool, now)) {
    const reason = pool.status === "active" ? `ended at ${pool.endsAt}` : `is ${pool.status}`;
    throw new LedgerError("PoolInactive", `Pool ${pool.id} ${reason}`);
  }
}

function requirePeriod(value: number, label: string): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new LedgerError("InvalidAmount", `${label} must be a non-negative whole number of seconds`);
  }
}

// -----------------------------------------------------------------------
// Operations
// -----------------------------------------------------------------------

export function createPool(state: LedgerState, ctx: OperationContext, params: PoolParams): number {
  requireOperator(state, ctx.caller);

  if (!Number.isSafeInteger(params.dailyRateBps) || params.dailyRateBps <= 0) {
    throw new LedgerError("InvalidAmount", "dailyRateBps must be a positive integer");
  }
  if (params.minStake < 0n) {
    throw new LedgerError("InvalidAmount", "minStake must not be negative");
  }
  requirePeriod(params.lockPeriod, "lockPeriod");
  requirePeriod(params.cooldownPeriod, "cooldownPeriod");

  const duration = params.duration ?? null;
  if (duration !== null) {
    requirePeriod(duration, "duration");
    if (duration === 0) throw new LedgerError("InvalidAmount", "duration must be positive");
  }

  const id = state.nextPoolId;
  state.nextPoolId += 1;
  state.pools.set(id, {
    id,
    name: params.name,
    dailyRateBps: params.dailyRateBps,
    minStake: params.minStake,
    lockPeriod: params.lockPeriod,
    cooldownPeriod: params.cooldownPeriod,
    totalStaked: 0n,
    totalRewardsPaid: 0n,
    stakerCount: 0,
    createdAt: ctx.now,
    endsAt: duration === null ? null : ctx.now + duration,
    status: "active",
    rewardPoolBalance: 0n,
  });

  ctx.events.push({
    event: "pool-created",
    "pool-id": id,
    name: params.name,
    "reward-rate": params.dailyRateBps,
    "min-stake": params.minStake,
    "lock-period": params.lockPeriod,
    timestamp: ctx.now,
  });
  return id;
}

/** Move `amount` from the operator into the pool's reward balance. */
export function fundRewardPool(
  state: LedgerState,
  ctx: OperationContext,
  poolId: number,
  amount: bigint
): bigint {
  requireOperator(state, ctx.caller);
  const pool = requirePool(state, poolId);
  if (amount <= 0n) throw new LedgerError("InvalidAmount", "Funding amount must be positive");

  ctx.custody.settle([{ from: ctx.caller, to: state.custodian, amount }]);
  pool.rewardPoolBalance += amount;

  ctx.events.push({
    event: "pool-funded",
    "pool-id": poolId,
    amount,
    "new-balance": pool.rewardPoolBalance,
    timestamp: ctx.now,
  });
  return pool.rewardPoolBalance;
}

export function pausePool(state: LedgerState, ctx: OperationContext, poolId: number): PoolStatus {
  return transition(state, ctx, poolId, "active", "paused");
}

export function resumePool(state: LedgerState, ctx: OperationContext, poolId: number): PoolStatus {
  return transition(state, ctx, poolId, "paused", "active");
}

/** Close a pool for good. Existing positions can still claim and withdraw. */
export function endPool(state: LedgerState, ctx: OperationContext, poolId: number): PoolStatus {
  requireOperator(state, ctx.caller);
  const pool = requirePool(state, poolId);
  if (pool.status === "ended") {
    throw new LedgerError("PoolInactive", `Pool ${poolId} has already ended`);
  }
  pool.status = "ended";
  ctx.events.push({ event: "pool-ended", "pool-id": poolId, timestamp: ctx.now });
  return pool.status;
}

function transition(
  state: LedgerState,
  ctx: OperationContext,
  poolId: number,
  from: PoolStatus,
  to: "active" | "paused"
): PoolStatus {
  requireOperator(state, ctx.caller);
  const pool = requirePool(state, poolId);
  if (pool.status !== from) {
    throw new LedgerError("PoolInactive", `Pool ${poolId} is ${pool.status}, expected ${from}`);
  }
  // Lock and cooldown timers live on positions and are left alone.
  pool.status = to;
  ctx.events.push({
    event: to === "paused" ? "pool-paused" : "pool-resumed",
    "pool-id": poolId,
    timestamp: ctx.now,
  });
  return pool.status;
}
