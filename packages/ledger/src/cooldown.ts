/**
 * cooldown.ts
 *
 * Position exit state machine:
 *
 *   locked ──(unlockTime)──▶ unlocked ──start-cooldown──▶ cooldown-pending
 *                                ▲                              │
 *                                │                     (cooldownPeriod)
 *                                │                              ▼
 *                                └──── partial withdraw ── withdrawable
 *
 * A locked position may always leave early with a penalty; that path never
 * touches the cooldown.
 */

import type { CooldownPhase, CooldownState, Pool, Stake } from "@yieldlock/types";
import { LedgerError } from "./errors";
import { requirePool } from "./pools";
import { findPosition, requirePosition } from "./positions";
import type { LedgerState, OperationContext } from "./state";

type Timers = Pick<Stake, "unlockTime" | "cooldownStart">;
type Period = Pick<Pool, "cooldownPeriod">;

export function cooldownEndsAt(position: Timers, pool: Period): number | null {
  return position.cooldownStart === null ? null : position.cooldownStart + pool.cooldownPeriod;
}

export function cooldownPhase(position: Timers, pool: Period, now: number): CooldownPhase {
  if (now < position.unlockTime) return "locked";
  const endsAt = cooldownEndsAt(position, pool);
  if (endsAt === null) return "unlocked";
  return now < endsAt ? "cooldown-pending" : "withdrawable";
}

/** Returns the time at which the position becomes withdrawable. */
export function startCooldown(state: LedgerState, ctx: OperationContext, poolId: number): number {
  const pool = requirePool(state, poolId);
  const position = requirePosition(state, poolId, ctx.caller);

  const phase = cooldownPhase(position, pool, ctx.now);
  if (phase === "locked") {
    throw new LedgerError("CooldownActive", `Position is locked until ${position.unlockTime}`);
  }
  if (phase !== "unlocked") {
    throw new LedgerError("CooldownActive", "A cooldown has already been started");
  }

  position.cooldownStart = ctx.now;
  const endsAt = ctx.now + pool.cooldownPeriod;
  ctx.events.push({
    event: "cooldown-started",
    "pool-id": poolId,
    staker: ctx.caller,
    "cooldown-ends": endsAt,
    timestamp: ctx.now,
  });
  return endsAt;
}

export function getCooldownState(
  state: LedgerState,
  poolId: number,
  staker: string,
  now: number
): CooldownState | undefined {
  const pool = state.pools.get(poolId);
  const position = findPosition(state, poolId, staker);
  if (!pool || !position) return undefined;
  return {
    phase: cooldownPhase(position, pool, now),
    unlockTime: position.unlockTime,
    cooldownEndsAt: cooldownEndsAt(position, pool),
  };
}
