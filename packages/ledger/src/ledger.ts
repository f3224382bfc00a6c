/**
 * ledger.ts
 *
 * The public call surface. Each method reads the clock once, runs one
 * component operation against the ledger state and returns its result
 * together with the events it emitted. Operations are synchronous and
 * all-or-nothing: a thrown LedgerError (or CustodyError) leaves state and
 * balances exactly as they were.
 */

import type {
  CooldownState,
  LedgerEvent,
  Pool,
  PoolParams,
  PoolStatus,
  ProtocolStats,
  Stake,
  Tier,
  TierBenefit,
  TierInfo,
  UserStats,
  WithdrawalQuote,
} from "@yieldlock/types";
import { monotonic, systemClock, type Clock } from "./clock";
import { InMemoryCustody, type Custody } from "./custody";
import { startCooldown, getCooldownState } from "./cooldown";
import { createPool, endPool, fundRewardPool, pausePool, resumePool } from "./pools";
import { findPosition } from "./positions";
import {
  claim,
  claimWithTierBonus,
  compound,
  pendingRewards,
  type ClaimResult,
  type CompoundResult,
  type TierClaimResult,
} from "./rewards";
import { createLedgerState, type LedgerState, type OperationContext } from "./state";
import { deposit, quoteWithdrawal, withdraw, type DepositResult } from "./stakes";
import {
  benefitFor,
  checkAndUpgradeTier,
  getTierInfo,
  initializeTierBenefits,
  setLoyaltyEnabled,
} from "./tiers";

export interface LedgerOptions {
  operator: string;
  custodian: string;
  clock?: Clock;
  custody?: Custody;
}

export interface Receipt<T> {
  result: T;
  events: LedgerEvent[];
}

export class Ledger {
  private readonly state: LedgerState;
  private readonly clock: Clock;
  private readonly custody: Custody;

  constructor(options: LedgerOptions) {
    this.state = createLedgerState(options.operator, options.custodian);
    this.clock = monotonic(options.clock ?? systemClock);
    this.custody = options.custody ?? new InMemoryCustody();
  }

  get operator(): string {
    return this.state.operator;
  }

  get custodian(): string {
    return this.state.custodian;
  }

  // -----------------------------------------------------------------------
  // Operator calls
  // -----------------------------------------------------------------------

  createPool(caller: string, params: PoolParams): Receipt<number> {
    return this.execute(caller, (ctx) => createPool(this.state, ctx, params));
  }

  fundRewardPool(caller: string, poolId: number, amount: bigint): Receipt<bigint> {
    return this.execute(caller, (ctx) => fundRewardPool(this.state, ctx, poolId, amount));
  }

  pausePool(caller: string, poolId: number): Receipt<PoolStatus> {
    return this.execute(caller, (ctx) => pausePool(this.state, ctx, poolId));
  }

  resumePool(caller: string, poolId: number): Receipt<PoolStatus> {
    return this.execute(caller, (ctx) => resumePool(this.state, ctx, poolId));
  }

  endPool(caller: string, poolId: number): Receipt<PoolStatus> {
    return this.execute(caller, (ctx) => endPool(this.state, ctx, poolId));
  }

  initializeTierBenefits(caller: string, benefits?: Readonly<Record<Tier, TierBenefit>>): Receipt<void> {
    return this.execute(caller, (ctx) => initializeTierBenefits(this.state, ctx, benefits));
  }

  setLoyaltyEnabled(caller: string, enabled: boolean): Receipt<boolean> {
    return this.execute(caller, (ctx) => setLoyaltyEnabled(this.state, ctx, enabled));
  }

  // -----------------------------------------------------------------------
  // Staker calls (scoped to the caller's own position)
  // -----------------------------------------------------------------------

  deposit(caller: string, poolId: number, amount: bigint): Receipt<DepositResult> {
    return this.execute(caller, (ctx) => deposit(this.state, ctx, poolId, amount));
  }

  withdraw(caller: string, poolId: number, amount: bigint): Receipt<WithdrawalQuote> {
    return this.execute(caller, (ctx) => withdraw(this.state, ctx, poolId, amount));
  }

  startCooldown(caller: string, poolId: number): Receipt<number> {
    return this.execute(caller, (ctx) => startCooldown(this.state, ctx, poolId));
  }

  claim(caller: string, poolId: number): Receipt<ClaimResult> {
    return this.execute(caller, (ctx) => claim(this.state, ctx, poolId));
  }

  claimWithTierBonus(caller: string, poolId: number): Receipt<TierClaimResult> {
    return this.execute(caller, (ctx) => claimWithTierBonus(this.state, ctx, poolId));
  }

  compound(caller: string, poolId: number): Receipt<CompoundResult> {
    return this.execute(caller, (ctx) => compound(this.state, ctx, poolId));
  }

  checkAndUpgradeTier(caller: string, poolId: number): Receipt<Tier> {
    return this.execute(caller, (ctx) => checkAndUpgradeTier(this.state, ctx, poolId));
  }

  // -----------------------------------------------------------------------
  // Read-only (copies, never live state)
  // -----------------------------------------------------------------------

  getPool(poolId: number): Pool | undefined {
    const pool = this.state.pools.get(poolId);
    return pool && { ...pool };
  }

  listPools(): Pool[] {
    return [...this.state.pools.values()].map((pool) => ({ ...pool }));
  }

  getPosition(poolId: number, staker: string): Stake | undefined {
    const position = findPosition(this.state, poolId, staker);
    return position && { ...position };
  }

  listPositions(poolId: number): Stake[] {
    return [...this.state.stakes.values()]
      .filter((position) => position.poolId === poolId)
      .map((position) => ({ ...position }));
  }

  getUserStats(staker: string): UserStats | undefined {
    const user = this.state.users.get(staker);
    return user && { ...user };
  }

  getProtocolStats(): ProtocolStats {
    return { totalPools: this.state.pools.size, ...this.state.totals };
  }

  /** Pending rewards for a position right now; 0 when there is no position. */
  getPendingRewards(poolId: number, staker: string): bigint {
    const pool = this.state.pools.get(poolId);
    const position = findPosition(this.state, poolId, staker);
    return pool && position ? pendingRewards(position, pool, this.clock.now()) : 0n;
  }

  previewWithdrawal(poolId: number, staker: string, amount: bigint): WithdrawalQuote {
    return quoteWithdrawal(this.state, poolId, staker, amount, this.clock.now());
  }

  getCooldownState(poolId: number, staker: string): CooldownState | undefined {
    return getCooldownState(this.state, poolId, staker, this.clock.now());
  }

  getTierInfo(poolId: number, staker: string): TierInfo | undefined {
    return getTierInfo(this.state, poolId, staker, this.clock.now());
  }

  getTierBenefits(): Record<Tier, TierBenefit> {
    const copy = (tier: Tier) => ({ ...benefitFor(this.state, tier) });
    return {
      Bronze: copy("Bronze"),
      Silver: copy("Silver"),
      Gold: copy("Gold"),
      Platinum: copy("Platinum"),
    };
  }

  isLoyaltyEnabled(): boolean {
    return this.state.loyaltyEnabled;
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  private execute<T>(caller: string, operation: (ctx: OperationContext) => T): Receipt<T> {
    const ctx: OperationContext = {
      caller,
      now: this.clock.now(),
      custody: this.custody,
      events: [],
    };
    const result = operation(ctx);
    return { result, events: ctx.events };
  }
}
