import type {
  LedgerEvent,
  LoyaltyTierRecord,
  Pool,
  Stake,
  Tier,
  TierBenefit,
  UserStats,
} from "@yieldlock/types";
import type { Custody } from "./custody";

/**
 * All mutable ledger state. Components receive it explicitly; nothing in
 * this package keeps module-level state.
 */
export interface LedgerState {
  operator: string;            // only principal allowed to run admin operations
  custodian: string;           // account holding staked principal and reward pools
  nextPoolId: number;
  pools: Map<number, Pool>;
  stakes: Map<string, Stake>;
  users: Map<string, UserStats>;
  tierRecords: Map<string, LoyaltyTierRecord>;
  tierBenefits: Map<Tier, TierBenefit>;   // empty until init-tier-benefits
  loyaltyEnabled: boolean;
  totals: {
    totalStaked: bigint;
    totalStakers: number;
    totalRewardsPaid: bigint;
    totalFeesCollected: bigint;
    totalTierUpgrades: number;
  };
}

/**
 * Per-call context. Events are appended only after an operation has passed
 * every check, so a thrown operation leaves `events` untouched.
 */
export interface OperationContext {
  caller: string;
  now: number;
  custody: Custody;
  events: LedgerEvent[];
}

export function createLedgerState(operator: string, custodian: string): LedgerState {
  return {
    operator,
    custodian,
    nextPoolId: 1,
    pools: new Map(),
    stakes: new Map(),
    users: new Map(),
    tierRecords: new Map(),
    tierBenefits: new Map(),
    loyaltyEnabled: false,
    totals: {
      totalStaked: 0n,
      totalStakers: 0,
      totalRewardsPaid: 0n,
      totalFeesCollected: 0n,
      totalTierUpgrades: 0,
    },
  };
}

export function positionKey(poolId: number, staker: string): string {
  return `${poolId}:${staker}`;
}
