// Print events emitted by the ledger. Field names are the wire format read
// by the indexer, so they stay kebab-case.

import type { Tier } from "./tier";

export type FeeType = "reward-fee" | "early-withdrawal" | "compound-fee";

export type PoolCreatedEvent = {
  event: "pool-created";
  "pool-id": number;
  name: string;
  "reward-rate": number;
  "min-stake": bigint;
  "lock-period": number;
  timestamp: number;
};

export type PoolFundedEvent = {
  event: "pool-funded";
  "pool-id": number;
  amount: bigint;
  "new-balance": bigint;
  timestamp: number;
};

export type StakeDepositedEvent = {
  event: "stake-deposited";
  "pool-id": number;
  staker: string;
  amount: bigint;
  "total-stake": bigint;
  "unlock-time": number;
  "is-new-staker": boolean;
  timestamp: number;
};

export type StakeWithdrawnEvent = {
  event: "stake-withdrawn";
  "pool-id": number;
  staker: string;
  amount: bigint;
  penalty: bigint;
  "net-amount": bigint;
  "is-early-withdrawal": boolean;
  "remaining-stake": bigint;
  timestamp: number;
};

export type RewardsClaimedEvent = {
  event: "rewards-claimed";
  "pool-id": number;
  staker: string;
  "gross-rewards": bigint;
  fee: bigint;
  "net-rewards": bigint;
  timestamp: number;
};

export type RewardsCompoundedEvent = {
  event: "rewards-compounded";
  "pool-id": number;
  staker: string;
  "rewards-compounded": bigint;
  fee: bigint;
  "new-stake-amount": bigint;
  timestamp: number;
};

export type FeeCollectedEvent = {
  event: "fee-collected";
  "pool-id": number;
  "fee-type": FeeType;
  amount: bigint;
  staker: string;
  timestamp: number;
};

export type CooldownStartedEvent = {
  event: "cooldown-started";
  "pool-id": number;
  staker: string;
  "cooldown-ends": number;
  timestamp: number;
};

export type TierUpgradedEvent = {
  event: "tier-upgraded";
  "pool-id": number;
  staker: string;
  "old-tier": Tier;
  "new-tier": Tier;
  timestamp: number;
};

export type TierInitializedEvent = {
  event: "tier-initialized";
  "pool-id": number;
  staker: string;
  tier: Tier;
  timestamp: number;
};

export type PoolStatusEvent = {
  event: "pool-paused" | "pool-resumed" | "pool-ended";
  "pool-id": number;
  timestamp: number;
};

export type LedgerEvent =
  | PoolCreatedEvent
  | PoolFundedEvent
  | StakeDepositedEvent
  | StakeWithdrawnEvent
  | RewardsClaimedEvent
  | RewardsCompoundedEvent
  | FeeCollectedEvent
  | CooldownStartedEvent
  | TierUpgradedEvent
  | TierInitializedEvent
  | PoolStatusEvent;

export type LedgerEventName = LedgerEvent["event"];
