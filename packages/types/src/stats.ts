/**
 * Protocol-wide aggregates, as returned by get-protocol-stats.
 */
export interface ProtocolStats {
  totalPools: number;
  totalStaked: bigint;
  totalStakers: number;        // distinct principals that ever staked
  totalRewardsPaid: bigint;
  totalFeesCollected: bigint;
  totalTierUpgrades: number;
}
