import { describe, it, expect, beforeEach } from "vitest";
import {
  CustodyError,
  InMemoryCustody,
  Ledger,
  ManualClock,
  type Transfer,
} from "@yieldlock/ledger";

// -----------------------------------------------------------------------
// Constants
// -----------------------------------------------------------------------

const STX       = 1_000_000n;
const START     = 1_000_000n * STX;
const T0        = 1_700_000_000;
const DAY       = 86_400;
const WEEK      = 7 * DAY;

const deployer  = "ST1PQHQKV0RJXZFY1DGX8MNSNYVE3VGZJSRTPGZGM";
const wallet1   = "ST1SJ3DTE5DN7X54YDH5D64R3BCB6A2AG2ZQ8YPD5";
const wallet2   = "ST2CY5V39NHDPWSXMW9QDT3HC3GD6Q6XX4CFRK9AG";
const CUSTODIAN = `${deployer}.staking-core`;
const ACCOUNTS  = [deployer, wallet1, wallet2, CUSTODIAN];

/** Custody that can be switched off to fail every settlement. */
class SwitchableCustody extends InMemoryCustody {
  offline = false;

  override settle(transfers: readonly Transfer[]): void {
    if (this.offline) throw new CustodyError("custody offline");
    super.settle(transfers);
  }
}

let clock: ManualClock;
let custody: SwitchableCustody;
let ledger: Ledger;

// -----------------------------------------------------------------------
// Helpers
// -----------------------------------------------------------------------

/**
 * Two pools:
 *   1: 5%/day, 1 STX minimum, 7-day lock, 1-day cooldown, 100 STX rewards
 *   2: 2%/day, 5 STX minimum, no lock, no cooldown, 50 STX rewards
 */
function setup() {
  clock = new ManualClock(T0);
  custody = new SwitchableCustody();
  for (const account of [deployer, wallet1, wallet2]) custody.mint(account, START);
  ledger = new Ledger({ operator: deployer, custodian: CUSTODIAN, clock, custody });
  ledger.createPool(deployer, { name: "Core", dailyRateBps: 500, minStake: STX, lockPeriod: WEEK, cooldownPeriod: DAY });
  ledger.createPool(deployer, { name: "Flex", dailyRateBps: 200, minStake: 5n * STX, lockPeriod: 0, cooldownPeriod: 0 });
  ledger.fundRewardPool(deployer, 1, 100n * STX);
  ledger.fundRewardPool(deployer, 2, 50n * STX);
}

function snapshot() {
  return {
    pools: ledger.listPools(),
    positions: [...ledger.listPositions(1), ...ledger.listPositions(2)],
    stats: ledger.getProtocolStats(),
    balances: ACCOUNTS.map((account) => custody.balanceOf(account)),
  };
}

function assertInvariants() {
  const pools = ledger.listPools();
  const stats = ledger.getProtocolStats();

  for (const pool of pools) {
    const positions = ledger.listPositions(pool.id);
    expect(pool.totalStaked).toBe(positions.reduce((sum, p) => sum + p.amount, 0n));
    expect(pool.stakerCount).toBe(positions.length);
    expect(pool.rewardPoolBalance).toBeGreaterThanOrEqual(0n);
  }
  expect(stats.totalStaked).toBe(pools.reduce((sum, p) => sum + p.totalStaked, 0n));

  // The custodian holds every principal plus every unspent reward balance.
  expect(custody.balanceOf(CUSTODIAN)).toBe(
    pools.reduce((sum, p) => sum + p.totalStaked + p.rewardPoolBalance, 0n)
  );
  // Fees all land with the operator.
  expect(custody.balanceOf(deployer)).toBe(START - 150n * STX + stats.totalFeesCollected);
  // Nothing is created or destroyed.
  expect(ACCOUNTS.reduce((sum, a) => sum + custody.balanceOf(a), 0n)).toBe(3n * START);
}

// -----------------------------------------------------------------------

describe("ledger properties", () => {
  beforeEach(setup);

  // =====================================================================
  // conservation
  // =====================================================================
  describe("conservation", () => {
    it("holds after every step of a mixed sequence", () => {
      const steps: Array<() => unknown> = [
        () => ledger.deposit(wallet1, 1, 10n * STX),
        () => ledger.deposit(wallet2, 1, 20n * STX),
        () => ledger.deposit(wallet2, 2, 5n * STX),
        () => clock.advance(DAY),
        () => ledger.claim(wallet1, 1),
        () => ledger.compound(wallet2, 1),
        () => ledger.startCooldown(wallet2, 2),
        () => ledger.withdraw(wallet2, 2, 5n * STX),
        () => ledger.withdraw(wallet1, 1, 2n * STX),
        () => ledger.deposit(wallet1, 1, 3n * STX),
        () => clock.advance(WEEK),
        () => ledger.startCooldown(wallet2, 1),
        () => clock.advance(DAY),
        () => ledger.claim(wallet2, 1),
        () => ledger.withdraw(wallet2, 1, 10n * STX),
      ];

      for (const step of steps) {
        step();
        assertInvariants();
      }

      expect(ledger.getPosition(1, wallet1)?.amount).toBe(11n * STX);
      expect(ledger.getPosition(2, wallet2)).toBeUndefined();
      expect(ledger.getProtocolStats().totalStakers).toBe(2);
    });

    it("early exit penalties are booked as fees", () => {
      ledger.deposit(wallet1, 1, 10n * STX);
      const { result } = ledger.withdraw(wallet1, 1, 2n * STX);
      expect(result.penalty).toBe(100_000n);
      expect(ledger.getProtocolStats().totalFeesCollected).toBe(100_000n);
      expect(ledger.getUserStats(wallet1)?.totalFeesPaid).toBe(100_000n);
      assertInvariants();
    });
  });

  // =====================================================================
  // atomicity
  // =====================================================================
  describe("atomicity", () => {
    it("a rejected operation changes nothing", () => {
      ledger.deposit(wallet1, 1, 10n * STX);
      clock.advance(WEEK);
      const before = snapshot();

      expect(() => ledger.withdraw(wallet1, 1, STX)).toThrow("Start a cooldown before withdrawing");
      expect(() => ledger.deposit(wallet2, 1, STX / 2n)).toThrow(/below the pool minimum/);
      expect(() => ledger.pausePool(wallet1, 1)).toThrow(/not the ledger operator/);

      expect(snapshot()).toEqual(before);
    });

    it("a deposit the staker cannot pay for opens no position", () => {
      const broke = `${deployer}.empty-wallet`;
      const before = snapshot();

      expect(() => ledger.deposit(broke, 1, 10n * STX)).toThrow(CustodyError);

      expect(ledger.getPosition(1, broke)).toBeUndefined();
      expect(ledger.getUserStats(broke)).toBeUndefined();
      expect(snapshot()).toEqual(before);
    });

    it("a failed payout leaves rewards pending", () => {
      ledger.deposit(wallet1, 1, 10n * STX);
      clock.advance(DAY);
      custody.offline = true;

      expect(() => ledger.claim(wallet1, 1)).toThrow("custody offline");
      expect(ledger.getPendingRewards(1, wallet1)).toBe(500_000n);
      expect(ledger.getPool(1)?.rewardPoolBalance).toBe(100n * STX);

      custody.offline = false;
      expect(ledger.claim(wallet1, 1).result.netRewards).toBe(450_000n);
      assertInvariants();
    });

    it("reads hand out copies", () => {
      ledger.deposit(wallet1, 1, 10n * STX);
      const pool = ledger.getPool(1);
      const position = ledger.getPosition(1, wallet1);
      if (!pool || !position) throw new Error("missing pool or position");

      pool.totalStaked = 0n;
      position.amount = 0n;

      expect(ledger.getPool(1)?.totalStaked).toBe(10n * STX);
      expect(ledger.getPosition(1, wallet1)?.amount).toBe(10n * STX);
    });
  });

  // =====================================================================
  // time
  // =====================================================================
  describe("time", () => {
    it("the manual clock refuses to run backwards", () => {
      clock.advance(DAY);
      expect(() => clock.set(T0)).toThrow(RangeError);
      expect(clock.now()).toBe(T0 + DAY);
    });

    it("events carry the operation's timestamp", () => {
      clock.advance(123);
      const { events } = ledger.deposit(wallet1, 1, 10n * STX);
      expect(events.map((e) => e.timestamp)).toEqual([T0 + 123]);
    });
  });
});
