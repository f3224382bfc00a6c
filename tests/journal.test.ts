import { describe, it, expect } from "vitest";
import { JournalError, parseJournal } from "../apps/node/src/journal";

const deployer = "ST1PQHQKV0RJXZFY1DGX8MNSNYVE3VGZJSRTPGZGM";
const wallet1  = "ST1SJ3DTE5DN7X54YDH5D64R3BCB6A2AG2ZQ8YPD5";

function line(at: number, caller: string, op: string, args: Record<string, unknown>): string {
  return JSON.stringify({ at, caller, op, args });
}

describe("journal", () => {
  it("parses one call per line, keeping line numbers", () => {
    const entries = parseJournal(
      [
        "# setup",
        line(100, deployer, "create-pool", {
          name: "STX Pool",
          dailyRateBps: 500,
          minStake: "1000000",
          lockPeriod: 604_800,
          cooldownPeriod: 86_400,
        }),
        "",
        line(200, wallet1, "deposit", { poolId: 1, amount: 10_000_000 }),
      ].join("\n")
    );

    expect(entries).toHaveLength(2);
    expect(entries[0]).toMatchObject({ line: 2, at: 100, op: "create-pool", args: { minStake: 1_000_000n } });
    expect(entries[1]).toEqual({
      line: 4,
      at: 200,
      caller: wallet1,
      op: "deposit",
      args: { poolId: 1, amount: 10_000_000n },
    });
  });

  it("reads amounts past 2^53 from decimal strings", () => {
    const [entry] = parseJournal(line(0, deployer, "fund-pool", { poolId: 1, amount: "9007199254740993" }));
    expect(entry?.op === "fund-pool" && entry.args.amount).toBe(9_007_199_254_740_993n);
  });

  it("accepts CRLF line endings", () => {
    const text = `${line(0, wallet1, "claim", { poolId: 1 })}\r\n${line(1, wallet1, "compound", { poolId: 1 })}\r\n`;
    expect(parseJournal(text).map((e) => e.op)).toEqual(["claim", "compound"]);
  });

  it("takes optional tier benefits", () => {
    const [entry] = parseJournal(line(0, deployer, "init-tier-benefits", {}));
    expect(entry).toMatchObject({ op: "init-tier-benefits", args: {} });
  });

  // =====================================================================
  // errors
  // =====================================================================
  describe("errors", () => {
    it("reports invalid JSON with its line", () => {
      const text = `${line(0, wallet1, "claim", { poolId: 1 })}\n{"at":`;
      expect(() => parseJournal(text)).toThrow(/^journal line 2: invalid JSON/);
    });

    it("rejects unknown operations", () => {
      expect(() => parseJournal(line(0, wallet1, "mint", { poolId: 1 }))).toThrow(
        /^journal line 1: op: Invalid discriminator value/
      );
    });

    it("rejects fractional amounts", () => {
      expect(() => parseJournal(line(0, wallet1, "deposit", { poolId: 1, amount: "12.5" }))).toThrow(
        "journal line 1: args.amount: expected a decimal integer"
      );
    });

    it("rejects numeric amounts that a double cannot hold exactly", () => {
      const text = `{"at":0,"caller":"${deployer}","op":"fund-pool","args":{"poolId":1,"amount":9007199254740993}}`;
      expect(() => parseJournal(text)).toThrow(JournalError);
      expect(() => parseJournal(text)).toThrow(
        "journal line 1: args.amount: amounts past 2^53 must be decimal strings"
      );
    });

    it("accepts the largest exact numeric amount", () => {
      const [entry] = parseJournal(line(0, deployer, "fund-pool", { poolId: 1, amount: Number.MAX_SAFE_INTEGER }));
      expect(entry?.op === "fund-pool" && entry.args.amount).toBe(9_007_199_254_740_991n);
    });

    it("rejects pool names outside printable ASCII", () => {
      const create = (name: string) =>
        line(0, deployer, "create-pool", {
          name,
          dailyRateBps: 500,
          minStake: "1000000",
          lockPeriod: 0,
          cooldownPeriod: 0,
        });
      expect(() => parseJournal(create("Pool €"))).toThrow("journal line 1: args.name: expected printable ASCII");
      expect(() => parseJournal(create(""))).toThrow("journal line 1: args.name: expected printable ASCII");
    });

    it("rejects a missing pool id", () => {
      expect(() => parseJournal(line(0, wallet1, "claim", {}))).toThrow(/^journal line 1: args\.poolId: /);
    });

    it("rejects timestamps that go backwards", () => {
      const text = [line(500, wallet1, "claim", { poolId: 1 }), line(499, wallet1, "claim", { poolId: 1 })].join("\n");
      try {
        parseJournal(text);
        throw new Error("expected a JournalError");
      } catch (err) {
        expect(err).toBeInstanceOf(JournalError);
        expect(err instanceof JournalError && err.line).toBe(2);
        expect(err instanceof Error && err.message).toBe("journal line 2: timestamp 499 is earlier than 500");
      }
    });
  });
});
