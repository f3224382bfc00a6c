/**
 * replay.ts
 *
 * Applies a journal to a ledger one entry at a time, each at its own
 * timestamp, the way the chain would apply one transaction per block.
 *
 * A call the ledger rejects is logged and skipped; the ledger is unchanged
 * by it and replay carries on. Anything else aborts the replay.
 */

import { createHash } from "node:crypto";
import type { StacksNetwork } from "@stacks/network";
import { isLedgerError, type Ledger, type ManualClock, type Receipt } from "@yieldlock/ledger";
import type { LedgerEvent } from "@yieldlock/types";
import type { JournalEntry } from "./journal";
import { logger } from "./logger";
import type { IndexerPublisher } from "./publisher";
import { isPrincipalFor } from "./stacks";

export interface ReplayOutcome {
  applied: number;
  rejected: number;
  events: number;
}

export interface Rejection {
  line: number;
  op: JournalEntry["op"];
  reason: string;
  code: number | null;
}

export class JournalReplayer {
  readonly rejections: Rejection[] = [];

  constructor(
    private readonly ledger: Ledger,
    private readonly clock: ManualClock,
    private readonly network: StacksNetwork,
    private readonly publisher?: IndexerPublisher
  ) {}

  async run(entries: readonly JournalEntry[]): Promise<ReplayOutcome> {
    const outcome: ReplayOutcome = { applied: 0, rejected: 0, events: 0 };

    for (const entry of entries) {
      const events = this.applyEntry(entry);
      if (events === null) {
        outcome.rejected++;
        continue;
      }
      outcome.applied++;
      outcome.events += events.length;
      this.publisher?.enqueue({ blockHeight: entry.line, txId: txIdFor(entry), events });
    }

    if (this.publisher) await this.publisher.flush();

    logger.info(
      `Replay finished: applied: ${outcome.applied}, rejected: ${outcome.rejected}, events: ${outcome.events}`
    );
    return outcome;
  }

  /** Returns the emitted events, or null if the call was rejected. */
  applyEntry(entry: JournalEntry): LedgerEvent[] | null {
    this.clock.set(entry.at);

    if (!isPrincipalFor(entry.caller, this.network)) {
      this.reject(entry, `caller ${entry.caller} is not a principal on this network`, null);
      return null;
    }

    try {
      const receipt = this.dispatch(entry);
      logger.debug(`line ${entry.line}: ${entry.op} ok → ${receipt.events.map((e) => e.event).join(", ")}`);
      return receipt.events;
    } catch (err) {
      if (!isLedgerError(err)) throw err;
      this.reject(entry, err.message, err.code);
      return null;
    }
  }

  private dispatch(entry: JournalEntry): Receipt<unknown> {
    const { caller } = entry;
    switch (entry.op) {
      case "create-pool":
        return this.ledger.createPool(caller, entry.args);
      case "fund-pool":
        return this.ledger.fundRewardPool(caller, entry.args.poolId, entry.args.amount);
      case "pause-pool":
        return this.ledger.pausePool(caller, entry.args.poolId);
      case "resume-pool":
        return this.ledger.resumePool(caller, entry.args.poolId);
      case "end-pool":
        return this.ledger.endPool(caller, entry.args.poolId);
      case "init-tier-benefits":
        return this.ledger.initializeTierBenefits(caller, entry.args.benefits);
      case "set-loyalty-enabled":
        return this.ledger.setLoyaltyEnabled(caller, entry.args.enabled);
      case "deposit":
        return this.ledger.deposit(caller, entry.args.poolId, entry.args.amount);
      case "withdraw":
        return this.ledger.withdraw(caller, entry.args.poolId, entry.args.amount);
      case "start-cooldown":
        return this.ledger.startCooldown(caller, entry.args.poolId);
      case "claim":
        return this.ledger.claim(caller, entry.args.poolId);
      case "claim-with-tier-bonus":
        return this.ledger.claimWithTierBonus(caller, entry.args.poolId);
      case "compound":
        return this.ledger.compound(caller, entry.args.poolId);
      case "check-tier":
        return this.ledger.checkAndUpgradeTier(caller, entry.args.poolId);
    }
  }

  private reject(entry: JournalEntry, reason: string, code: number | null): void {
    this.rejections.push({ line: entry.line, op: entry.op, reason, code });
    logger.warn(`line ${entry.line}: ${entry.op} rejected${code === null ? "" : ` (err u${code})`}: ${reason}`);
  }
}

/** Deterministic transaction id for a journal entry. */
export function txIdFor(entry: JournalEntry): string {
  const { line, ...call } = entry;
  const digest = createHash("sha256")
    .update(`${line}:${JSON.stringify(call, (_key, value: unknown) => (typeof value === "bigint" ? value.toString() : value))}`)
    .digest("hex");
  return `0x${digest}`;
}
