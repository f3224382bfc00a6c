/**
 * journal.ts
 *
 * Operation journal: NDJSON, one contract call per line, e.g.
 *
 *   {"at":1700000000,"caller":"ST1…","op":"deposit","args":{"poolId":1,"amount":"10000000"}}
 *
 * Amounts may be JSON numbers up to 2^53 - 1 or decimal strings of any
 * size. Pool names are printable ASCII, as Clarity string-ascii holds.
 * Blank lines and lines starting with "#" are ignored. Timestamps must not
 * decrease from one entry to the next.
 */

import { z } from "zod";

const amount = z
  .union([
    z.string().regex(/^\d+$/, "expected a decimal integer"),
    z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER, "amounts past 2^53 must be decimal strings"),
  ])
  .transform((value) => BigInt(value));
const poolId = z.number().int().positive();
const seconds = z.number().int().nonnegative();

const poolArgs = z.object({ poolId });
const amountArgs = z.object({ poolId, amount });

const benefit = z.object({
  name: z.string(),
  rewardBonusBps: z.number().int(),
  feeDiscountBps: z.number().int(),
  minDaysStaked: z.number().int(),
});

const call = <Op extends string, Args extends z.ZodTypeAny>(op: Op, args: Args) =>
  z.object({
    at: seconds,
    caller: z.string().min(1),
    op: z.literal(op),
    args,
  });

export const journalEntrySchema = z.discriminatedUnion("op", [
  call(
    "create-pool",
    z.object({
      name: z.string().regex(/^[\x20-\x7E]+$/, "expected printable ASCII"),
      dailyRateBps: z.number().int(),
      minStake: amount,
      lockPeriod: seconds,
      cooldownPeriod: seconds,
      duration: seconds.nullable().optional(),
    })
  ),
  call("fund-pool", amountArgs),
  call("pause-pool", poolArgs),
  call("resume-pool", poolArgs),
  call("end-pool", poolArgs),
  call(
    "init-tier-benefits",
    z.object({
      benefits: z
        .object({ Bronze: benefit, Silver: benefit, Gold: benefit, Platinum: benefit })
        .optional(),
    })
  ),
  call("set-loyalty-enabled", z.object({ enabled: z.boolean() })),
  call("deposit", amountArgs),
  call("withdraw", amountArgs),
  call("start-cooldown", poolArgs),
  call("claim", poolArgs),
  call("claim-with-tier-bonus", poolArgs),
  call("compound", poolArgs),
  call("check-tier", poolArgs),
]);

export type JournalEntry = z.infer<typeof journalEntrySchema> & { line: number };
export type JournalOp = JournalEntry["op"];

export class JournalError extends Error {
  constructor(
    readonly line: number,
    message: string
  ) {
    super(`journal line ${line}: ${message}`);
    this.name = "JournalError";
  }
}

export function parseJournal(text: string): JournalEntry[] {
  const entries: JournalEntry[] = [];
  const lines = text.split(/\r?\n/);

  lines.forEach((raw, index) => {
    const line = index + 1;
    const trimmed = raw.trim();
    if (trimmed === "" || trimmed.startsWith("#")) return;

    let json: unknown;
    try {
      json = JSON.parse(trimmed);
    } catch (err) {
      throw new JournalError(line, `invalid JSON (${err instanceof Error ? err.message : String(err)})`);
    }

    const parsed = journalEntrySchema.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const path = issue ? issue.path.join(".") : "";
      throw new JournalError(line, `${path ? `${path}: ` : ""}${issue?.message ?? "invalid entry"}`);
    }

    const previous = entries[entries.length - 1];
    if (previous && parsed.data.at < previous.at) {
      throw new JournalError(line, `timestamp ${parsed.data.at} is earlier than ${previous.at}`);
    }
    entries.push({ ...parsed.data, line });
  });

  return entries;
}
