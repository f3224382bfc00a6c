/**
 * custody.ts
 *
 * Value movement is owned by the surrounding execution environment. The
 * ledger only tells it what to move: every operation hands `settle` the
 * complete list of transfers after its checks pass and before it mutates
 * state. `settle` must apply all of them or throw.
 */

export interface Transfer {
  from: string;
  to: string;
  amount: bigint;
}

export interface Custody {
  settle(transfers: readonly Transfer[]): void;
}

export class CustodyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CustodyError";
  }
}

/**
 * Balance book kept in memory. Accounts start at zero and are funded with
 * `mint`.
 */
export class InMemoryCustody implements Custody {
  private readonly balances = new Map<string, bigint>();

  mint(account: string, amount: bigint): void {
    this.balances.set(account, this.balanceOf(account) + amount);
  }

  balanceOf(account: string): bigint {
    return this.balances.get(account) ?? 0n;
  }

  settle(transfers: readonly Transfer[]): void {
    // Dry run on a scratch copy of the touched accounts, then commit.
    const scratch = new Map<string, bigint>();
    const read = (account: string) => scratch.get(account) ?? this.balanceOf(account);

    for (const { from, to, amount } of transfers) {
      if (amount < 0n) throw new CustodyError(`Negative transfer of ${amount} from ${from}`);
      if (amount === 0n) continue;
      const available = read(from);
      if (available < amount) {
        throw new CustodyError(`Insufficient balance: ${from} holds ${available}, needs ${amount}`);
      }
      scratch.set(from, available - amount);
      scratch.set(to, read(to) + amount);
    }

    for (const [account, balance] of scratch) this.balances.set(account, balance);
  }
}
