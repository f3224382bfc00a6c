/**
 * publisher.ts
 *
 * Forwards ledger events to the indexer as Chainhook "apply" payloads, so
 * the indexer ingests replayed operations exactly as it ingests on-chain
 * print events. Each applied operation becomes one block with one
 * transaction.
 */

import type { LedgerEvent } from "@yieldlock/types";
import { eventToHex, eventToJson } from "./clarity";
import { logger } from "./logger";

export interface PublishedTransaction {
  blockHeight: number;
  txId: string;
  events: LedgerEvent[];
}

export interface PublisherOptions {
  url: string;
  authToken: string;
  batchSize: number;
  contractId: string;
}

export interface ChainhookPayload {
  apply: {
    block_identifier: { index: number };
    transactions: {
      transaction_identifier: { hash: string };
      metadata: {
        receipt: {
          events: {
            type: "SmartContractEvent";
            data: {
              contract_identifier: string;
              topic: "print";
              value: ReturnType<typeof eventToJson>;
              raw_value: string;
            };
          }[];
        };
      };
    }[];
  }[];
}

export function buildChainhookPayload(
  transactions: readonly PublishedTransaction[],
  contractId: string
): ChainhookPayload {
  return {
    apply: transactions.map((tx) => ({
      block_identifier: { index: tx.blockHeight },
      transactions: [
        {
          transaction_identifier: { hash: tx.txId },
          metadata: {
            receipt: {
              events: tx.events.map((event) => ({
                type: "SmartContractEvent" as const,
                data: {
                  contract_identifier: contractId,
                  topic: "print" as const,
                  value: eventToJson(event),
                  raw_value: eventToHex(event),
                },
              })),
            },
          },
        },
      ],
    })),
  };
}

export class IndexerPublisher {
  private pending: PublishedTransaction[] = [];

  constructor(
    private readonly options: PublisherOptions,
    private readonly fetchImpl: typeof fetch = fetch
  ) {}

  get pendingCount(): number {
    return this.pending.length;
  }

  enqueue(tx: PublishedTransaction): void {
    if (tx.events.length === 0) return;
    this.pending.push(tx);
  }

  /**
   * POST everything queued, `batchSize` transactions per request. Returns
   * the number of events delivered. A rejected batch and everything after
   * it stay queued.
   */
  async flush(): Promise<number> {
    let delivered = 0;
    while (this.pending.length > 0) {
      const batch = this.pending.slice(0, this.options.batchSize);
      const payload = buildChainhookPayload(batch, this.options.contractId);

      const resp = await this.fetchImpl(this.options.url, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${this.options.authToken}`,
        },
        body: JSON.stringify(payload),
      });
      if (!resp.ok) {
        throw new Error(`Indexer rejected batch: ${resp.status} ${resp.statusText}`);
      }

      this.pending = this.pending.slice(batch.length);
      const count = batch.reduce((sum, tx) => sum + tx.events.length, 0);
      delivered += count;
      logger.info(`Published ${count} events in ${batch.length} transactions`);
    }
    return delivered;
  }
}
