import "dotenv/config";

const DEVNET_DEPLOYER = "ST1PQHQKV0RJXZFY1DGX8MNSNYVE3VGZJSRTPGZGM";

export const config = {
  network: process.env.STACKS_NETWORK ?? "devnet",
  logLevel: process.env.LOG_LEVEL ?? "info",

  ledger: {
    // Principal allowed to create, fund, pause, resume and end pools.
    // Collects reward fees and early-withdrawal penalties.
    operator: process.env.LEDGER_OPERATOR ?? DEVNET_DEPLOYER,

    // Contract principal that holds staked principal and reward pools.
    // Events are published under this contract identifier.
    custodian: process.env.LEDGER_CUSTODIAN ?? `${DEVNET_DEPLOYER}.staking-core`,

    // NDJSON operation journal, one contract call per line, in time order.
    journalPath: process.env.JOURNAL_PATH ?? "apps/node/fixtures/sample-journal.ndjson",

    // Opening balances credited to each journal caller before replay
    // (smallest unit). Custody is kept in memory by this process.
    openingBalance: BigInt(process.env.OPENING_BALANCE ?? "1000000000000"),
  },

  indexer: {
    // Chainhook-compatible endpoint of the event indexer. Publishing is
    // skipped when unset.
    url: process.env.INDEXER_URL ?? "",
    authToken: process.env.INDEXER_AUTH_TOKEN ?? "",

    // Transactions per webhook request.
    batchSize: 50,
  },
} as const;
