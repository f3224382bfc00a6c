/**
 * Yieldlock ledger node
 *
 * Hosts the staking ledger as its execution environment: replays an
 * operation journal against a fresh ledger, one call at a time at the
 * call's own timestamp, and forwards every emitted print event to the
 * indexer in Chainhook format.
 *
 * Usage:
 *   npm start                                  replay JOURNAL_PATH
 *   npm start -- --journal ./ops.ndjson        replay another journal
 *
 * Environment variables (see .env.example):
 *   STACKS_NETWORK, LEDGER_OPERATOR, LEDGER_CUSTODIAN, JOURNAL_PATH,
 *   OPENING_BALANCE, INDEXER_URL, INDEXER_AUTH_TOKEN, LOG_LEVEL
 */

import { readFile } from "node:fs/promises";
import { InMemoryCustody, Ledger, ManualClock } from "@yieldlock/ledger";
import { config } from "./config";
import { parseJournal } from "./journal";
import { logger } from "./logger";
import { IndexerPublisher } from "./publisher";
import { JournalReplayer } from "./replay";
import { getNetwork, isPrincipalFor, parseContractId } from "./stacks";

async function main() {
  const network = getNetwork();
  const { operator, custodian, openingBalance } = config.ledger;
  const [, contractName] = parseContractId(custodian);

  logger.info(`Yieldlock ledger node: network ${config.network}, contract: ${contractName}`);

  if (!isPrincipalFor(operator, network) || !isPrincipalFor(custodian, network)) {
    logger.error(`LEDGER_OPERATOR and LEDGER_CUSTODIAN must be ${config.network} principals. Exiting.`);
    process.exit(1);
  }

  const journalArg = process.argv.indexOf("--journal");
  const journalPath = journalArg !== -1 ? process.argv[journalArg + 1] ?? config.ledger.journalPath : config.ledger.journalPath;
  const entries = parseJournal(await readFile(journalPath, "utf8"));
  logger.info(`Loaded ${entries.length} journal entries from ${journalPath}`);

  // Every principal in the journal starts with the same opening balance.
  const custody = new InMemoryCustody();
  for (const caller of new Set(entries.map((e) => e.caller))) custody.mint(caller, openingBalance);

  const clock = new ManualClock(entries[0]?.at ?? 0);
  const ledger = new Ledger({ operator, custodian, clock, custody });

  const publisher = config.indexer.url
    ? new IndexerPublisher({
        url: config.indexer.url,
        authToken: config.indexer.authToken,
        batchSize: config.indexer.batchSize,
        contractId: custodian,
      })
    : undefined;
  if (!publisher) logger.info("INDEXER_URL is not set, events will not be published.");

  const replayer = new JournalReplayer(ledger, clock, network, publisher);
  await replayer.run(entries);

  const stats = ledger.getProtocolStats();
  logger.info(
    `Protocol: pools ${stats.totalPools}, staked: ${stats.totalStaked}, stakers: ${stats.totalStakers}, ` +
      `rewards paid: ${stats.totalRewardsPaid}, fees: ${stats.totalFeesCollected}`
  );
  for (const pool of ledger.listPools()) {
    logger.info(
      `Pool #${pool.id} ${pool.name} [${pool.status}] TVL: ${pool.totalStaked}, stakers: ${pool.stakerCount}, ` +
        `reward balance: ${pool.rewardPoolBalance}`
    );
  }
}

main().catch((err) => {
  logger.error(`Fatal: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
