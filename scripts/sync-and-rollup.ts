#!/usr/bin/env tsx
/**
 * Sync and Rollup
 *
 * Applies chapter-token logs emitted since the last run to the saved ledger,
 * rolls up one period and saves the ledger again.
 *
 * Usage:
 *   npm run rollup -- 202403            # roll up period 2024-03
 *   npm run rollup -- 202403 --force    # roll up even if the period already has rows
 *
 * Environment Variables:
 *   LEDGER_OWNER               # owner address (required)
 *   LEDGER_PLATFORM_OPERATOR   # operator address (default: owner)
 *   LEDGER_CHAIN_ID            # default 146
 *   LEDGER_RPC_URL             # default: first RPC of the chain
 *   LEDGER_CHAPTER_TOKEN       # chapter token address (required until config.ts names one)
 *   LEDGER_STATE_FILE          # default ledger-state.json
 */

import { getLedgerConfig } from "../config";
import { ActivityLedger } from "../src/services/ledger";
import { createContractBalanceSource } from "../src/services/balances";
import { loadLedgerState, saveLedgerState } from "../src/services/persistence";
import { createTokenEventRouter } from "../src/handlers/token";
import { fetchContractLogs, log, logError, logHeader, logInfo, logSuccess, logWarning } from "./utils";

async function main(): Promise<void> {
  const [periodArg, ...flags] = process.argv.slice(2);
  const period = Number(periodArg);
  if (!Number.isInteger(period)) {
    throw new Error("Usage: sync-and-rollup <YYYYMM> [--force]");
  }
  const force = flags.includes("--force");

  const config = getLedgerConfig();
  const tokenAddress = config.chapterToken;

  logHeader(`${config.chain.name}: rollup ${period}`);

  const saved = await loadLedgerState(config.stateFile);
  if (saved && saved.chainId !== config.chain.chainId) {
    throw new Error(`${config.stateFile} belongs to chain ${saved.chainId}, not ${config.chain.chainId}`);
  }
  if (saved) {
    logInfo(`Loaded ledger from ${config.stateFile}`);
  } else {
    logWarning(`No ledger at ${config.stateFile}, starting empty`);
  }

  const ledger = new ActivityLedger({
    chainId: config.chain.chainId,
    owner: config.owner,
    platformOperator: config.platformOperator,
    balances: createContractBalanceSource({ rpcUrl: config.rpcUrl, tokenAddress }),
    rollupTimeoutMs: config.rollupTimeoutMs,
    balanceReadConcurrency: config.balanceReadConcurrency,
    db: saved?.db,
  });

  // Resume after the last applied block so no log is counted twice.
  const fromBlock =
    ledger.lastSyncedBlock !== undefined ? ledger.lastSyncedBlock + 1n : BigInt(config.chain.startBlock);
  const handle = createTokenEventRouter(ledger, ledger.platformOperator);
  const { logs, toBlock } = await fetchContractLogs(config.rpcUrl, tokenAddress, fromBlock);
  let applied = 0;
  for (const entry of logs) {
    if (await handle(entry)) applied++;
  }
  if (toBlock >= fromBlock) {
    await ledger.markSynced(ledger.platformOperator, toBlock);
  }
  logSuccess(`Applied ${applied} of ${logs.length} logs from blocks ${fromBlock}-${toBlock}`);
  await saveLedgerState(config.stateFile, config.chain.chainId, ledger.getDb());

  if (ledger.hasRollup(period) && !force) {
    logError(`Period ${period} already has snapshot rows; pass --force to append another set`);
    process.exitCode = 1;
    return;
  }

  const result = await ledger.rollupForPeriod(ledger.owner, period);
  for (const row of result.creators) {
    log(
      `   creator  ${row.address} published=${row.monthlyPublished}/${row.totalPublished} acquired=${row.monthlyAcquired}/${row.totalAcquired} held=${row.totalHeld}`
    );
  }
  for (const row of result.investors) {
    log(`   investor ${row.address} acquired=${row.monthlyAcquired}/${row.totalAcquired} held=${row.totalHeld}`);
  }

  await saveLedgerState(config.stateFile, config.chain.chainId, ledger.getDb());
  logSuccess(`Saved ledger to ${config.stateFile}`);
}

main().catch((error: unknown) => {
  logError(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
