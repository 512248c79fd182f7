/**
 * Utility functions for operator scripts
 */

import { createPublicClient, http, type Address } from "viem";
import type { TokenLog } from "../src/handlers/token";
import { withRetry } from "../src/utils/errors";

const BLOCK_RANGE = 10_000n;

export interface FetchedLogs {
  logs: TokenLog[];
  /** Last block covered by the fetch */
  toBlock: bigint;
}

/**
 * Fetch every log emitted by `address` between two blocks, in ranges the
 * public RPCs accept. Each log carries its block time.
 */
export async function fetchContractLogs(
  rpcUrl: string,
  address: Address,
  fromBlock: bigint,
  toBlock?: bigint
): Promise<FetchedLogs> {
  const client = createPublicClient({ transport: http(rpcUrl) });
  const lastBlock = toBlock ?? (await withRetry(() => client.getBlockNumber()));
  const blockTimes = new Map<bigint, bigint>();
  const logs: TokenLog[] = [];

  const blockTime = async (blockNumber: bigint): Promise<bigint> => {
    const cached = blockTimes.get(blockNumber);
    if (cached !== undefined) return cached;
    const block = await withRetry(() => client.getBlock({ blockNumber }));
    blockTimes.set(blockNumber, block.timestamp);
    return block.timestamp;
  };

  for (let start = fromBlock; start <= lastBlock; start += BLOCK_RANGE) {
    const end = start + BLOCK_RANGE - 1n < lastBlock ? start + BLOCK_RANGE - 1n : lastBlock;
    const batch = await withRetry(() => client.getLogs({ address, fromBlock: start, toBlock: end }));
    for (const log of batch) {
      if (log.blockNumber === null) continue;
      logs.push({ ...log, blockTimestamp: await blockTime(log.blockNumber) });
    }
    logInfo(`Fetched ${batch.length} logs for blocks ${start}-${end}`);
  }

  return { logs, toBlock: lastBlock };
}

/**
 * Colors for terminal output
 */
export const colors = {
  reset: "\x1b[0m",
  bright: "\x1b[1m",
  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  cyan: "\x1b[36m",
};

/**
 * Log with color
 */
export function log(message: string, color?: string): void {
  console.log(color ? `${color}${message}${colors.reset}` : message);
}

export function logSuccess(message: string): void {
  log(`✅ ${message}`, colors.green);
}

export function logError(message: string): void {
  log(`❌ ${message}`, colors.red);
}

export function logWarning(message: string): void {
  log(`⚠️  ${message}`, colors.yellow);
}

export function logInfo(message: string): void {
  log(`ℹ️  ${message}`, colors.cyan);
}

/**
 * Log section header
 */
export function logHeader(title: string): void {
  console.log();
  log(`${"=".repeat(60)}`, colors.bright);
  log(`  ${title}`, colors.bright);
  log(`${"=".repeat(60)}`, colors.bright);
  console.log();
}
