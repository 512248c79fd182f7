import { createPublicClient, http, type Address } from "viem";
import { MangaChapterTokenAbi } from "../../abis";
import type { BalanceReader, BalanceSource, LedgerLogger } from "../utils/types";
import { RollupTimeoutError, withRetry } from "../utils/errors";
import { makeId } from "../utils/helpers";

// =============================================================================
// IN-MEMORY SOURCE
// =============================================================================

/**
 * Balance table kept in process. Snapshots copy the table, so later writes
 * do not leak into a rollup that is already running.
 */
export class InMemoryBalanceSource implements BalanceSource {
  private readonly balances = new Map<string, bigint>();

  setBalance(owner: Address, tokenId: bigint, balance: bigint): void {
    this.balances.set(makeId(owner.toLowerCase(), tokenId), balance);
  }

  getBalance(owner: Address, tokenId: bigint): bigint {
    return this.balances.get(makeId(owner.toLowerCase(), tokenId)) ?? 0n;
  }

  async snapshot(): Promise<BalanceReader> {
    const frozen = new Map(this.balances);
    return {
      balanceOf: async (owner, tokenId) => frozen.get(makeId(owner.toLowerCase(), tokenId)) ?? 0n,
    };
  }
}

// =============================================================================
// ON-CHAIN SOURCE
// =============================================================================

export interface ContractBalanceSourceOptions {
  rpcUrl: string;
  tokenAddress: Address;
  /** Receives retry warnings; defaults to console */
  logger?: LedgerLogger;
  retries?: number;
}

/**
 * Reads ERC-1155 `balanceOf` from the chapter token. Each snapshot pins its
 * reads to the block number current when the snapshot was taken.
 */
export function createContractBalanceSource(options: ContractBalanceSourceOptions): BalanceSource {
  const client = createPublicClient({
    transport: http(options.rpcUrl),
  });
  const retry = <T>(fn: () => Promise<T>) => withRetry(fn, options.retries, undefined, options.logger);

  return {
    async snapshot() {
      const blockNumber = await retry(() => client.getBlockNumber());
      return {
        blockNumber,
        balanceOf: (owner, tokenId) =>
          retry(() =>
            client.readContract({
              address: options.tokenAddress,
              abi: MangaChapterTokenAbi,
              functionName: "balanceOf",
              args: [owner, tokenId],
              blockNumber,
            })
          ),
      };
    },
  };
}

// =============================================================================
// BOUNDED FAN-OUT
// =============================================================================

export interface FanOutBudget {
  /** Reads in flight at once */
  concurrency: number;
  /** Epoch milliseconds after which the fan-out fails */
  deadline: number;
}

async function withDeadline<T>(start: () => Promise<T>, deadline: number): Promise<T> {
  if (!Number.isFinite(deadline)) return start();

  const remaining = deadline - Date.now();
  if (remaining <= 0) {
    throw new RollupTimeoutError("Balance reads exceeded the rollup time budget");
  }

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new RollupTimeoutError("Balance reads exceeded the rollup time budget")),
      remaining
    );
  });

  try {
    return await Promise.race([start(), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Run `read` over `items` at most `budget.concurrency` at a time, failing
 * with RollupTimeoutError once the deadline passes. Results keep item order.
 */
export async function readBounded<T, R>(
  items: T[],
  budget: FanOutBudget,
  read: (item: T) => Promise<R>
): Promise<R[]> {
  const size = Math.max(1, budget.concurrency);
  const results: R[] = [];

  for (let i = 0; i < items.length; i += size) {
    const chunk = items.slice(i, i + size);
    results.push(...(await withDeadline(() => Promise.all(chunk.map((item) => read(item))), budget.deadline)));
  }

  return results;
}

/**
 * Sum `owner`'s balance over the distinct ids in `tokenIds`.
 */
export async function sumBalances(
  reader: BalanceReader,
  owner: Address,
  tokenIds: bigint[],
  budget: FanOutBudget
): Promise<bigint> {
  const balances = await readBounded([...new Set(tokenIds)], budget, (tokenId) => reader.balanceOf(owner, tokenId));
  return balances.reduce((total, balance) => total + balance, 0n);
}

export function unboundedBudget(concurrency: number): FanOutBudget {
  return { concurrency, deadline: Number.POSITIVE_INFINITY };
}
