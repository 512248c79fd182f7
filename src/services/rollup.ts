import type { Address } from "viem";
import type {
  CreatorSnapshot,
  InvestorSnapshot,
  LedgerContext,
  LedgerDb,
  PeriodKey,
  PeriodSnapshots,
} from "../utils/types";
import { NotFoundError } from "../utils/errors";
import { listMembers } from "./registry";
import { getCreatorMonthly, getCreatorTotals, getInvestorMonthly, getInvestorTotal } from "./stats";
import { currentHeldByCreator, currentHeldByInvestor } from "./holdings";

export interface RollupOptions {
  /** Time budget for the whole balance fan-out */
  timeoutMs: number;
  /** Balance reads in flight at once */
  concurrency: number;
}

/**
 * Rows computed for one rollup, not yet appended.
 */
export interface RollupResult {
  period: PeriodKey;
  timestamp: bigint;
  /** Block the balances were read at, when the source is a chain */
  blockNumber?: bigint;
  creators: CreatorSnapshot[];
  investors: InvestorSnapshot[];
}

// =============================================================================
// MONTHLY ROLLUP
// =============================================================================

/**
 * Join accumulator totals and live holdings into one row per registered
 * creator and investor, in registry order. Nothing is written here so a
 * failed balance read leaves the ledger untouched.
 */
export async function buildRollup(
  context: LedgerContext,
  period: PeriodKey,
  options: RollupOptions
): Promise<RollupResult> {
  const { db } = context;
  const timestamp = context.clock.now();
  const reader = await context.balances.snapshot();
  const budget = { concurrency: options.concurrency, deadline: Date.now() + options.timeoutMs };

  const creators: CreatorSnapshot[] = [];
  for (const address of listMembers(db.creatorRegistry)) {
    const monthly = getCreatorMonthly(db, address, period);
    const totals = getCreatorTotals(db, address);
    creators.push({
      address,
      period,
      monthlyPublished: monthly.published,
      monthlyAcquired: monthly.acquired,
      totalPublished: totals.totalPublished,
      totalAcquired: totals.totalAcquired,
      totalHeld: await currentHeldByCreator(db, reader, address, budget),
      recordedAt: timestamp,
    });
  }

  const investors: InvestorSnapshot[] = [];
  for (const address of listMembers(db.investorRegistry)) {
    investors.push({
      address,
      period,
      monthlyAcquired: getInvestorMonthly(db, address, period).acquired,
      totalAcquired: getInvestorTotal(db, address),
      totalHeld: await currentHeldByInvestor(db, reader, address, budget),
      recordedAt: timestamp,
    });
  }

  return { period, timestamp, blockNumber: reader.blockNumber, creators, investors };
}

/**
 * Append computed rows to the period ledgers. Re-running a period appends
 * again; rows are never replaced.
 */
export function commitRollup(db: LedgerDb, result: RollupResult): void {
  const creatorRows = db.creatorSnapshots.get(result.period) ?? [];
  const investorRows = db.investorSnapshots.get(result.period) ?? [];
  creatorRows.push(...result.creators);
  investorRows.push(...result.investors);
  db.creatorSnapshots.set(result.period, creatorRows);
  db.investorSnapshots.set(result.period, investorRows);
}

/**
 * Drop every row of a period. Irreversible.
 */
export function clearPeriod(db: LedgerDb, period: PeriodKey): { creatorRows: number; investorRows: number } {
  const creatorRows = db.creatorSnapshots.get(period)?.length ?? 0;
  const investorRows = db.investorSnapshots.get(period)?.length ?? 0;
  db.creatorSnapshots.delete(period);
  db.investorSnapshots.delete(period);
  return { creatorRows, investorRows };
}

// =============================================================================
// SNAPSHOT LOOKUPS
// =============================================================================

export function hasRollup(db: LedgerDb, period: PeriodKey): boolean {
  return (db.creatorSnapshots.get(period)?.length ?? 0) > 0 || (db.investorSnapshots.get(period)?.length ?? 0) > 0;
}

export function getCreatorSnapshots(db: LedgerDb, period: PeriodKey): CreatorSnapshot[] {
  return (db.creatorSnapshots.get(period) ?? []).map((row) => ({ ...row }));
}

export function getInvestorSnapshots(db: LedgerDb, period: PeriodKey): InvestorSnapshot[] {
  return (db.investorSnapshots.get(period) ?? []).map((row) => ({ ...row }));
}

/**
 * Latest row for the creator in that period.
 * @throws NotFoundError when the period holds no row for the creator
 */
export function getCreatorSnapshot(db: LedgerDb, period: PeriodKey, creator: Address): CreatorSnapshot {
  const row = (db.creatorSnapshots.get(period) ?? []).findLast((r) => r.address === creator);
  if (!row) {
    throw new NotFoundError(`No creator snapshot for ${creator} in period ${period}`);
  }
  return { ...row };
}

/**
 * @throws NotFoundError when the period holds no row for the investor
 */
export function getInvestorSnapshot(db: LedgerDb, period: PeriodKey, investor: Address): InvestorSnapshot {
  const row = (db.investorSnapshots.get(period) ?? []).findLast((r) => r.address === investor);
  if (!row) {
    throw new NotFoundError(`No investor snapshot for ${investor} in period ${period}`);
  }
  return { ...row };
}

export function getSnapshotsForPeriods(db: LedgerDb, periods: PeriodKey[]): PeriodSnapshots[] {
  return periods.map((period) => ({
    period,
    creators: getCreatorSnapshots(db, period),
    investors: getInvestorSnapshots(db, period),
  }));
}
