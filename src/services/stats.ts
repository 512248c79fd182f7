import type { Address } from "viem";
import type { CreatorMonthlyStats, InvestorMonthlyStats, LedgerContext, LedgerDb, PeriodKey } from "../utils/types";
import { periodKeyAt } from "./clock";
import { addMember } from "./registry";
import {
  getOrCreateCreator,
  getOrCreateCreatorMonthly,
  getOrCreateInvestor,
  getOrCreateInvestorMonthly,
  monthlyId,
} from "./db";

export interface RecordResult {
  period: PeriodKey;
  timestamp: bigint;
  /** True when the address joined its role registry on this call */
  registered: boolean;
}

// =============================================================================
// ACTIVITY ACCUMULATION
// =============================================================================

/**
 * Add published and acquired counts to a creator's lifetime and
 * current-period totals. "Acquired" is the creator's own share minted to
 * them on publish. Unseen creators are registered first.
 *
 * `timestamp` files the activity under the period it happened in (a log's
 * block time); it defaults to the ledger clock.
 */
export function recordPublish(
  context: LedgerContext,
  creator: Address,
  published: bigint,
  acquired: bigint,
  timestamp: bigint = context.clock.now()
): RecordResult {
  const period = periodKeyAt(timestamp);
  const { db } = context;

  const registered = addMember(db.creatorRegistry, creator);
  const record = getOrCreateCreator(db, creator, timestamp);
  const monthly = getOrCreateCreatorMonthly(db, creator, period);

  record.totalPublished += published;
  record.totalAcquired += acquired;
  record.lastActivityAt = timestamp;
  monthly.published += published;
  monthly.acquired += acquired;

  return { period, timestamp, registered };
}

/**
 * Add acquired counts to an investor's lifetime and current-period totals.
 */
export function recordAcquire(
  context: LedgerContext,
  investor: Address,
  acquired: bigint,
  timestamp: bigint = context.clock.now()
): RecordResult {
  const period = periodKeyAt(timestamp);
  const { db } = context;

  const registered = addMember(db.investorRegistry, investor);
  const record = getOrCreateInvestor(db, investor, timestamp);
  const monthly = getOrCreateInvestorMonthly(db, investor, period);

  record.totalAcquired += acquired;
  record.lastActivityAt = timestamp;
  monthly.acquired += acquired;

  return { period, timestamp, registered };
}

// =============================================================================
// LOOKUPS
// =============================================================================

export interface CreatorTotals {
  totalPublished: bigint;
  totalAcquired: bigint;
}

export function getCreatorTotals(db: LedgerDb, creator: Address): CreatorTotals {
  const record = db.creators.get(creator);
  return {
    totalPublished: record?.totalPublished ?? 0n,
    totalAcquired: record?.totalAcquired ?? 0n,
  };
}

export function getInvestorTotal(db: LedgerDb, investor: Address): bigint {
  return db.investors.get(investor)?.totalAcquired ?? 0n;
}

/**
 * Period counts; zero when nothing was recorded for that period.
 */
export function getCreatorMonthly(db: LedgerDb, creator: Address, period: PeriodKey): CreatorMonthlyStats {
  return db.creatorMonthly.get(monthlyId(period, creator)) ?? { address: creator, period, published: 0n, acquired: 0n };
}

export function getInvestorMonthly(db: LedgerDb, investor: Address, period: PeriodKey): InvestorMonthlyStats {
  return db.investorMonthly.get(monthlyId(period, investor)) ?? { address: investor, period, acquired: 0n };
}
