import type { Address } from "viem";
import type {
  CreatorMonthlyStats,
  CreatorRecord,
  InvestorMonthlyStats,
  InvestorRecord,
  LedgerDb,
  PeriodKey,
} from "../utils/types";
import { makeId } from "../utils/helpers";
import { createRoleSet } from "./registry";

/**
 * Empty tables for a new ledger.
 */
export function createLedgerDb(owner: Address, platformOperator: Address): LedgerDb {
  return {
    owner,
    platformOperator,
    creators: new Map(),
    investors: new Map(),
    creatorMonthly: new Map(),
    investorMonthly: new Map(),
    creatorRegistry: createRoleSet(),
    investorRegistry: createRoleSet(),
    tokenOwners: new Map(),
    creatorSnapshots: new Map(),
    investorSnapshots: new Map(),
  };
}

export function monthlyId(period: PeriodKey, address: Address): string {
  return makeId(period, address);
}

/**
 * Get existing creator record or create a new one with zeroed totals.
 */
export function getOrCreateCreator(db: LedgerDb, address: Address, timestamp: bigint): CreatorRecord {
  let creator = db.creators.get(address);
  if (!creator) {
    creator = {
      address,
      totalPublished: 0n,
      totalAcquired: 0n,
      tokenIds: [],
      firstSeenAt: timestamp,
      lastActivityAt: timestamp,
    };
    db.creators.set(address, creator);
  }
  return creator;
}

export function getOrCreateInvestor(db: LedgerDb, address: Address, timestamp: bigint): InvestorRecord {
  let investor = db.investors.get(address);
  if (!investor) {
    investor = {
      address,
      totalAcquired: 0n,
      tokenIds: [],
      firstSeenAt: timestamp,
      lastActivityAt: timestamp,
    };
    db.investors.set(address, investor);
  }
  return investor;
}

export function getOrCreateCreatorMonthly(db: LedgerDb, address: Address, period: PeriodKey): CreatorMonthlyStats {
  const id = monthlyId(period, address);
  let stats = db.creatorMonthly.get(id);
  if (!stats) {
    stats = { address, period, published: 0n, acquired: 0n };
    db.creatorMonthly.set(id, stats);
  }
  return stats;
}

export function getOrCreateInvestorMonthly(db: LedgerDb, address: Address, period: PeriodKey): InvestorMonthlyStats {
  const id = monthlyId(period, address);
  let stats = db.investorMonthly.get(id);
  if (!stats) {
    stats = { address, period, acquired: 0n };
    db.investorMonthly.set(id, stats);
  }
  return stats;
}
