/**
 * Type definitions for the manga activity ledger
 */

import type { Address } from "viem";

/**
 * Chain information used to scope ids and prefix log lines
 */
export interface ChainInfo {
  chainId: number;
  chainName: string;
}

/**
 * `year * 100 + month`, e.g. 202403
 */
export type PeriodKey = number;

export type Role = "creator" | "investor";

export interface LedgerLogger {
  log: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

/**
 * Source of unix-second timestamps (block time on chain, wall clock off chain)
 */
export interface Clock {
  now(): bigint;
}

// =============================================================================
// BALANCE SOURCE
// =============================================================================

/**
 * Balance reads pinned to one state of the token ledger.
 */
export interface BalanceReader {
  /** Block the reads are pinned to, when the source is a chain */
  blockNumber?: bigint;
  balanceOf(owner: Address, tokenId: bigint): Promise<bigint>;
}

/**
 * Token balance oracle. `snapshot()` is called once per rollup so every read
 * in that rollup sees the same state.
 */
export interface BalanceSource {
  snapshot(): Promise<BalanceReader>;
}

// =============================================================================
// TABLE ROWS
// =============================================================================

export interface CreatorRecord {
  address: Address;
  totalPublished: bigint;
  totalAcquired: bigint;
  /** Every token id ever associated, duplicates included */
  tokenIds: bigint[];
  firstSeenAt: bigint;
  lastActivityAt: bigint;
}

export interface InvestorRecord {
  address: Address;
  totalAcquired: bigint;
  tokenIds: bigint[];
  firstSeenAt: bigint;
  lastActivityAt: bigint;
}

export interface CreatorMonthlyStats {
  address: Address;
  period: PeriodKey;
  published: bigint;
  acquired: bigint;
}

export interface InvestorMonthlyStats {
  address: Address;
  period: PeriodKey;
  acquired: bigint;
}

export interface CreatorSnapshot {
  address: Address;
  period: PeriodKey;
  monthlyPublished: bigint;
  monthlyAcquired: bigint;
  totalPublished: bigint;
  totalAcquired: bigint;
  totalHeld: bigint;
  recordedAt: bigint;
}

export interface InvestorSnapshot {
  address: Address;
  period: PeriodKey;
  monthlyAcquired: bigint;
  totalAcquired: bigint;
  totalHeld: bigint;
  recordedAt: bigint;
}

export interface PeriodSnapshots {
  period: PeriodKey;
  creators: CreatorSnapshot[];
  investors: InvestorSnapshot[];
}

export interface TokenHolding {
  owner: Address;
  balance: bigint;
}

/**
 * Insertion-ordered set with O(1) swap-and-pop removal.
 * Order is not stable across removals.
 */
export interface RoleSet {
  members: Address[];
  index: Map<Address, number>;
}

/**
 * In-memory tables backing one ledger
 */
export interface LedgerDb {
  owner: Address;
  platformOperator: Address;
  creators: Map<Address, CreatorRecord>;
  investors: Map<Address, InvestorRecord>;
  creatorMonthly: Map<string, CreatorMonthlyStats>;
  investorMonthly: Map<string, InvestorMonthlyStats>;
  creatorRegistry: RoleSet;
  investorRegistry: RoleSet;
  /** tokenId (decimal string) -> every address ever recorded as owner */
  tokenOwners: Map<string, Address[]>;
  creatorSnapshots: Map<PeriodKey, CreatorSnapshot[]>;
  investorSnapshots: Map<PeriodKey, InvestorSnapshot[]>;
  /** Last chain block whose chapter-token logs have been applied */
  lastSyncedBlock?: bigint;
}

/**
 * Everything a service function needs, passed the way handlers pass `context`
 */
export interface LedgerContext {
  db: LedgerDb;
  chain: ChainInfo;
  clock: Clock;
  balances: BalanceSource;
  logger: LedgerLogger;
}

// =============================================================================
// EVENTS
// =============================================================================

export interface LedgerEventMap {
  PublishRecorded: { creator: Address; period: PeriodKey; published: bigint; acquired: bigint; timestamp: bigint };
  AcquireRecorded: { investor: Address; period: PeriodKey; acquired: bigint; timestamp: bigint };
  OwnershipRecorded: { tokenId: bigint; owner: Address };
  CreatorRegistered: { creator: Address };
  CreatorRemoved: { creator: Address };
  InvestorRegistered: { investor: Address };
  InvestorRemoved: { investor: Address };
  CreatorSnapshotCreated: CreatorSnapshot;
  InvestorSnapshotCreated: InvestorSnapshot;
  MonthlyRollupCompleted: { period: PeriodKey; creatorCount: number; investorCount: number; timestamp: bigint };
  PeriodCleared: { period: PeriodKey; creatorRows: number; investorRows: number };
  OwnershipTransferred: { previousOwner: Address; newOwner: Address };
  PlatformOperatorUpdated: { previousOperator: Address; newOperator: Address };
}

export type LedgerEventName = keyof LedgerEventMap;
