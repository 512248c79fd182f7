/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                    CREATOR / INVESTOR ACTIVITY LEDGER                      ║
 * ╠═══════════════════════════════════════════════════════════════════════════╣
 * ║  Records publish and acquire activity for manga chapter tokens and rolls   ║
 * ║  it up into append-only monthly snapshots.                                 ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * ROLES:
 * ──────
 * - owner             registry changes, rollups, period clearing, role transfer
 * - platform operator record / association calls (the owner may make them too)
 *
 * Every mutating call goes through one serial queue, so calls never interleave
 * even while a rollup waits on balance reads.
 */

import { isAddress, type Address } from "viem";
import type {
  BalanceSource,
  ChainInfo,
  Clock,
  CreatorMonthlyStats,
  CreatorSnapshot,
  InvestorMonthlyStats,
  InvestorSnapshot,
  LedgerContext,
  LedgerDb,
  LedgerEventName,
  LedgerLogger,
  PeriodKey,
  PeriodSnapshots,
  TokenHolding,
} from "../utils/types";
import { PreconditionError, UnauthorizedError } from "../utils/errors";
import { getChainInfo, isZeroAddress, normalizeAddress, requireParticipant, requireUint } from "../utils/helpers";
import { DEFAULT_BALANCE_CONCURRENCY, DEFAULT_ROLLUP_TIMEOUT_MS } from "../utils/constants";
import { LedgerEvents, type LedgerEventHandler } from "../utils/events";
import { SerialQueue } from "../utils/queue";
import { assertPeriodKey, currentPeriod, isRollupWindow, systemClock } from "./clock";
import { createLedgerDb } from "./db";
import { addMember, hasMember, listMembers, removeMember } from "./registry";
import * as stats from "./stats";
import * as holdings from "./holdings";
import * as rollups from "./rollup";
import { unboundedBudget } from "./balances";

export interface ActivityLedgerOptions {
  chainId: number;
  owner: string;
  /** Defaults to the owner */
  platformOperator?: string;
  balances: BalanceSource;
  clock?: Clock;
  logger?: LedgerLogger;
  rollupTimeoutMs?: number;
  balanceReadConcurrency?: number;
  /** Previously saved tables; roles stored there win over `owner` / `platformOperator` */
  db?: LedgerDb;
}

export interface CreatorStats {
  address: Address;
  isCreator: boolean;
  totalPublished: bigint;
  totalAcquired: bigint;
  tokenIds: bigint[];
}

export interface InvestorStats {
  address: Address;
  isInvestor: boolean;
  totalAcquired: bigint;
  tokenIds: bigint[];
}

export class ActivityLedger {
  readonly chain: ChainInfo;
  private readonly db: LedgerDb;
  private readonly clock: Clock;
  private readonly balances: BalanceSource;
  private readonly logger: LedgerLogger;
  private readonly events: LedgerEvents;
  private readonly queue = new SerialQueue();
  private readonly rollupTimeoutMs: number;
  private readonly concurrency: number;

  constructor(options: ActivityLedgerOptions) {
    this.chain = getChainInfo(options.chainId);
    this.clock = options.clock ?? systemClock;
    this.balances = options.balances;
    this.logger = options.logger ?? console;
    this.events = new LedgerEvents(this.logger);
    this.rollupTimeoutMs = options.rollupTimeoutMs ?? DEFAULT_ROLLUP_TIMEOUT_MS;
    this.concurrency = options.balanceReadConcurrency ?? DEFAULT_BALANCE_CONCURRENCY;

    if (options.db) {
      this.db = options.db;
    } else {
      const owner = requireParticipant(options.owner, "owner");
      const operator = requireParticipant(options.platformOperator ?? options.owner, "platform operator");
      this.db = createLedgerDb(owner, operator);
    }
  }

  private get context(): LedgerContext {
    return { db: this.db, chain: this.chain, clock: this.clock, balances: this.balances, logger: this.logger };
  }

  // ===========================================================================
  // NOTIFICATIONS
  // ===========================================================================

  on<E extends LedgerEventName>(name: E, handler: LedgerEventHandler<E>): () => void {
    return this.events.on(name, handler);
  }

  // ===========================================================================
  // AUTHORIZATION
  // ===========================================================================

  get owner(): Address {
    return this.db.owner;
  }

  get platformOperator(): Address {
    return this.db.platformOperator;
  }

  private requireOwner(caller: string): void {
    if (caller.toLowerCase() !== this.db.owner) {
      throw new UnauthorizedError(`Caller ${caller} is not the owner`);
    }
  }

  private requireOperator(caller: string): void {
    const normalized = caller.toLowerCase();
    if (normalized !== this.db.platformOperator && normalized !== this.db.owner) {
      throw new UnauthorizedError(`Caller ${caller} is not the platform operator`);
    }
  }

  transferOwnership(caller: string, newOwner: string): Promise<void> {
    return this.queue.run(() => {
      this.requireOwner(caller);
      const next = requireParticipant(newOwner, "owner");
      const previousOwner = this.db.owner;
      this.db.owner = next;
      this.logger.log(`[${this.chain.chainName}] Ownership transferred: ${previousOwner} -> ${next}`);
      this.events.emit("OwnershipTransferred", { previousOwner, newOwner: next });
    });
  }

  setPlatformOperator(caller: string, operator: string): Promise<void> {
    return this.queue.run(() => {
      this.requireOwner(caller);
      const next = requireParticipant(operator, "platform operator");
      const previousOperator = this.db.platformOperator;
      this.db.platformOperator = next;
      this.logger.log(`[${this.chain.chainName}] Platform operator updated: ${previousOperator} -> ${next}`);
      this.events.emit("PlatformOperatorUpdated", { previousOperator, newOperator: next });
    });
  }

  // ===========================================================================
  // ACTIVITY RECORDING
  // ===========================================================================

  /**
   * `at` is when the publish happened (e.g. a log's block time); defaults to
   * the ledger clock.
   */
  recordPublish(caller: string, creator: string, published: bigint, acquired: bigint, at?: bigint): Promise<void> {
    return this.queue.run(() => {
      this.requireOperator(caller);
      const address = requireParticipant(creator, "creator");
      requireUint(published, "published");
      requireUint(acquired, "acquired");

      const result = stats.recordPublish(this.context, address, published, acquired, at ?? this.clock.now());
      if (result.registered) {
        this.events.emit("CreatorRegistered", { creator: address });
      }
      this.logger.log(
        `[${this.chain.chainName}] Publish recorded: ${address} published=${published} acquired=${acquired} period=${result.period}`
      );
      this.events.emit("PublishRecorded", {
        creator: address,
        period: result.period,
        published,
        acquired,
        timestamp: result.timestamp,
      });
    });
  }

  recordAcquire(caller: string, investor: string, acquired: bigint, at?: bigint): Promise<void> {
    return this.queue.run(() => {
      this.requireOperator(caller);
      const address = requireParticipant(investor, "investor");
      requireUint(acquired, "acquired");

      const result = stats.recordAcquire(this.context, address, acquired, at ?? this.clock.now());
      if (result.registered) {
        this.events.emit("InvestorRegistered", { investor: address });
      }
      this.logger.log(
        `[${this.chain.chainName}] Acquire recorded: ${address} acquired=${acquired} period=${result.period}`
      );
      this.events.emit("AcquireRecorded", {
        investor: address,
        period: result.period,
        acquired,
        timestamp: result.timestamp,
      });
    });
  }

  recordOwnership(caller: string, tokenId: bigint, owner: string): Promise<void> {
    return this.queue.run(() => {
      this.requireOperator(caller);
      requireUint(tokenId, "tokenId");
      const address = requireParticipant(owner, "owner");
      if (holdings.recordOwnership(this.db, tokenId, address)) {
        this.events.emit("OwnershipRecorded", { tokenId, owner: address });
      }
    });
  }

  associateCreatorToken(caller: string, creator: string, tokenId: bigint, at?: bigint): Promise<void> {
    return this.queue.run(() => {
      this.requireOperator(caller);
      const address = requireParticipant(creator, "creator");
      requireUint(tokenId, "tokenId");
      holdings.associateCreatorToken(this.db, address, tokenId, at ?? this.clock.now());
    });
  }

  associateInvestorToken(caller: string, investor: string, tokenId: bigint, at?: bigint): Promise<void> {
    return this.queue.run(() => {
      this.requireOperator(caller);
      const address = requireParticipant(investor, "investor");
      requireUint(tokenId, "tokenId");
      holdings.associateInvestorToken(this.db, address, tokenId, at ?? this.clock.now());
    });
  }

  get lastSyncedBlock(): bigint | undefined {
    return this.db.lastSyncedBlock;
  }

  /**
   * Record that chapter-token logs up to `blockNumber` have been applied.
   * The cursor never moves backwards.
   */
  markSynced(caller: string, blockNumber: bigint): Promise<void> {
    return this.queue.run(() => {
      this.requireOperator(caller);
      requireUint(blockNumber, "blockNumber");
      const previous = this.db.lastSyncedBlock;
      if (previous !== undefined && blockNumber < previous) {
        throw new PreconditionError(`Cannot move sync cursor back from block ${previous} to ${blockNumber}`);
      }
      this.db.lastSyncedBlock = blockNumber;
      this.logger.log(`[${this.chain.chainName}] Synced to block ${blockNumber}`);
    });
  }

  // ===========================================================================
  // ROLE REGISTRIES
  // ===========================================================================

  registerCreator(caller: string, creator: string): Promise<void> {
    return this.queue.run(() => {
      this.requireOwner(caller);
      const address = requireParticipant(creator, "creator");
      if (addMember(this.db.creatorRegistry, address)) {
        this.events.emit("CreatorRegistered", { creator: address });
      }
    });
  }

  registerInvestor(caller: string, investor: string): Promise<void> {
    return this.queue.run(() => {
      this.requireOwner(caller);
      const address = requireParticipant(investor, "investor");
      if (addMember(this.db.investorRegistry, address)) {
        this.events.emit("InvestorRegistered", { investor: address });
      }
    });
  }

  /**
   * Register many creators. Malformed, zero and already registered entries
   * are skipped. Returns how many were added.
   */
  addCreators(caller: string, creators: string[]): Promise<number> {
    return this.queue.run(() => {
      this.requireOwner(caller);
      let added = 0;
      for (const address of acceptableParticipants(creators)) {
        if (addMember(this.db.creatorRegistry, address)) {
          added++;
          this.events.emit("CreatorRegistered", { creator: address });
        }
      }
      return added;
    });
  }

  addInvestors(caller: string, investors: string[]): Promise<number> {
    return this.queue.run(() => {
      this.requireOwner(caller);
      let added = 0;
      for (const address of acceptableParticipants(investors)) {
        if (addMember(this.db.investorRegistry, address)) {
          added++;
          this.events.emit("InvestorRegistered", { investor: address });
        }
      }
      return added;
    });
  }

  /**
   * Drop the creator role. Counts and earlier snapshot rows are kept.
   */
  removeCreator(caller: string, creator: string): Promise<void> {
    return this.queue.run(() => {
      this.requireOwner(caller);
      const address = normalizeAddress(creator, "creator");
      if (!removeMember(this.db.creatorRegistry, address)) {
        throw new PreconditionError(`${address} is not a registered creator`);
      }
      this.events.emit("CreatorRemoved", { creator: address });
    });
  }

  removeInvestor(caller: string, investor: string): Promise<void> {
    return this.queue.run(() => {
      this.requireOwner(caller);
      const address = normalizeAddress(investor, "investor");
      if (!removeMember(this.db.investorRegistry, address)) {
        throw new PreconditionError(`${address} is not a registered investor`);
      }
      this.events.emit("InvestorRemoved", { investor: address });
    });
  }

  isCreator(address: string): boolean {
    return hasMember(this.db.creatorRegistry, normalizeAddress(address));
  }

  isInvestor(address: string): boolean {
    return hasMember(this.db.investorRegistry, normalizeAddress(address));
  }

  getCreators(): Address[] {
    return listMembers(this.db.creatorRegistry);
  }

  getInvestors(): Address[] {
    return listMembers(this.db.investorRegistry);
  }

  // ===========================================================================
  // MONTHLY ROLLUP
  // ===========================================================================

  currentPeriod(): PeriodKey {
    return currentPeriod(this.clock);
  }

  isRollupWindow(): boolean {
    return isRollupWindow(this.clock);
  }

  /**
   * Scheduled rollup of the current period. Only open at the end of a
   * 30-day cycle.
   */
  rollup(caller: string): Promise<rollups.RollupResult> {
    return this.queue.run(() => {
      this.requireOwner(caller);
      if (!isRollupWindow(this.clock)) {
        throw new PreconditionError("Rollup is only allowed in the last two days of the 30-day cycle");
      }
      return this.runRollup(currentPeriod(this.clock));
    });
  }

  forceRollup(caller: string): Promise<rollups.RollupResult> {
    return this.queue.run(() => {
      this.requireOwner(caller);
      return this.runRollup(currentPeriod(this.clock));
    });
  }

  /**
   * Roll up an explicit period. Running it twice for the same period appends
   * a second set of rows; check `hasRollup` first to avoid that.
   */
  rollupForPeriod(caller: string, period: PeriodKey): Promise<rollups.RollupResult> {
    return this.queue.run(() => {
      this.requireOwner(caller);
      return this.runRollup(assertPeriodKey(period));
    });
  }

  private async runRollup(period: PeriodKey): Promise<rollups.RollupResult> {
    const result = await rollups.buildRollup(this.context, period, {
      timeoutMs: this.rollupTimeoutMs,
      concurrency: this.concurrency,
    });
    rollups.commitRollup(this.db, result);

    for (const row of result.creators) this.events.emit("CreatorSnapshotCreated", row);
    for (const row of result.investors) this.events.emit("InvestorSnapshotCreated", row);

    this.logger.log(
      `[${this.chain.chainName}] Monthly rollup ${period}: ${result.creators.length} creators, ${result.investors.length} investors` +
        (result.blockNumber !== undefined ? ` at block ${result.blockNumber}` : "")
    );
    this.events.emit("MonthlyRollupCompleted", {
      period,
      creatorCount: result.creators.length,
      investorCount: result.investors.length,
      timestamp: result.timestamp,
    });
    return result;
  }

  clearPeriod(caller: string, period: PeriodKey): Promise<void> {
    return this.queue.run(() => {
      this.requireOwner(caller);
      const cleared = rollups.clearPeriod(this.db, period);
      this.logger.warn(
        `[${this.chain.chainName}] Cleared period ${period}: ${cleared.creatorRows} creator rows, ${cleared.investorRows} investor rows`
      );
      this.events.emit("PeriodCleared", { period, ...cleared });
    });
  }

  hasRollup(period: PeriodKey): boolean {
    return rollups.hasRollup(this.db, period);
  }

  getCreatorSnapshot(period: PeriodKey, creator: string): CreatorSnapshot {
    return rollups.getCreatorSnapshot(this.db, period, normalizeAddress(creator, "creator"));
  }

  getInvestorSnapshot(period: PeriodKey, investor: string): InvestorSnapshot {
    return rollups.getInvestorSnapshot(this.db, period, normalizeAddress(investor, "investor"));
  }

  getCreatorSnapshots(period: PeriodKey): CreatorSnapshot[] {
    return rollups.getCreatorSnapshots(this.db, period);
  }

  getInvestorSnapshots(period: PeriodKey): InvestorSnapshot[] {
    return rollups.getInvestorSnapshots(this.db, period);
  }

  getSnapshotsForPeriods(periods: PeriodKey[]): PeriodSnapshots[] {
    return rollups.getSnapshotsForPeriods(this.db, periods);
  }

  // ===========================================================================
  // STATS & HOLDINGS
  // ===========================================================================

  getCreatorStats(creator: string): CreatorStats {
    const address = normalizeAddress(creator, "creator");
    return {
      address,
      isCreator: hasMember(this.db.creatorRegistry, address),
      ...stats.getCreatorTotals(this.db, address),
      tokenIds: holdings.getCreatorTokens(this.db, address),
    };
  }

  getInvestorStats(investor: string): InvestorStats {
    const address = normalizeAddress(investor, "investor");
    return {
      address,
      isInvestor: hasMember(this.db.investorRegistry, address),
      totalAcquired: stats.getInvestorTotal(this.db, address),
      tokenIds: holdings.getInvestorTokens(this.db, address),
    };
  }

  getCreatorMonthlyStats(creator: string, period: PeriodKey): CreatorMonthlyStats {
    return { ...stats.getCreatorMonthly(this.db, normalizeAddress(creator, "creator"), period) };
  }

  getInvestorMonthlyStats(investor: string, period: PeriodKey): InvestorMonthlyStats {
    return { ...stats.getInvestorMonthly(this.db, normalizeAddress(investor, "investor"), period) };
  }

  getCreatorTokens(creator: string): bigint[] {
    return holdings.getCreatorTokens(this.db, normalizeAddress(creator, "creator"));
  }

  getInvestorTokens(investor: string): bigint[] {
    return holdings.getInvestorTokens(this.db, normalizeAddress(investor, "investor"));
  }

  getTokenOwners(tokenId: bigint): Address[] {
    return holdings.getTokenOwners(this.db, tokenId);
  }

  async getTokenOwnersWithBalances(tokenId: bigint): Promise<TokenHolding[]> {
    const reader = await this.balances.snapshot();
    return holdings.getTokenOwnersWithBalances(this.db, reader, tokenId, unboundedBudget(this.concurrency));
  }

  async currentHeldByCreator(creator: string): Promise<bigint> {
    const address = normalizeAddress(creator, "creator");
    const reader = await this.balances.snapshot();
    return holdings.currentHeldByCreator(this.db, reader, address, unboundedBudget(this.concurrency));
  }

  async currentHeldByInvestor(investor: string): Promise<bigint> {
    const address = normalizeAddress(investor, "investor");
    const reader = await this.balances.snapshot();
    return holdings.currentHeldByInvestor(this.db, reader, address, unboundedBudget(this.concurrency));
  }

  /**
   * Tables backing this ledger, for persistence.
   */
  getDb(): LedgerDb {
    return this.db;
  }
}

/**
 * Well-formed, non-zero addresses of a batch, normalized. Everything else is
 * dropped without error.
 */
function acceptableParticipants(values: string[]): Address[] {
  const accepted: Address[] = [];
  for (const value of values) {
    const normalized = value.toLowerCase();
    if (isAddress(normalized) && !isZeroAddress(normalized)) accepted.push(normalized);
  }
  return accepted;
}
