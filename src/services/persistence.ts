/**
 * Ledger state documents
 *
 * Invariants:
 *   - bigint values are written as decimal strings
 *   - registry members keep their enumeration order
 *   - snapshot rows keep their append order within a period
 */

import { readFile, writeFile } from "node:fs/promises";
import { isAddress, type Address } from "viem";
import { z } from "zod";
import type {
  CreatorMonthlyStats,
  CreatorRecord,
  CreatorSnapshot,
  InvestorMonthlyStats,
  InvestorRecord,
  InvestorSnapshot,
  LedgerDb,
  PeriodKey,
} from "../utils/types";
import { InvalidArgumentError } from "../utils/errors";
import { isPeriodKey } from "./clock";
import { createRoleSet } from "./registry";
import { monthlyId } from "./db";

export const LEDGER_STATE_VERSION = 1;

const AddressSchema = z.string().transform((value, ctx): Address => {
  const normalized = value.toLowerCase();
  if (!isAddress(normalized)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid address: ${value}` });
    return z.NEVER;
  }
  return normalized;
});

const UintSchema = z
  .string()
  .regex(/^\d+$/, "Expected an unsigned integer string")
  .transform((value) => BigInt(value));

const PeriodSchema = z
  .number()
  .int()
  .positive()
  .refine(isPeriodKey, (period) => ({ message: `Invalid period key: ${period}` }));

const CreatorRecordSchema = z.object({
  address: AddressSchema,
  totalPublished: UintSchema,
  totalAcquired: UintSchema,
  tokenIds: z.array(UintSchema),
  firstSeenAt: UintSchema,
  lastActivityAt: UintSchema,
});

const InvestorRecordSchema = z.object({
  address: AddressSchema,
  totalAcquired: UintSchema,
  tokenIds: z.array(UintSchema),
  firstSeenAt: UintSchema,
  lastActivityAt: UintSchema,
});

const CreatorMonthlySchema = z.object({
  address: AddressSchema,
  period: PeriodSchema,
  published: UintSchema,
  acquired: UintSchema,
});

const InvestorMonthlySchema = z.object({
  address: AddressSchema,
  period: PeriodSchema,
  acquired: UintSchema,
});

const CreatorSnapshotSchema = z.object({
  address: AddressSchema,
  period: PeriodSchema,
  monthlyPublished: UintSchema,
  monthlyAcquired: UintSchema,
  totalPublished: UintSchema,
  totalAcquired: UintSchema,
  totalHeld: UintSchema,
  recordedAt: UintSchema,
});

const InvestorSnapshotSchema = z.object({
  address: AddressSchema,
  period: PeriodSchema,
  monthlyAcquired: UintSchema,
  totalAcquired: UintSchema,
  totalHeld: UintSchema,
  recordedAt: UintSchema,
});

export const LedgerStateSchema = z.object({
  version: z.literal(LEDGER_STATE_VERSION),
  chainId: z.number().int().positive(),
  owner: AddressSchema,
  platformOperator: AddressSchema,
  creators: z.array(CreatorRecordSchema),
  investors: z.array(InvestorRecordSchema),
  creatorMonthly: z.array(CreatorMonthlySchema),
  investorMonthly: z.array(InvestorMonthlySchema),
  creatorRegistry: z.array(AddressSchema),
  investorRegistry: z.array(AddressSchema),
  tokenOwners: z.array(z.object({ tokenId: UintSchema, owners: z.array(AddressSchema) })),
  creatorSnapshots: z.array(CreatorSnapshotSchema),
  investorSnapshots: z.array(InvestorSnapshotSchema),
  lastSyncedBlock: UintSchema.optional(),
});

/** JSON shape written to disk */
export type LedgerStateDocument = z.input<typeof LedgerStateSchema>;

export interface LoadedLedgerState {
  chainId: number;
  db: LedgerDb;
}

// =============================================================================
// EXPORT
// =============================================================================

function str(value: bigint): string {
  return value.toString();
}

export function exportLedgerState(chainId: number, db: LedgerDb): LedgerStateDocument {
  return {
    version: LEDGER_STATE_VERSION,
    chainId,
    owner: db.owner,
    platformOperator: db.platformOperator,
    creators: [...db.creators.values()].map((c) => ({
      address: c.address,
      totalPublished: str(c.totalPublished),
      totalAcquired: str(c.totalAcquired),
      tokenIds: c.tokenIds.map(str),
      firstSeenAt: str(c.firstSeenAt),
      lastActivityAt: str(c.lastActivityAt),
    })),
    investors: [...db.investors.values()].map((i) => ({
      address: i.address,
      totalAcquired: str(i.totalAcquired),
      tokenIds: i.tokenIds.map(str),
      firstSeenAt: str(i.firstSeenAt),
      lastActivityAt: str(i.lastActivityAt),
    })),
    creatorMonthly: [...db.creatorMonthly.values()].map((m) => ({
      address: m.address,
      period: m.period,
      published: str(m.published),
      acquired: str(m.acquired),
    })),
    investorMonthly: [...db.investorMonthly.values()].map((m) => ({
      address: m.address,
      period: m.period,
      acquired: str(m.acquired),
    })),
    creatorRegistry: [...db.creatorRegistry.members],
    investorRegistry: [...db.investorRegistry.members],
    tokenOwners: [...db.tokenOwners.entries()].map(([tokenId, owners]) => ({ tokenId, owners: [...owners] })),
    creatorSnapshots: [...db.creatorSnapshots.values()].flat().map((row) => ({
      address: row.address,
      period: row.period,
      monthlyPublished: str(row.monthlyPublished),
      monthlyAcquired: str(row.monthlyAcquired),
      totalPublished: str(row.totalPublished),
      totalAcquired: str(row.totalAcquired),
      totalHeld: str(row.totalHeld),
      recordedAt: str(row.recordedAt),
    })),
    investorSnapshots: [...db.investorSnapshots.values()].flat().map((row) => ({
      address: row.address,
      period: row.period,
      monthlyAcquired: str(row.monthlyAcquired),
      totalAcquired: str(row.totalAcquired),
      totalHeld: str(row.totalHeld),
      recordedAt: str(row.recordedAt),
    })),
    lastSyncedBlock: db.lastSyncedBlock === undefined ? undefined : str(db.lastSyncedBlock),
  };
}

// =============================================================================
// IMPORT
// =============================================================================

function groupByPeriod<T extends { period: PeriodKey }>(rows: T[]): Map<PeriodKey, T[]> {
  const grouped = new Map<PeriodKey, T[]>();
  for (const row of rows) {
    const bucket = grouped.get(row.period);
    if (bucket) bucket.push(row);
    else grouped.set(row.period, [row]);
  }
  return grouped;
}

/**
 * Validate a parsed JSON document and rebuild ledger tables from it.
 * @throws InvalidArgumentError when the document does not match the schema
 */
export function importLedgerState(document: unknown): LoadedLedgerState {
  const parsed = LedgerStateSchema.safeParse(document);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new InvalidArgumentError(`Invalid ledger state at ${issue.path.join(".") || "<root>"}: ${issue.message}`);
  }
  const state = parsed.data;

  const creatorSnapshots: CreatorSnapshot[] = state.creatorSnapshots;
  const investorSnapshots: InvestorSnapshot[] = state.investorSnapshots;

  return {
    chainId: state.chainId,
    db: {
      owner: state.owner,
      platformOperator: state.platformOperator,
      creators: new Map(state.creators.map((c): [Address, CreatorRecord] => [c.address, c])),
      investors: new Map(state.investors.map((i): [Address, InvestorRecord] => [i.address, i])),
      creatorMonthly: new Map(
        state.creatorMonthly.map((m): [string, CreatorMonthlyStats] => [monthlyId(m.period, m.address), m])
      ),
      investorMonthly: new Map(
        state.investorMonthly.map((m): [string, InvestorMonthlyStats] => [monthlyId(m.period, m.address), m])
      ),
      creatorRegistry: createRoleSet(state.creatorRegistry),
      investorRegistry: createRoleSet(state.investorRegistry),
      tokenOwners: new Map(state.tokenOwners.map((t): [string, Address[]] => [t.tokenId.toString(), t.owners])),
      creatorSnapshots: groupByPeriod(creatorSnapshots),
      investorSnapshots: groupByPeriod(investorSnapshots),
      lastSyncedBlock: state.lastSyncedBlock,
    },
  };
}

export async function saveLedgerState(path: string, chainId: number, db: LedgerDb): Promise<void> {
  const document = exportLedgerState(chainId, db);
  await writeFile(path, `${JSON.stringify(document, null, 2)}\n`, "utf8");
}

/**
 * Load a saved ledger. Returns undefined when the file does not exist.
 */
export async function loadLedgerState(path: string): Promise<LoadedLedgerState | undefined> {
  let raw: string;
  try {
    raw = await readFile(path, "utf8");
  } catch (error: unknown) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") return undefined;
    throw error;
  }

  let document: unknown;
  try {
    document = JSON.parse(raw);
  } catch (error: unknown) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InvalidArgumentError(`Ledger state ${path} is not valid JSON: ${reason}`);
  }
  return importLedgerState(document);
}
