import type { Address } from "viem";
import type { BalanceReader, LedgerDb, TokenHolding } from "../utils/types";
import { getOrCreateCreator, getOrCreateInvestor } from "./db";
import { readBounded, sumBalances, type FanOutBudget } from "./balances";

// =============================================================================
// OWNERSHIP SETS
// =============================================================================

/**
 * Add `owner` to the token's owner set. The set only grows: an owner stays
 * listed after their balance drops to zero.
 * Returns true when the owner was new for this token.
 */
export function recordOwnership(db: LedgerDb, tokenId: bigint, owner: Address): boolean {
  const key = tokenId.toString();
  const owners = db.tokenOwners.get(key);
  if (!owners) {
    db.tokenOwners.set(key, [owner]);
    return true;
  }
  if (owners.includes(owner)) return false;
  owners.push(owner);
  return true;
}

export function getTokenOwners(db: LedgerDb, tokenId: bigint): Address[] {
  return [...(db.tokenOwners.get(tokenId.toString()) ?? [])];
}

/**
 * Every recorded owner of `tokenId` with their balance as the reader sees it.
 * Owners at zero balance are included.
 */
export async function getTokenOwnersWithBalances(
  db: LedgerDb,
  reader: BalanceReader,
  tokenId: bigint,
  budget: FanOutBudget
): Promise<TokenHolding[]> {
  return readBounded(getTokenOwners(db, tokenId), budget, async (owner) => ({
    owner,
    balance: await reader.balanceOf(owner, tokenId),
  }));
}

// =============================================================================
// TOKEN ASSOCIATIONS
// =============================================================================

/**
 * Append `tokenId` to the creator's token list. Not deduplicated.
 */
export function associateCreatorToken(db: LedgerDb, creator: Address, tokenId: bigint, timestamp: bigint): void {
  getOrCreateCreator(db, creator, timestamp).tokenIds.push(tokenId);
}

export function associateInvestorToken(db: LedgerDb, investor: Address, tokenId: bigint, timestamp: bigint): void {
  getOrCreateInvestor(db, investor, timestamp).tokenIds.push(tokenId);
}

export function getCreatorTokens(db: LedgerDb, creator: Address): bigint[] {
  return [...(db.creators.get(creator)?.tokenIds ?? [])];
}

export function getInvestorTokens(db: LedgerDb, investor: Address): bigint[] {
  return [...(db.investors.get(investor)?.tokenIds ?? [])];
}

// =============================================================================
// CURRENT HOLDINGS
// =============================================================================

/**
 * Live balance summed over every token ever associated with the creator.
 * Cost grows with the number of associated tokens.
 */
export function currentHeldByCreator(
  db: LedgerDb,
  reader: BalanceReader,
  creator: Address,
  budget: FanOutBudget
): Promise<bigint> {
  return sumBalances(reader, creator, db.creators.get(creator)?.tokenIds ?? [], budget);
}

export function currentHeldByInvestor(
  db: LedgerDb,
  reader: BalanceReader,
  investor: Address,
  budget: FanOutBudget
): Promise<bigint> {
  return sumBalances(reader, investor, db.investors.get(investor)?.tokenIds ?? [], budget);
}
