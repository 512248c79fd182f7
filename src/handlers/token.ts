/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                    CHAPTER TOKEN HANDLERS                                  ║
 * ╠═══════════════════════════════════════════════════════════════════════════╣
 * ║  Decodes MangaChapterToken logs and feeds them to the activity ledger as   ║
 * ║  the platform operator.                                                    ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * EVENT MAPPING:
 * ──────────────
 * ChapterPublished  → recordPublish(creator, 1, creatorShare) + creator token
 * ChapterMinted     → recordAcquire(buyer, amount) + investor token + owner
 * TransferSingle    → owner of `id` (transfers only; mints and burns skipped)
 * TransferBatch     → owner of every id (same rule)
 */

import { AbiEventSignatureNotFoundError, decodeEventLog, type DecodeEventLogReturnType, type Hex } from "viem";
import { MangaChapterTokenAbi } from "../../abis";
import type { ActivityLedger } from "../services/ledger";
import { isZeroAddress, normalizeAddress } from "../utils/helpers";
import type { LedgerLogger } from "../utils/types";

/**
 * The parts of an RPC log the router needs
 */
export interface TokenLog {
  data: Hex;
  topics: [Hex, ...Hex[]] | [];
  transactionHash?: Hex | null;
  logIndex?: number | null;
  blockNumber?: bigint | null;
  /** Block time in seconds; activity is filed under its period. Without it the ledger clock is used. */
  blockTimestamp?: bigint;
}

export type TokenLogHandler = (log: TokenLog) => Promise<boolean>;

export type TokenEvent = DecodeEventLogReturnType<typeof MangaChapterTokenAbi>;

/**
 * Decode a chapter-token log. Returns undefined for logs of other events.
 */
export function decodeTokenLog(log: TokenLog): TokenEvent | undefined {
  try {
    return decodeEventLog({ abi: MangaChapterTokenAbi, data: log.data, topics: log.topics });
  } catch (error: unknown) {
    if (error instanceof AbiEventSignatureNotFoundError) return undefined;
    throw error;
  }
}

/**
 * Build a handler that applies one chapter-token log to the ledger.
 * Resolves to false when the log is not a chapter-token event.
 */
export function createTokenEventRouter(
  ledger: ActivityLedger,
  operator: string,
  logger: LedgerLogger = console
): TokenLogHandler {
  const chainName = ledger.chain.chainName;

  return async function handleTokenLog(log: TokenLog): Promise<boolean> {
    const decoded = decodeTokenLog(log);
    const at = log.blockTimestamp;
    if (!decoded) {
      logger.warn(`[${chainName}] Skipping unknown log ${log.transactionHash ?? "?"}:${log.logIndex ?? "?"}`);
      return false;
    }

    switch (decoded.eventName) {
      // =======================================================================
      // CHAPTER PUBLISHED
      // =======================================================================
      case "ChapterPublished": {
        const { creator, tokenId, creatorShare } = decoded.args;
        logger.log(`[${chainName}] Chapter ${tokenId} published by ${creator.toLowerCase()} (share ${creatorShare})`);

        await ledger.recordPublish(operator, creator, 1n, creatorShare, at);
        await ledger.associateCreatorToken(operator, creator, tokenId, at);
        if (creatorShare > 0n) {
          await ledger.recordOwnership(operator, tokenId, creator);
        }
        return true;
      }

      // =======================================================================
      // CHAPTER MINTED
      // =======================================================================
      case "ChapterMinted": {
        const { buyer, tokenId, amount } = decoded.args;
        logger.log(`[${chainName}] Chapter ${tokenId} minted: ${amount} to ${buyer.toLowerCase()}`);

        await ledger.recordAcquire(operator, buyer, amount, at);
        await ledger.associateInvestorToken(operator, buyer, tokenId, at);
        await ledger.recordOwnership(operator, tokenId, buyer);
        return true;
      }

      // =======================================================================
      // TRANSFERS
      // =======================================================================
      case "TransferSingle": {
        const { from, to, id } = decoded.args;
        if (isTransfer(from, to)) {
          await ledger.recordOwnership(operator, id, to);
        }
        return true;
      }

      case "TransferBatch": {
        const { from, to, ids } = decoded.args;
        if (isTransfer(from, to)) {
          for (const id of ids) {
            await ledger.recordOwnership(operator, id, to);
          }
        }
        return true;
      }

      default:
        return false;
    }
  };
}

/**
 * Mints and burns are covered by the publish / mint events.
 */
function isTransfer(from: string, to: string): boolean {
  return !isZeroAddress(normalizeAddress(from)) && !isZeroAddress(normalizeAddress(to));
}
