/**
 * Error handling utilities
 */

import type { LedgerLogger } from "./types";

const DEFAULT_RETRIES = 3;
const BASE_DELAY_MS = 100;

export type LedgerErrorCode =
  | "UNAUTHORIZED"
  | "INVALID_ARGUMENT"
  | "NOT_FOUND"
  | "PRECONDITION_FAILED"
  | "ROLLUP_TIMEOUT";

export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(message: string, code: LedgerErrorCode) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Caller is not the owner / platform operator the operation requires. */
export class UnauthorizedError extends LedgerError {
  constructor(message: string) {
    super(message, "UNAUTHORIZED");
  }
}

export class InvalidArgumentError extends LedgerError {
  constructor(message: string) {
    super(message, "INVALID_ARGUMENT");
  }
}

/** No row for the address in that period. Distinct from a row of zeros. */
export class NotFoundError extends LedgerError {
  constructor(message: string) {
    super(message, "NOT_FOUND");
  }
}

export class PreconditionError extends LedgerError {
  constructor(message: string) {
    super(message, "PRECONDITION_FAILED");
  }
}

export class RollupTimeoutError extends LedgerError {
  constructor(message: string) {
    super(message, "ROLLUP_TIMEOUT");
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Retry an RPC read with exponential backoff. Ledger errors are permanent
 * and rethrown at once.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  retries = DEFAULT_RETRIES,
  delayMs = BASE_DELAY_MS,
  logger: LedgerLogger = console
): Promise<T> {
  let lastError: unknown;

  for (let attempt = 0; attempt <= retries; attempt++) {
    try {
      return await fn();
    } catch (error: unknown) {
      if (error instanceof LedgerError) throw error;
      lastError = error;

      if (attempt < retries) {
        const sleepTime = delayMs * Math.pow(2, attempt);
        logger.warn(
          `Operation failed, retrying in ${sleepTime}ms (Attempt ${attempt + 1}/${retries}). Error: ${errorMessage(error)}`
        );
        await new Promise((resolve) => setTimeout(resolve, sleepTime));
      }
    }
  }

  throw lastError;
}

export function logSoftError(context: string, error: unknown, logger: LedgerLogger = console): void {
  logger.warn(`[WARN] ${context}:`, errorMessage(error));
}
