import { isAddress, type Address } from "viem";
import { getChainName } from "../../config";
import { InvalidArgumentError } from "./errors";
import { ZERO_ADDRESS } from "./constants";
import type { ChainInfo } from "./types";

/**
 * Build chain information from a configured chain id.
 */
export function getChainInfo(chainId: number): ChainInfo {
  return { chainId, chainName: getChainName(chainId) };
}

/**
 * Generate a composite ID string for keyed rows.
 */
export function makeId(...parts: (string | number | bigint)[]): string {
  return parts.join("-");
}

/**
 * Validate a hex address and normalize it to lowercase for consistent storage.
 */
export function normalizeAddress(value: string, label = "address"): Address {
  const normalized = value.toLowerCase();
  if (!isAddress(normalized)) {
    throw new InvalidArgumentError(`Invalid ${label}: ${value}`);
  }
  return normalized;
}

export function isZeroAddress(address: Address): boolean {
  return address === ZERO_ADDRESS;
}

/**
 * Normalize an address that must name a real participant (non-zero).
 */
export function requireParticipant(value: string, label = "address"): Address {
  const address = normalizeAddress(value, label);
  if (isZeroAddress(address)) {
    throw new InvalidArgumentError(`Zero address is not a valid ${label}`);
  }
  return address;
}

/**
 * Counts and token ids mirror uint256 values and cannot be negative.
 */
export function requireUint(value: bigint, label: string): bigint {
  if (value < 0n) {
    throw new InvalidArgumentError(`${label} must be non-negative, got ${value}`);
  }
  return value;
}
