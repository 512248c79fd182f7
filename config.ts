/**
 * Multi-Chain Configuration
 *
 * Defines supported networks, the chapter token contract and ledger settings.
 */

import { isAddress, type Address } from "viem";
import { DEFAULT_BALANCE_CONCURRENCY, DEFAULT_ROLLUP_TIMEOUT_MS, ZERO_ADDRESS } from "./src/utils/constants";

export interface ChainConfig {
  chainId: number;
  name: string;
  shortName?: string;
  rpcUrls: string[];
  explorerUrl: string;
  contracts: {
    /** Deployed MangaChapterToken; LEDGER_CHAPTER_TOKEN is required while unset */
    chapterToken?: Address;
  };
  startBlock: number;
  enabled: boolean;
}

export const CHAINS: Record<number, ChainConfig> = {
  // Sonic Mainnet
  146: {
    chainId: 146,
    name: "Sonic",
    shortName: "sonic",
    rpcUrls: [
      "https://rpc.soniclabs.com",
      "https://sonic-rpc.publicnode.com",
    ],
    explorerUrl: "https://sonicscan.org",
    contracts: {},
    startBlock: 0,
    enabled: true,
  },
  // Sonic Blaze Testnet
  57054: {
    chainId: 57054,
    name: "Sonic Blaze",
    shortName: "blaze",
    rpcUrls: ["https://rpc.blaze.soniclabs.com"],
    explorerUrl: "https://testnet.sonicscan.org",
    contracts: {},
    startBlock: 0,
    enabled: true,
  },
};

export interface LedgerConfig {
  chain: ChainConfig;
  rpcUrl: string;
  chapterToken: Address;
  owner: string;
  platformOperator: string;
  rollupTimeoutMs: number;
  balanceReadConcurrency: number;
  stateFile: string;
}

// =============================================================================
// HELPER FUNCTIONS
// =============================================================================

export function getChainName(chainId: number): string {
  return CHAINS[chainId]?.name ?? `Chain ${chainId}`;
}

export function getChainConfig(chainId: number): ChainConfig | undefined {
  return CHAINS[chainId];
}

export function isChainSupported(chainId: number): boolean {
  return getChainConfig(chainId)?.enabled ?? false;
}

function readPositiveInt(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw === "") return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
}

/**
 * Resolve ledger settings from the environment.
 */
export function getLedgerConfig(env: NodeJS.ProcessEnv = process.env): LedgerConfig {
  const chainId = readPositiveInt(env, "LEDGER_CHAIN_ID", 146);
  const chain = getChainConfig(chainId);
  if (!chain || !chain.enabled) {
    throw new Error(`Chain ${chainId} is not supported`);
  }

  const owner = env.LEDGER_OWNER;
  if (!owner) {
    throw new Error("LEDGER_OWNER is required");
  }

  const chapterToken = (env.LEDGER_CHAPTER_TOKEN ?? chain.contracts.chapterToken ?? "").toLowerCase();
  if (!chapterToken) {
    throw new Error(`LEDGER_CHAPTER_TOKEN is required: no chapter token is deployed on ${chain.name}`);
  }
  if (!isAddress(chapterToken) || chapterToken === ZERO_ADDRESS) {
    throw new Error(`Invalid chapter token address: ${chapterToken}`);
  }

  return {
    chain,
    rpcUrl: env.LEDGER_RPC_URL ?? chain.rpcUrls[0],
    chapterToken,
    owner,
    platformOperator: env.LEDGER_PLATFORM_OPERATOR ?? owner,
    rollupTimeoutMs: readPositiveInt(env, "LEDGER_ROLLUP_TIMEOUT_MS", DEFAULT_ROLLUP_TIMEOUT_MS),
    balanceReadConcurrency: readPositiveInt(env, "LEDGER_BALANCE_CONCURRENCY", DEFAULT_BALANCE_CONCURRENCY),
    stateFile: env.LEDGER_STATE_FILE ?? "ledger-state.json",
  };
}
