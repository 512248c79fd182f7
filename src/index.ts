/**
 * ╔═══════════════════════════════════════════════════════════════════════════╗
 * ║                    MANGA ACTIVITY LEDGER                                   ║
 * ╠═══════════════════════════════════════════════════════════════════════════╣
 * ║  Off-chain creator / investor statistics for the manga chapter token,      ║
 * ║  rolled up into append-only monthly ledgers.                               ║
 * ╚═══════════════════════════════════════════════════════════════════════════╝
 *
 * MODULE ORGANIZATION:
 * ────────────────────
 * 1. LEDGER        - Facade with authorization and notifications (src/services/ledger.ts)
 * 2. REGISTRY      - Creator / investor role sets (src/services/registry.ts)
 * 3. HOLDINGS      - Token owners, token lists, live held totals (src/services/holdings.ts)
 * 4. STATS         - Lifetime and monthly accumulation (src/services/stats.ts)
 * 5. ROLLUP        - Monthly snapshot ledgers (src/services/rollup.ts)
 * 6. CLOCK         - Period keys and the rollup window (src/services/clock.ts)
 * 7. HANDLERS      - Chapter token log router (src/handlers/token.ts)
 *
 * @module src/index
 */

export { ActivityLedger } from "./services/ledger";
export type { ActivityLedgerOptions, CreatorStats, InvestorStats } from "./services/ledger";
export type { RollupResult } from "./services/rollup";
export {
  InMemoryBalanceSource,
  createContractBalanceSource,
} from "./services/balances";
export type { ContractBalanceSourceOptions } from "./services/balances";
export {
  ManualClock,
  systemClock,
  makePeriodKey,
  splitPeriodKey,
  periodKeyAt,
  isRollupWindowAt,
} from "./services/clock";
export {
  exportLedgerState,
  importLedgerState,
  loadLedgerState,
  saveLedgerState,
} from "./services/persistence";
export type { LedgerStateDocument, LoadedLedgerState } from "./services/persistence";
export { createTokenEventRouter, decodeTokenLog } from "./handlers/token";
export type { TokenEvent, TokenLog, TokenLogHandler } from "./handlers/token";
export {
  LedgerError,
  UnauthorizedError,
  InvalidArgumentError,
  NotFoundError,
  PreconditionError,
  RollupTimeoutError,
} from "./utils/errors";
export type { LedgerErrorCode } from "./utils/errors";
export type * from "./utils/types";
