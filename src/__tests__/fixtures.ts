import { ActivityLedger, type ActivityLedgerOptions } from "../services/ledger";
import { InMemoryBalanceSource } from "../services/balances";
import { ManualClock } from "../services/clock";
import type { LedgerLogger } from "../utils/types";

export const DAY = 86_400n;
export const EPOCH = 1_704_067_200n;

/** Period 202403, day 28 of its 30-day cycle (rollup window open) */
export const T_WINDOW = EPOCH + 75n * DAY;
/** Period 202403, day 23 of its 30-day cycle (rollup window closed) */
export const T_OUTSIDE = EPOCH + 70n * DAY;
/** Period 202404 */
export const T_NEXT_PERIOD = EPOCH + 95n * DAY;

export const OWNER = "0x00000000000000000000000000000000000000a1";
export const OPERATOR = "0x00000000000000000000000000000000000000b2";
export const CREATOR_A = "0x00000000000000000000000000000000000000c1";
export const CREATOR_B = "0x00000000000000000000000000000000000000c2";
export const CREATOR_C = "0x00000000000000000000000000000000000000c3";
export const INVESTOR_A = "0x00000000000000000000000000000000000000d1";
export const INVESTOR_B = "0x00000000000000000000000000000000000000d2";
export const STRANGER = "0x00000000000000000000000000000000000000e1";
export const ZERO = "0x0000000000000000000000000000000000000000";

export const silentLogger: LedgerLogger = {
  log: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

export function createTestLedger(overrides: Partial<ActivityLedgerOptions> = {}) {
  const clock = new ManualClock(T_WINDOW);
  const balances = new InMemoryBalanceSource();
  const ledger = new ActivityLedger({
    chainId: 146,
    owner: OWNER,
    platformOperator: OPERATOR,
    balances,
    clock,
    logger: silentLogger,
    ...overrides,
  });
  return { ledger, clock, balances };
}
