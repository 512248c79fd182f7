export const SECONDS_PER_DAY = 86_400n;

/**
 * Reference instant for period keys: 2024-01-01T00:00:00Z
 */
export const PERIOD_EPOCH = 1_704_067_200n;

/**
 * Simplified calendar used for period keys. Real month lengths and leap
 * years are ignored.
 */
export const PERIOD_YEAR_SECONDS = 365n * SECONDS_PER_DAY;
export const PERIOD_MONTH_SECONDS = 30n * SECONDS_PER_DAY;
export const PERIOD_BASE_YEAR = 2024;

/**
 * Rollup gate: days are grouped into rolling 30-day blocks and the gated
 * rollup only opens on day 28 and 29 of a block. Independent of the
 * calendar above.
 */
export const ROLLUP_CYCLE_DAYS = 30n;
export const ROLLUP_WINDOW_START_DAY = 28n;

export const ZERO_ADDRESS = "0x0000000000000000000000000000000000000000" as const;

export const DEFAULT_ROLLUP_TIMEOUT_MS = 30_000;
export const DEFAULT_BALANCE_CONCURRENCY = 8;
