import type { Clock, PeriodKey } from "../utils/types";
import { InvalidArgumentError } from "../utils/errors";
import {
  PERIOD_BASE_YEAR,
  PERIOD_EPOCH,
  PERIOD_MONTH_SECONDS,
  PERIOD_YEAR_SECONDS,
  ROLLUP_CYCLE_DAYS,
  ROLLUP_WINDOW_START_DAY,
  SECONDS_PER_DAY,
} from "../utils/constants";

// =============================================================================
// CLOCKS
// =============================================================================

export const systemClock: Clock = {
  now: () => BigInt(Math.floor(Date.now() / 1000)),
};

/**
 * Clock that only moves when told to.
 */
export class ManualClock implements Clock {
  constructor(private current: bigint) {}

  now(): bigint {
    return this.current;
  }

  set(timestamp: bigint): void {
    this.current = timestamp;
  }

  advance(seconds: bigint): void {
    this.current += seconds;
  }
}

// =============================================================================
// PERIOD KEYS
// =============================================================================

export function makePeriodKey(year: number, month: number): PeriodKey {
  return year * 100 + month;
}

export function splitPeriodKey(period: PeriodKey): { year: number; month: number } {
  return { year: Math.floor(period / 100), month: period % 100 };
}

export function isPeriodKey(period: number): boolean {
  const { month } = splitPeriodKey(period);
  return Number.isInteger(period) && period > 0 && month >= 1 && month <= 12;
}

export function assertPeriodKey(period: PeriodKey): PeriodKey {
  if (!isPeriodKey(period)) {
    throw new InvalidArgumentError(`Invalid period key: ${period}`);
  }
  return period;
}

/**
 * Period key for a timestamp on the simplified calendar: 365-day years and
 * 30-day months counted from 2024-01-01, month clamped to 12.
 */
export function periodKeyAt(timestamp: bigint): PeriodKey {
  if (timestamp < PERIOD_EPOCH) {
    throw new InvalidArgumentError(`Timestamp ${timestamp} is before the period epoch`);
  }
  const elapsed = timestamp - PERIOD_EPOCH;
  const year = PERIOD_BASE_YEAR + Number(elapsed / PERIOD_YEAR_SECONDS);
  const month = Math.min(Number((elapsed % PERIOD_YEAR_SECONDS) / PERIOD_MONTH_SECONDS) + 1, 12);
  return makePeriodKey(year, month);
}

export function currentPeriod(clock: Clock): PeriodKey {
  return periodKeyAt(clock.now());
}

/**
 * Gate for the scheduled rollup: day 28 or 29 of a rolling 30-day block.
 * Does not follow `periodKeyAt`, the two can disagree.
 */
export function isRollupWindowAt(timestamp: bigint): boolean {
  return (timestamp / SECONDS_PER_DAY) % ROLLUP_CYCLE_DAYS >= ROLLUP_WINDOW_START_DAY;
}

export function isRollupWindow(clock: Clock): boolean {
  return isRollupWindowAt(clock.now());
}
