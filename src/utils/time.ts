export const HOUR_MS = 3_600_000;
export const DAY_MS = 86_400_000;
/** Largest magnitude a `Date` accepts, in epoch milliseconds. */
export const MAX_EPOCH_MS = 8_640_000_000_000_000;

export interface MonthPeriod {
  readonly year: number;
  readonly month: number;
}

/** Calendar month (UTC) containing `at`; month is 1-based. */
export function utcPeriod(at: number): MonthPeriod {
  const d = new Date(at);
  return { year: d.getUTCFullYear(), month: d.getUTCMonth() + 1 };
}

export function previousPeriod({ year, month }: MonthPeriod): MonthPeriod {
  return month === 1 ? { year: year - 1, month: 12 } : { year, month: month - 1 };
}

/** `YYYY-MM-DD` in UTC. */
export function utcDateKey(at: number): string {
  return new Date(at).toISOString().slice(0, 10);
}

export function utcHour(at: number): number {
  return new Date(at).getUTCHours();
}

/** Months between two periods, `to` minus `from`. */
export function monthsBetween(from: MonthPeriod, to: MonthPeriod): number {
  return (to.year - from.year) * 12 + (to.month - from.month);
}

export function monthBounds(year: number, month: number): { start: number; end: number } {
  return {
    start: Date.UTC(year, month - 1, 1),
    end: Date.UTC(year, month, 1),
  };
}

export function roundTo(value: number, places: number): number {
  const factor = 10 ** places;
  return Math.round(value * factor) / factor;
}
