import type { DailyCounts, DailyStats, PeakHours } from "./types.js";

/**
 * Increments `hour` and, if the histogram grew past `cap`, drops the entry
 * with the lowest count. Only one key can be new per call, so a single
 * eviction restores the bound. Ties between lowest counts are broken by
 * iteration order, which callers must not rely on.
 */
export function bumpPeakHour(hours: PeakHours, hour: number, cap: number): PeakHours {
  const next: PeakHours = { ...hours };
  const key = String(hour);
  next[key] = (next[key] ?? 0) + 1;

  const keys = Object.keys(next);
  if (keys.length > cap) {
    let lowest = keys[0];
    for (const k of keys) {
      if (next[k] < next[lowest]) lowest = k;
    }
    delete next[lowest];
  }
  return next;
}

/**
 * Increments the sent/received count for `date` and, past `cap`, drops the
 * oldest date. ISO date keys sort lexicographically by time.
 */
export function bumpDailyStat(
  stats: DailyStats,
  date: string,
  kind: keyof DailyCounts,
  cap: number,
): DailyStats {
  const next: DailyStats = {};
  for (const [k, v] of Object.entries(stats)) next[k] = { ...v };
  const entry = next[date] ?? { sent: 0, received: 0 };
  entry[kind] += 1;
  next[date] = entry;

  const keys = Object.keys(next);
  if (keys.length > cap) {
    let oldest = keys[0];
    for (const k of keys) {
      if (k < oldest) oldest = k;
    }
    delete next[oldest];
  }
  return next;
}
