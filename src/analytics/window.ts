import type { PeriodPreset } from "../config/types.js";
import { DAY_MS, MAX_EPOCH_MS } from "../utils/time.js";

export interface TimeWindow {
  /** Inclusive, epoch ms. */
  readonly start: number;
  /** Exclusive, epoch ms. */
  readonly end: number;
  readonly period: PeriodPreset | "custom";
}

export type WindowSpec =
  | string
  | { readonly start: number | string; readonly end: number | string };

const PRESET_DAYS: Record<PeriodPreset, number> = {
  "1d": 1,
  "7d": 7,
  "30d": 30,
  "90d": 90,
  "1y": 365,
};

const ALIASES: Record<string, PeriodPreset> = {
  "24h": "1d",
  "365d": "1y",
};

export function isPeriodPreset(value: string): value is PeriodPreset {
  return Object.prototype.hasOwnProperty.call(PRESET_DAYS, value);
}

/** Unknown names resolve to `fallback` rather than failing. */
export function resolvePeriod(period: string | undefined, fallback: PeriodPreset): PeriodPreset {
  if (period === undefined) return fallback;
  if (isPeriodPreset(period)) return period;
  return ALIASES[period] ?? fallback;
}

export function presetWindow(period: PeriodPreset, now = Date.now()): TimeWindow {
  return { start: now - PRESET_DAYS[period] * DAY_MS, end: now, period };
}

/**
 * Turns a preset name or an explicit range into a half-open window.
 * Anything unusable (unknown name, unparseable bounds, end before start)
 * becomes the trailing `fallback` window.
 */
export function resolveWindow(
  spec: WindowSpec | undefined,
  fallback: PeriodPreset,
  now = Date.now(),
): TimeWindow {
  if (spec === undefined || typeof spec === "string") {
    return presetWindow(resolvePeriod(spec, fallback), now);
  }

  const start = toEpoch(spec.start);
  const end = toEpoch(spec.end);
  if (start === null || end === null || end <= start) {
    return presetWindow(fallback, now);
  }
  return { start, end, period: "custom" };
}

/** Same-length window immediately before `window`. */
export function previousWindow(window: TimeWindow): TimeWindow {
  const length = window.end - window.start;
  return { start: window.start - length, end: window.start, period: window.period };
}

function toEpoch(value: number | string): number | null {
  const ms = typeof value === "number" ? value : Date.parse(value);
  return Number.isFinite(ms) && Math.abs(ms) <= MAX_EPOCH_MS ? ms : null;
}
