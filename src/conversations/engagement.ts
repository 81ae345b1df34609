import { DAY_MS, roundTo } from "../utils/time.js";

export const ENGAGEMENT_WEIGHTS = {
  responseRate: 0.4,
  volume: 0.3,
  recency: 0.2,
  sentiment: 0.1,
} as const;

/** Message count at which the volume factor saturates. */
export const VOLUME_SATURATION = 50;
/** Days over which recency decays linearly to zero. */
export const RECENCY_DECAY_DAYS = 30;

export interface EngagementInputs {
  readonly responseRate: number;
  readonly totalMessages: number;
  readonly lastInteractionAt: number | null;
  readonly sentimentScore: number | null;
}

/**
 * Weighted blend of responsiveness, volume, recency and sentiment,
 * clamped to [0, 1] and rounded to two places. Negative sentiment does
 * not subtract; it simply contributes nothing.
 */
export function calculateEngagementScore(input: EngagementInputs, now = Date.now()): number {
  let score = 0;

  score += clamp01(input.responseRate) * ENGAGEMENT_WEIGHTS.responseRate;

  if (input.totalMessages > 0) {
    score += Math.min(input.totalMessages / VOLUME_SATURATION, 1) * ENGAGEMENT_WEIGHTS.volume;
  }

  if (input.lastInteractionAt !== null) {
    const daysSince = Math.floor((now - input.lastInteractionAt) / DAY_MS);
    const recency = Math.max(0, 1 - daysSince / RECENCY_DECAY_DAYS);
    score += Math.min(recency, 1) * ENGAGEMENT_WEIGHTS.recency;
  }

  if (input.sentimentScore !== null && input.sentimentScore > 0) {
    score += Math.min(input.sentimentScore, 1) * ENGAGEMENT_WEIGHTS.sentiment;
  }

  return roundTo(clamp01(score), 2);
}

export type EngagementLevel = "high" | "medium" | "low";

export function engagementLevel(score: number): EngagementLevel {
  if (score >= 0.8) return "high";
  if (score >= 0.5) return "medium";
  return "low";
}

function clamp01(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}
