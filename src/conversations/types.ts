export type ConversationStatus = "active" | "inactive";

export type MessageDirection = "inbound" | "outbound";

export interface DailyCounts {
  sent: number;
  received: number;
}

/** Hour of day ("0".."23") → occurrences. */
export type PeakHours = Record<string, number>;

/** `YYYY-MM-DD` → sent/received counts. */
export type DailyStats = Record<string, DailyCounts>;

export interface ConversationRecord {
  readonly id: string;
  readonly accountId: string;
  readonly counterpartId: string;
  readonly counterpartAddress: string;
  readonly totalMessages: number;
  readonly aiResponses: number;
  readonly responseRate: number;
  /** Halving blend of observed latencies, not a true mean. */
  readonly avgResponseTimeSeconds: number | null;
  /** On the [-1, 1] scale; null until the first observation. */
  readonly sentimentScore: number | null;
  readonly engagementScore: number;
  readonly lastInteractionAt: number;
  readonly status: ConversationStatus;
  readonly peakHours: PeakHours;
  readonly dailyStats: DailyStats;
  readonly createdAt: number;
  readonly updatedAt: number;
}

export interface AddMessageOptions {
  readonly aiGenerated?: boolean;
  readonly responseLatencySeconds?: number | null;
  readonly at?: number;
}

export type ConversationOrder =
  | "engagementScore"
  | "totalMessages"
  | "responseRate"
  | "lastInteractionAt";

export interface ConversationKey {
  readonly accountId: string;
  readonly counterpartId: string;
  readonly counterpartAddress: string;
}
