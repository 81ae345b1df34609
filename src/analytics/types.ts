import type { EngagementLevel } from "../conversations/engagement.js";
import type { PeriodPreset } from "../config/types.js";

export type Granularity = "hourly" | "daily" | "weekly";

export interface CoreMetrics {
  readonly totalMessages: number;
  readonly sentMessages: number;
  readonly receivedMessages: number;
  readonly aiMessages: number;
  readonly totalClients: number;
  readonly activeClients: number;
  readonly newClients: number;
  /** Percent of sent messages that were AI-generated. */
  readonly aiAdoptionRate: number;
  /** Sent per received, as a percent. */
  readonly responseRate: number;
  /** Percent of known counterparts active in the window. */
  readonly clientActivityRate: number;
  readonly avgResponseTimeMinutes: number;
}

export interface MessageTypes {
  readonly incoming: number;
  readonly outgoing: number;
  readonly aiGenerated: number;
  readonly manual: number;
}

export interface BreakdownBucket {
  readonly bucket: string;
  readonly sent: number;
  readonly received: number;
  readonly aiGenerated: number;
  readonly total: number;
}

export interface HourCount {
  readonly hour: number;
  readonly count: number;
}

export interface GrowthCounts {
  readonly messages: number;
  readonly clients: number;
  readonly aiMessages: number;
}

export interface GrowthMetrics {
  readonly messageGrowth: number;
  readonly clientGrowth: number;
  readonly aiUsageGrowth: number;
  readonly currentPeriod: GrowthCounts;
  readonly previousPeriod: GrowthCounts;
}

export interface ClientActivity {
  readonly counterpartAddress: string;
  readonly messagesSent: number;
  readonly messagesReceived: number;
  readonly aiMessages: number;
  readonly lastActive: string;
}

export interface AiUsageDay {
  readonly date: string;
  readonly aiMessages: number;
  readonly totalOutgoing: number;
  readonly aiRate: number;
}

export interface AiPerformance {
  readonly usageTrend: AiUsageDay[];
  readonly confidence: { readonly avg: number; readonly min: number; readonly max: number };
  readonly avgProcessingTimeMs: number;
}

export type EngagementLevels = Record<EngagementLevel, number>;

export interface MessageAnalytics {
  readonly types: MessageTypes;
  readonly peakHours: HourCount[];
  readonly avgMessageLength: number;
}

export interface DashboardData {
  readonly generatedAt: string;
  readonly period: PeriodPreset | "custom";
  readonly dateRange: { readonly start: string; readonly end: string };
  readonly coreMetrics: CoreMetrics;
  readonly messages: MessageAnalytics;
  readonly clients: ClientActivity[];
  readonly engagement: EngagementLevels;
  readonly aiPerformance: AiPerformance;
  readonly granularity: Granularity;
  readonly timeSeries: BreakdownBucket[];
  readonly growth: GrowthMetrics;
}
