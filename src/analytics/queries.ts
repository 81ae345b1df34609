import type { AnalyticsDB } from "../store/db.js";
import type { AnalyticsConfig } from "../config/types.js";
import { engagementLevel } from "../conversations/engagement.js";
import type { UsageRollup } from "../usage/types.js";
import { monthBounds, roundTo } from "../utils/time.js";
import { previousWindow, resolveWindow, type TimeWindow, type WindowSpec } from "./window.js";
import type {
  AiPerformance,
  BreakdownBucket,
  ClientActivity,
  CoreMetrics,
  DashboardData,
  EngagementLevels,
  Granularity,
  GrowthMetrics,
  HourCount,
  MessageTypes,
} from "./types.js";

const BUCKET_EXPR: Record<Granularity, string> = {
  hourly: "strftime('%Y-%m-%dT%H:00Z', created_at / 1000, 'unixepoch')",
  daily: "date(created_at / 1000, 'unixepoch')",
  weekly: "date(created_at / 1000, 'unixepoch', 'weekday 0', '-6 days')",
};

const HOUR_EXPR = "CAST(strftime('%H', created_at / 1000, 'unixepoch') AS INTEGER)";

const WEEKDAYS = ["Sunday", "Monday", "Tuesday", "Wednesday", "Thursday", "Friday", "Saturday"];

const IN_WINDOW = "account_id = ? AND created_at >= ? AND created_at < ?";

export function isGranularity(value: string | undefined): value is Granularity {
  return value !== undefined && Object.prototype.hasOwnProperty.call(BUCKET_EXPR, value);
}

/** Percent change; a rise from zero counts as 100%, zero to zero as 0%. */
export function growthRate(current: number, previous: number): number {
  if (previous === 0) return current > 0 ? 100 : 0;
  return roundTo(((current - previous) / previous) * 100, 2);
}

/** `numerator / denominator * 100` to two places, 0 on an empty denominator. */
export function percent(numerator: number, denominator: number): number {
  return denominator > 0 ? roundTo((numerator / denominator) * 100, 2) : 0;
}

export type AnalyticsQueryOptions = Pick<
  AnalyticsConfig,
  "defaultPeriod" | "maxResponseGapMinutes" | "peakHoursLimit"
>;

/**
 * Read side for dashboards. Everything is computed on demand from the
 * message log, the counterpart directory and the conversation rows;
 * absent data yields zeros and empty lists.
 */
export class AnalyticsQueries {
  private readonly db;

  constructor(
    analyticsDb: AnalyticsDB,
    private readonly options: AnalyticsQueryOptions,
  ) {
    this.db = analyticsDb.raw();
  }

  window(spec?: WindowSpec, now = Date.now()): TimeWindow {
    return resolveWindow(spec, this.options.defaultPeriod, now);
  }

  coreMetrics(accountId: string, window: TimeWindow): CoreMetrics {
    const row = this.db
      .prepare(
        `SELECT COUNT(*) AS total,
                COALESCE(SUM(direction = 'outbound'), 0) AS sent,
                COALESCE(SUM(direction = 'inbound'), 0) AS received,
                COALESCE(SUM(ai_generated), 0) AS ai,
                COUNT(DISTINCT counterpart_address) AS active
         FROM messages WHERE ${IN_WINDOW}`,
      )
      .get(accountId, window.start, window.end) as {
      total: number;
      sent: number;
      received: number;
      ai: number;
      active: number;
    };

    const totalClients = this.scalar(
      "SELECT COUNT(*) FROM counterparts WHERE account_id = ?",
      accountId,
    );
    const newClients = this.newClients(accountId, window);

    return {
      totalMessages: row.total,
      sentMessages: row.sent,
      receivedMessages: row.received,
      aiMessages: row.ai,
      totalClients,
      activeClients: row.active,
      newClients,
      aiAdoptionRate: percent(row.ai, row.sent),
      responseRate: percent(row.sent, row.received),
      clientActivityRate: percent(row.active, totalClients),
      avgResponseTimeMinutes: this.avgResponseTime(accountId, window),
    };
  }

  messageTypes(accountId: string, window: TimeWindow): MessageTypes {
    const row = this.db
      .prepare(
        `SELECT COALESCE(SUM(direction = 'inbound'), 0) AS incoming,
                COALESCE(SUM(direction = 'outbound'), 0) AS outgoing,
                COALESCE(SUM(ai_generated), 0) AS ai,
                COALESCE(SUM(direction = 'outbound' AND ai_generated = 0), 0) AS manual
         FROM messages WHERE ${IN_WINDOW}`,
      )
      .get(accountId, window.start, window.end) as {
      incoming: number;
      outgoing: number;
      ai: number;
      manual: number;
    };
    return { incoming: row.incoming, outgoing: row.outgoing, aiGenerated: row.ai, manual: row.manual };
  }

  /** Unknown granularities fall back to daily buckets. */
  breakdown(accountId: string, window: TimeWindow, granularity?: string): BreakdownBucket[] {
    const expr = BUCKET_EXPR[isGranularity(granularity) ? granularity : "daily"];
    const rows = this.db
      .prepare(
        `SELECT ${expr} AS bucket,
                SUM(direction = 'outbound') AS sent,
                SUM(direction = 'inbound') AS received,
                SUM(ai_generated) AS ai
         FROM messages WHERE ${IN_WINDOW}
         GROUP BY bucket ORDER BY bucket`,
      )
      .all(accountId, window.start, window.end) as Array<{
      bucket: string;
      sent: number;
      received: number;
      ai: number;
    }>;
    return rows.map((r) => ({
      bucket: r.bucket,
      sent: r.sent,
      received: r.received,
      aiGenerated: r.ai,
      total: r.sent + r.received,
    }));
  }

  peakHours(accountId: string, window: TimeWindow, limit?: number): HourCount[] {
    const rows = this.db
      .prepare(
        `SELECT ${HOUR_EXPR} AS hour, COUNT(*) AS count
         FROM messages WHERE ${IN_WINDOW}
         GROUP BY hour ORDER BY count DESC, hour ASC
         LIMIT ?`,
      )
      .all(accountId, window.start, window.end, limit ?? -1) as HourCount[];
    return rows.map((r) => ({ hour: r.hour, count: r.count }));
  }

  avgMessageLength(accountId: string, window: TimeWindow): number {
    const row = this.db
      .prepare(`SELECT AVG(LENGTH(body)) AS avg FROM messages WHERE ${IN_WINDOW} AND body IS NOT NULL`)
      .get(accountId, window.start, window.end) as { avg: number | null };
    return roundTo(row.avg ?? 0, 1);
  }

  /**
   * Mean minutes between an inbound message and the next message in the
   * same thread when that message is outbound. Pairs outside
   * (0, maxResponseGapMinutes] are discarded as noise.
   */
  avgResponseTime(accountId: string, window: TimeWindow): number {
    const gaps = this.responseGaps(accountId, window);
    if (gaps.length === 0) return 0;
    return roundTo(gaps.reduce((sum, g) => sum + g, 0) / gaps.length, 1);
  }

  growth(accountId: string, window: TimeWindow): GrowthMetrics {
    const previous = previousWindow(window);
    const current = this.growthCounts(accountId, window);
    const prior = this.growthCounts(accountId, previous);
    return {
      messageGrowth: growthRate(current.messages, prior.messages),
      clientGrowth: growthRate(current.clients, prior.clients),
      aiUsageGrowth: growthRate(current.aiMessages, prior.aiMessages),
      currentPeriod: current,
      previousPeriod: prior,
    };
  }

  clientActivity(accountId: string, window: TimeWindow): ClientActivity[] {
    const rows = this.db
      .prepare(
        `SELECT counterpart_address AS address,
                SUM(direction = 'outbound') AS sent,
                SUM(direction = 'inbound') AS received,
                SUM(ai_generated) AS ai,
                MAX(created_at) AS last_active
         FROM messages WHERE ${IN_WINDOW}
         GROUP BY counterpart_address
         ORDER BY last_active DESC, address ASC`,
      )
      .all(accountId, window.start, window.end) as Array<{
      address: string;
      sent: number;
      received: number;
      ai: number;
      last_active: number;
    }>;
    return rows.map((r) => ({
      counterpartAddress: r.address,
      messagesSent: r.sent,
      messagesReceived: r.received,
      aiMessages: r.ai,
      lastActive: new Date(r.last_active).toISOString(),
    }));
  }

  aiPerformance(accountId: string, window: TimeWindow): AiPerformance {
    const days = this.db
      .prepare(
        `SELECT ${BUCKET_EXPR.daily} AS date,
                SUM(ai_generated) AS ai,
                SUM(direction = 'outbound') AS outgoing
         FROM messages WHERE ${IN_WINDOW}
         GROUP BY date ORDER BY date`,
      )
      .all(accountId, window.start, window.end) as Array<{ date: string; ai: number; outgoing: number }>;

    const stats = this.db
      .prepare(
        `SELECT AVG(ai_confidence) AS avg, MIN(ai_confidence) AS min, MAX(ai_confidence) AS max
         FROM messages WHERE ${IN_WINDOW} AND ai_generated = 1 AND ai_confidence IS NOT NULL`,
      )
      .get(accountId, window.start, window.end) as {
      avg: number | null;
      min: number | null;
      max: number | null;
    };

    const processing = this.db
      .prepare(
        `SELECT AVG(processing_time_ms) AS avg
         FROM messages WHERE ${IN_WINDOW} AND ai_generated = 1 AND processing_time_ms IS NOT NULL`,
      )
      .get(accountId, window.start, window.end) as { avg: number | null };

    return {
      usageTrend: days.map((d) => ({
        date: d.date,
        aiMessages: d.ai,
        totalOutgoing: d.outgoing,
        aiRate: percent(d.ai, d.outgoing),
      })),
      confidence: {
        avg: roundTo(stats.avg ?? 0, 2),
        min: roundTo(stats.min ?? 0, 2),
        max: roundTo(stats.max ?? 0, 2),
      },
      avgProcessingTimeMs: roundTo(processing.avg ?? 0, 1),
    };
  }

  /** Conversations last active inside the window, bucketed by engagement score. */
  engagementLevels(accountId: string, window: TimeWindow): EngagementLevels {
    const rows = this.db
      .prepare(
        `SELECT engagement_score AS score FROM conversation_records
         WHERE account_id = ? AND last_interaction_at >= ? AND last_interaction_at < ?`,
      )
      .all(accountId, window.start, window.end) as Array<{ score: number }>;
    const levels: EngagementLevels = { high: 0, medium: 0, low: 0 };
    for (const r of rows) levels[engagementLevel(r.score)] += 1;
    return levels;
  }

  /** Full dashboard for a named period; the bucket size follows the period length. */
  dashboard(accountId: string, spec?: WindowSpec, now = Date.now()): DashboardData {
    const window = this.window(spec, now);
    const granularity = granularityFor(window);
    return {
      generatedAt: new Date(now).toISOString(),
      period: window.period,
      dateRange: {
        start: new Date(window.start).toISOString(),
        end: new Date(window.end).toISOString(),
      },
      coreMetrics: this.coreMetrics(accountId, window),
      messages: {
        types: this.messageTypes(accountId, window),
        peakHours: this.peakHours(accountId, window, this.options.peakHoursLimit),
        avgMessageLength: this.avgMessageLength(accountId, window),
      },
      clients: this.clientActivity(accountId, window),
      engagement: this.engagementLevels(accountId, window),
      aiPerformance: this.aiPerformance(accountId, window),
      granularity,
      timeSeries: this.breakdown(accountId, window, granularity),
      growth: this.growth(accountId, window),
    };
  }

  /** Month-level figures written onto the usage record by the rollup job. */
  monthlyRollup(accountId: string, year: number, month: number): UsageRollup {
    const bounds = monthBounds(year, month);
    const window: TimeWindow = { ...bounds, period: "custom" };

    const uniqueConversations = this.scalar(
      `SELECT COUNT(DISTINCT counterpart_address) FROM messages WHERE ${IN_WINDOW}`,
      accountId,
      window.start,
      window.end,
    );

    const gaps = this.responseGaps(accountId, window);
    const avgResponseTimeSeconds =
      gaps.length > 0 ? roundTo((gaps.reduce((s, g) => s + g, 0) / gaps.length) * 60, 1) : null;

    const sentiment = this.db
      .prepare(`SELECT AVG(sentiment) AS avg FROM messages WHERE ${IN_WINDOW} AND sentiment IS NOT NULL`)
      .get(accountId, window.start, window.end) as { avg: number | null };

    const engagement = this.db
      .prepare(
        `SELECT AVG(engagement_score) AS avg FROM conversation_records
         WHERE account_id = ? AND last_interaction_at >= ? AND last_interaction_at < ?`,
      )
      .get(accountId, window.start, window.end) as { avg: number | null };

    const [topHour] = this.peakHours(accountId, window, 1);

    const topDay = this.db
      .prepare(
        `SELECT CAST(strftime('%w', created_at / 1000, 'unixepoch') AS INTEGER) AS weekday, COUNT(*) AS count
         FROM messages WHERE ${IN_WINDOW}
         GROUP BY weekday ORDER BY count DESC, weekday ASC LIMIT 1`,
      )
      .get(accountId, window.start, window.end) as { weekday: number } | undefined;

    return {
      uniqueConversations,
      avgResponseTimeSeconds,
      sentimentAvg: sentiment.avg === null ? null : roundTo(sentiment.avg, 2),
      engagementScore: engagement.avg === null ? null : roundTo(engagement.avg, 2),
      peakHour: topHour ? topHour.hour : null,
      peakDay: topDay ? WEEKDAYS[topDay.weekday] : null,
    };
  }

  private responseGaps(accountId: string, window: TimeWindow): number[] {
    const rows = this.db
      .prepare(
        `SELECT counterpart_address AS address, direction, created_at
         FROM messages WHERE ${IN_WINDOW}
         ORDER BY counterpart_address, created_at, rowid`,
      )
      .all(accountId, window.start, window.end) as Array<{
      address: string;
      direction: string;
      created_at: number;
    }>;

    const gaps: number[] = [];
    for (let i = 0; i < rows.length - 1; i++) {
      const current = rows[i];
      const next = rows[i + 1];
      if (current.address !== next.address) continue;
      if (current.direction !== "inbound" || next.direction !== "outbound") continue;
      const minutes = (next.created_at - current.created_at) / 60_000;
      if (minutes > 0 && minutes <= this.options.maxResponseGapMinutes) {
        gaps.push(minutes);
      }
    }
    return gaps;
  }

  private growthCounts(accountId: string, window: TimeWindow): { messages: number; clients: number; aiMessages: number } {
    const row = this.db
      .prepare(
        `SELECT COUNT(*) AS messages, COALESCE(SUM(ai_generated), 0) AS ai
         FROM messages WHERE ${IN_WINDOW}`,
      )
      .get(accountId, window.start, window.end) as { messages: number; ai: number };
    return { messages: row.messages, clients: this.newClients(accountId, window), aiMessages: row.ai };
  }

  private newClients(accountId: string, window: TimeWindow): number {
    return this.scalar(
      `SELECT COUNT(*) FROM counterparts
       WHERE account_id = ? AND first_contact_at >= ? AND first_contact_at < ?`,
      accountId,
      window.start,
      window.end,
    );
  }

  private scalar(sql: string, ...params: unknown[]): number {
    const value = this.db.prepare(sql).pluck().get(...params);
    return typeof value === "number" ? value : 0;
  }
}

/** One day → hourly, up to a month → daily, longer → weekly. */
export function granularityFor(window: TimeWindow): Granularity {
  const days = (window.end - window.start) / 86_400_000;
  if (days <= 1) return "hourly";
  if (days <= 31) return "daily";
  return "weekly";
}
