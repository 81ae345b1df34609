import { randomUUID } from "node:crypto";
import { z } from "zod";
import type { AnalyticsDB } from "../store/db.js";
import { DAY_MS } from "../utils/time.js";
import { bumpDailyStat, bumpPeakHour } from "./bounded.js";
import { calculateEngagementScore } from "./engagement.js";
import type {
  AddMessageOptions,
  ConversationOrder,
  ConversationRecord,
  ConversationStatus,
  DailyCounts,
  DailyStats,
  PeakHours,
} from "./types.js";

const peakHoursSchema = z.record(z.string(), z.number());
const dailyStatsSchema = z.record(
  z.string(),
  z.object({ sent: z.number(), received: z.number() }),
);

const DATE_KEY = /^\d{4}-\d{2}-\d{2}$/;

const ORDER_COLUMNS: Record<ConversationOrder, string> = {
  engagementScore: "engagement_score",
  totalMessages: "total_messages",
  responseRate: "response_rate",
  lastInteractionAt: "last_interaction_at",
};

export interface ConversationAggregatorOptions {
  readonly peakHourCap?: number;
  readonly dailyStatsCap?: number;
}

/** Fields a mutation may change; everything else is identity or bookkeeping. */
interface MutableFields {
  totalMessages: number;
  aiResponses: number;
  responseRate: number;
  avgResponseTimeSeconds: number | null;
  sentimentScore: number | null;
  engagementScore: number;
  lastInteractionAt: number;
  status: ConversationStatus;
  peakHours: PeakHours;
  dailyStats: DailyStats;
}

/**
 * Rolling per-conversation statistics keyed by (account, counterpart
 * address). Each mutation reads, transforms and writes the row inside an
 * IMMEDIATE transaction, so two writers never interleave on the same row.
 */
export class ConversationAggregator {
  private readonly db;
  private readonly peakHourCap: number;
  private readonly dailyStatsCap: number;

  constructor(
    private readonly analyticsDb: AnalyticsDB,
    options: ConversationAggregatorOptions = {},
  ) {
    this.db = analyticsDb.raw();
    this.peakHourCap = options.peakHourCap ?? 5;
    this.dailyStatsCap = options.dailyStatsCap ?? 30;
  }

  getOrCreate(
    accountId: string,
    counterpartId: string,
    counterpartAddress: string,
    at = Date.now(),
  ): ConversationRecord {
    this.db
      .prepare(
        `INSERT INTO conversation_records
           (id, account_id, counterpart_id, counterpart_address, last_interaction_at, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT(account_id, counterpart_address) DO NOTHING`,
      )
      .run(randomUUID(), accountId, counterpartId, counterpartAddress, at, at, at);

    const record = this.get(accountId, counterpartAddress);
    if (!record) {
      throw new Error(`Conversation row vanished after insert for account ${accountId}`);
    }
    return record;
  }

  get(accountId: string, counterpartAddress: string): ConversationRecord | null {
    const row = this.db
      .prepare("SELECT * FROM conversation_records WHERE account_id = ? AND counterpart_address = ?")
      .get(accountId, counterpartAddress) as Record<string, unknown> | undefined;
    return row ? toConversationRecord(row) : null;
  }

  addMessage(
    accountId: string,
    counterpartId: string,
    counterpartAddress: string,
    options: AddMessageOptions = {},
  ): ConversationRecord {
    const latency = options.responseLatencySeconds ?? null;
    if (latency !== null && (!Number.isFinite(latency) || latency < 0)) {
      throw new Error(`Response latency must be a non-negative number, got ${latency}`);
    }
    const at = options.at ?? Date.now();

    return this.mutate(accountId, counterpartId, counterpartAddress, at, (rec) => {
      const totalMessages = rec.totalMessages + 1;
      const aiResponses = rec.aiResponses + (options.aiGenerated ? 1 : 0);
      return {
        totalMessages,
        aiResponses,
        responseRate: responseRate(aiResponses, totalMessages),
        avgResponseTimeSeconds:
          latency === null ? rec.avgResponseTimeSeconds : halvingBlend(rec.avgResponseTimeSeconds, latency),
        lastInteractionAt: at,
        status: "active",
      };
    });
  }

  updateSentiment(
    accountId: string,
    counterpartId: string,
    counterpartAddress: string,
    score: number,
  ): ConversationRecord {
    if (!Number.isFinite(score) || score < -1 || score > 1) {
      throw new Error(`Sentiment must be within [-1, 1], got ${score}`);
    }
    return this.mutate(accountId, counterpartId, counterpartAddress, Date.now(), (rec) => ({
      sentimentScore: halvingBlend(rec.sentimentScore, score),
    }));
  }

  updateEngagement(
    accountId: string,
    counterpartId: string,
    counterpartAddress: string,
    now = Date.now(),
  ): ConversationRecord {
    return this.mutate(accountId, counterpartId, counterpartAddress, now, (rec) => ({
      engagementScore: calculateEngagementScore(rec, now),
    }));
  }

  updatePeakHours(
    accountId: string,
    counterpartId: string,
    counterpartAddress: string,
    hour: number,
  ): ConversationRecord {
    if (!Number.isInteger(hour) || hour < 0 || hour > 23) {
      throw new Error(`Hour must be an integer in 0..23, got ${hour}`);
    }
    return this.mutate(accountId, counterpartId, counterpartAddress, Date.now(), (rec) => ({
      peakHours: bumpPeakHour(rec.peakHours, hour, this.peakHourCap),
    }));
  }

  updateDailyStats(
    accountId: string,
    counterpartId: string,
    counterpartAddress: string,
    date: string,
    kind: keyof DailyCounts,
  ): ConversationRecord {
    if (!DATE_KEY.test(date)) {
      throw new Error(`Date must be formatted YYYY-MM-DD, got ${date}`);
    }
    return this.mutate(accountId, counterpartId, counterpartAddress, Date.now(), (rec) => ({
      dailyStats: bumpDailyStat(rec.dailyStats, date, kind, this.dailyStatsCap),
    }));
  }

  markInactive(accountId: string, counterpartId: string, counterpartAddress: string): ConversationRecord {
    return this.mutate(accountId, counterpartId, counterpartAddress, Date.now(), () => ({
      status: "inactive",
    }));
  }

  listForAccount(accountId: string, opts: { activeOnly?: boolean } = {}): ConversationRecord[] {
    const activeOnly = opts.activeOnly ?? true;
    const rows = this.db
      .prepare(
        `SELECT * FROM conversation_records
         WHERE account_id = ? ${activeOnly ? "AND status = 'active'" : ""}
         ORDER BY last_interaction_at DESC`,
      )
      .all(accountId) as Record<string, unknown>[];
    return rows.map(toConversationRecord);
  }

  /** Unknown `orderBy` values fall back to engagement score. */
  top(
    accountId: string,
    opts: { limit?: number; orderBy?: string; activeOnly?: boolean } = {},
  ): ConversationRecord[] {
    const column = isConversationOrder(opts.orderBy)
      ? ORDER_COLUMNS[opts.orderBy]
      : ORDER_COLUMNS.engagementScore;
    const rows = this.db
      .prepare(
        `SELECT * FROM conversation_records
         WHERE account_id = ? ${opts.activeOnly ? "AND status = 'active'" : ""}
         ORDER BY ${column} DESC, counterpart_address ASC LIMIT ?`,
      )
      .all(accountId, opts.limit ?? 10) as Record<string, unknown>[];
    return rows.map(toConversationRecord);
  }

  /** Recomputes engagement for every active conversation; returns the count. */
  refreshEngagement(accountId?: string, now = Date.now()): number {
    const rows = (
      accountId
        ? this.db
            .prepare("SELECT * FROM conversation_records WHERE status = 'active' AND account_id = ?")
            .all(accountId)
        : this.db.prepare("SELECT * FROM conversation_records WHERE status = 'active'").all()
    ) as Record<string, unknown>[];

    const update = this.db.prepare(
      `UPDATE conversation_records SET engagement_score = ?, updated_at = ?
       WHERE account_id = ? AND counterpart_address = ?`,
    );
    this.analyticsDb.write(() => {
      for (const rec of rows.map(toConversationRecord)) {
        update.run(calculateEngagementScore(rec, now), now, rec.accountId, rec.counterpartAddress);
      }
    });
    return rows.length;
  }

  /** Marks conversations idle for longer than `idleDays` inactive; returns the count. */
  markIdleInactive(idleDays: number, now = Date.now()): number {
    const cutoff = now - idleDays * DAY_MS;
    const result = this.db
      .prepare(
        `UPDATE conversation_records SET status = 'inactive', updated_at = ?
         WHERE status = 'active' AND last_interaction_at < ?`,
      )
      .run(now, cutoff);
    return result.changes;
  }

  private mutate(
    accountId: string,
    counterpartId: string,
    counterpartAddress: string,
    at: number,
    change: (current: ConversationRecord) => Partial<MutableFields>,
  ): ConversationRecord {
    return this.analyticsDb.write(() => {
      const current = this.getOrCreate(accountId, counterpartId, counterpartAddress, at);
      const next: MutableFields = { ...pickMutable(current), ...change(current) };
      this.db
        .prepare(
          `UPDATE conversation_records SET
             total_messages = ?, ai_responses = ?, response_rate = ?, avg_response_time_s = ?,
             sentiment_score = ?, engagement_score = ?, last_interaction_at = ?, status = ?,
             peak_hours = ?, daily_stats = ?, updated_at = ?
           WHERE account_id = ? AND counterpart_address = ?`,
        )
        .run(
          next.totalMessages,
          next.aiResponses,
          next.responseRate,
          next.avgResponseTimeSeconds,
          next.sentimentScore,
          next.engagementScore,
          next.lastInteractionAt,
          next.status,
          JSON.stringify(next.peakHours),
          JSON.stringify(next.dailyStats),
          Date.now(),
          accountId,
          counterpartAddress,
        );
      return this.getOrCreate(accountId, counterpartId, counterpartAddress, at);
    });
  }
}

/** Naive two-point blend: each sample pulls the value halfway toward itself. */
export function halvingBlend(prior: number | null, sample: number): number {
  return prior === null ? sample : (prior + sample) / 2;
}

export function responseRate(aiResponses: number, totalMessages: number): number {
  return totalMessages > 0 ? aiResponses / totalMessages : 0;
}

function isConversationOrder(value: string | undefined): value is ConversationOrder {
  return value !== undefined && Object.prototype.hasOwnProperty.call(ORDER_COLUMNS, value);
}

function pickMutable(rec: ConversationRecord): MutableFields {
  return {
    totalMessages: rec.totalMessages,
    aiResponses: rec.aiResponses,
    responseRate: rec.responseRate,
    avgResponseTimeSeconds: rec.avgResponseTimeSeconds,
    sentimentScore: rec.sentimentScore,
    engagementScore: rec.engagementScore,
    lastInteractionAt: rec.lastInteractionAt,
    status: rec.status,
    peakHours: rec.peakHours,
    dailyStats: rec.dailyStats,
  };
}

function toConversationRecord(row: Record<string, unknown>): ConversationRecord {
  return {
    id: row["id"] as string,
    accountId: row["account_id"] as string,
    counterpartId: row["counterpart_id"] as string,
    counterpartAddress: row["counterpart_address"] as string,
    totalMessages: row["total_messages"] as number,
    aiResponses: row["ai_responses"] as number,
    responseRate: row["response_rate"] as number,
    avgResponseTimeSeconds: (row["avg_response_time_s"] as number | null) ?? null,
    sentimentScore: (row["sentiment_score"] as number | null) ?? null,
    engagementScore: row["engagement_score"] as number,
    lastInteractionAt: row["last_interaction_at"] as number,
    status: row["status"] === "inactive" ? "inactive" : "active",
    peakHours: peakHoursSchema.parse(JSON.parse(row["peak_hours"] as string)),
    dailyStats: dailyStatsSchema.parse(JSON.parse(row["daily_stats"] as string)),
    createdAt: row["created_at"] as number,
    updatedAt: row["updated_at"] as number,
  };
}
