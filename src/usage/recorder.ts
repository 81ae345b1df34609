import { randomUUID } from "node:crypto";
import type { AnalyticsDB } from "../store/db.js";
import { monthsBetween, roundTo, utcPeriod } from "../utils/time.js";
import type { UsageRecord, UsageRollup } from "./types.js";

const MICROS = 1_000_000;

type CounterColumn =
  | "messages_sent"
  | "messages_received"
  | "ai_responses_generated"
  | "templates_used"
  | "total_cost_micros";

/**
 * Monthly usage counters per account. Every mutator is a single
 * `col = col + ?` UPDATE against the period row, so concurrent writers
 * never lose increments.
 */
export class UsageRecorder {
  private readonly db;

  constructor(private readonly analyticsDb: AnalyticsDB) {
    this.db = analyticsDb.raw();
  }

  getOrCreate(accountId: string, year?: number, month?: number): UsageRecord {
    const now = Date.now();
    const current = utcPeriod(now);
    const period = { year: year ?? current.year, month: month ?? current.month };
    if (!Number.isInteger(period.month) || period.month < 1 || period.month > 12) {
      throw new Error(`Invalid month: ${period.month}`);
    }

    this.db
      .prepare(
        `INSERT INTO usage_records (id, account_id, year, month, created_at)
         VALUES (?, ?, ?, ?, ?)
         ON CONFLICT(account_id, year, month) DO NOTHING`,
      )
      .run(randomUUID(), accountId, period.year, period.month, now);

    const row = this.db
      .prepare("SELECT * FROM usage_records WHERE account_id = ? AND year = ? AND month = ?")
      .get(accountId, period.year, period.month) as Record<string, unknown>;
    return toUsageRecord(row);
  }

  get(accountId: string, year: number, month: number): UsageRecord | null {
    const row = this.db
      .prepare("SELECT * FROM usage_records WHERE account_id = ? AND year = ? AND month = ?")
      .get(accountId, year, month) as Record<string, unknown> | undefined;
    return row ? toUsageRecord(row) : null;
  }

  recordSent(accountId: string, count = 1, aiGenerated = false, at = Date.now()): UsageRecord {
    assertCount(count);
    return this.analyticsDb.write(() => {
      this.increment(accountId, at, "messages_sent", count);
      if (aiGenerated) {
        this.increment(accountId, at, "ai_responses_generated", count);
      }
      return this.current(accountId, at);
    });
  }

  recordReceived(accountId: string, count = 1, at = Date.now()): UsageRecord {
    assertCount(count);
    return this.analyticsDb.write(() => {
      this.increment(accountId, at, "messages_received", count);
      return this.current(accountId, at);
    });
  }

  recordTemplateUsed(accountId: string, count = 1, at = Date.now()): UsageRecord {
    assertCount(count);
    return this.analyticsDb.write(() => {
      this.increment(accountId, at, "templates_used", count);
      return this.current(accountId, at);
    });
  }

  recordCost(accountId: string, amount: number, at = Date.now()): UsageRecord {
    if (!Number.isFinite(amount) || amount < 0) {
      throw new Error(`Cost must be a non-negative number, got ${amount}`);
    }
    return this.analyticsDb.write(() => {
      this.increment(accountId, at, "total_cost_micros", Math.round(amount * MICROS));
      return this.current(accountId, at);
    });
  }

  listForAccount(accountId: string, months = 12): UsageRecord[] {
    const rows = this.db
      .prepare(
        `SELECT * FROM usage_records WHERE account_id = ?
         ORDER BY year DESC, month DESC LIMIT ?`,
      )
      .all(accountId, months) as Record<string, unknown>[];
    return rows.map(toUsageRecord);
  }

  /** Accounts with a usage row for the given month. */
  listAccounts(year: number, month: number): string[] {
    const rows = this.db
      .prepare("SELECT account_id FROM usage_records WHERE year = ? AND month = ? ORDER BY account_id")
      .all(year, month) as Array<{ account_id: string }>;
    return rows.map((r) => r.account_id);
  }

  applyRollup(accountId: string, year: number, month: number, rollup: UsageRollup): UsageRecord {
    return this.analyticsDb.write(() => {
      this.getOrCreate(accountId, year, month);
      this.db
        .prepare(
          `UPDATE usage_records SET unique_conversations = ?, avg_response_time_s = ?,
             sentiment_avg = ?, engagement_score = ?, peak_hour = ?, peak_day = ?
           WHERE account_id = ? AND year = ? AND month = ?`,
        )
        .run(
          rollup.uniqueConversations,
          rollup.avgResponseTimeSeconds,
          rollup.sentimentAvg,
          rollup.engagementScore,
          rollup.peakHour,
          rollup.peakDay,
          accountId,
          year,
          month,
        );
      return this.getOrCreate(accountId, year, month);
    });
  }

  /** Deletes periods more than `months` whole months before the one containing `now`. */
  purgeOlderThan(months: number, now = Date.now()): number {
    const current = utcPeriod(now);
    const rows = this.db
      .prepare("SELECT account_id, year, month FROM usage_records")
      .all() as Array<{ account_id: string; year: number; month: number }>;
    const expired = rows.filter((r) => monthsBetween({ year: r.year, month: r.month }, current) > months);
    if (expired.length === 0) return 0;

    const del = this.db.prepare(
      "DELETE FROM usage_records WHERE account_id = ? AND year = ? AND month = ?",
    );
    this.analyticsDb.write(() => {
      for (const r of expired) del.run(r.account_id, r.year, r.month);
    });
    return expired.length;
  }

  private increment(accountId: string, at: number, column: CounterColumn, by: number): void {
    const { year, month } = utcPeriod(at);
    this.getOrCreate(accountId, year, month);
    this.db
      .prepare(
        `UPDATE usage_records SET ${column} = ${column} + ?
         WHERE account_id = ? AND year = ? AND month = ?`,
      )
      .run(by, accountId, year, month);
  }

  private current(accountId: string, at: number): UsageRecord {
    const { year, month } = utcPeriod(at);
    return this.getOrCreate(accountId, year, month);
  }
}

function assertCount(count: number): void {
  if (!Number.isInteger(count) || count < 0) {
    throw new Error(`Count must be a non-negative integer, got ${count}`);
  }
}

function toUsageRecord(row: Record<string, unknown>): UsageRecord {
  return {
    id: row["id"] as string,
    accountId: row["account_id"] as string,
    year: row["year"] as number,
    month: row["month"] as number,
    messagesSent: row["messages_sent"] as number,
    messagesReceived: row["messages_received"] as number,
    aiResponsesGenerated: row["ai_responses_generated"] as number,
    templatesUsed: row["templates_used"] as number,
    totalCost: roundTo((row["total_cost_micros"] as number) / MICROS, 6),
    uniqueConversations: (row["unique_conversations"] as number | null) ?? null,
    avgResponseTimeSeconds: (row["avg_response_time_s"] as number | null) ?? null,
    sentimentAvg: (row["sentiment_avg"] as number | null) ?? null,
    engagementScore: (row["engagement_score"] as number | null) ?? null,
    peakHour: (row["peak_hour"] as number | null) ?? null,
    peakDay: (row["peak_day"] as string | null) ?? null,
    createdAt: row["created_at"] as number,
  };
}
