import { randomUUID } from "node:crypto";
import type { AnalyticsDB } from "../store/db.js";
import type { Counterpart, MessageRecord } from "./types.js";

export interface AppendMessageParams {
  eventId?: string | null;
  accountId: string;
  counterpartId: string;
  counterpartAddress: string;
  direction: MessageRecord["direction"];
  aiGenerated: boolean;
  body?: string | null;
  status?: string | null;
  aiConfidence?: number | null;
  processingTimeMs?: number | null;
  sentiment?: number | null;
  createdAt: number;
}

/** Append-only message log plus the per-account counterpart directory. */
export class MessageLog {
  private readonly db;

  constructor(analyticsDb: AnalyticsDB) {
    this.db = analyticsDb.raw();
  }

  append(params: AppendMessageParams): MessageRecord {
    const id = randomUUID();
    this.db
      .prepare(
        `INSERT INTO messages (id, event_id, account_id, counterpart_id, counterpart_address, direction,
           ai_generated, body, status, ai_confidence, processing_time_ms, sentiment, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        id,
        params.eventId ?? null,
        params.accountId,
        params.counterpartId,
        params.counterpartAddress,
        params.direction,
        params.aiGenerated ? 1 : 0,
        params.body ?? null,
        params.status ?? null,
        params.aiConfidence ?? null,
        params.processingTimeMs ?? null,
        params.sentiment ?? null,
        params.createdAt,
      );
    const record = this.get(id);
    if (!record) throw new Error(`Message ${id} missing after insert`);
    return record;
  }

  get(id: string): MessageRecord | null {
    const row = this.db.prepare("SELECT * FROM messages WHERE id = ?").get(id) as
      | Record<string, unknown>
      | undefined;
    return row ? toMessageRecord(row) : null;
  }

  findByEvent(accountId: string, eventId: string): MessageRecord | null {
    const row = this.db
      .prepare("SELECT * FROM messages WHERE account_id = ? AND event_id = ?")
      .get(accountId, eventId) as Record<string, unknown> | undefined;
    return row ? toMessageRecord(row) : null;
  }

  listThread(accountId: string, counterpartAddress: string, limit = 100): MessageRecord[] {
    const rows = this.db
      .prepare(
        `SELECT * FROM messages WHERE account_id = ? AND counterpart_address = ?
         ORDER BY created_at DESC, rowid DESC LIMIT ?`,
      )
      .all(accountId, counterpartAddress, limit) as Record<string, unknown>[];
    return rows.map(toMessageRecord);
  }

  /** Inserts the counterpart on first contact; later calls leave it untouched. */
  ensureCounterpart(accountId: string, counterpartId: string, address: string, at: number): Counterpart {
    this.db
      .prepare(
        `INSERT INTO counterparts (id, account_id, address, first_contact_at) VALUES (?, ?, ?, ?)
         ON CONFLICT(account_id, address) DO NOTHING`,
      )
      .run(counterpartId, accountId, address, at);
    const row = this.db
      .prepare("SELECT * FROM counterparts WHERE account_id = ? AND address = ?")
      .get(accountId, address) as Record<string, unknown>;
    return {
      id: row["id"] as string,
      accountId: row["account_id"] as string,
      address: row["address"] as string,
      firstContactAt: row["first_contact_at"] as number,
    };
  }
}

function toMessageRecord(row: Record<string, unknown>): MessageRecord {
  return {
    id: row["id"] as string,
    eventId: (row["event_id"] as string | null) ?? null,
    accountId: row["account_id"] as string,
    counterpartId: row["counterpart_id"] as string,
    counterpartAddress: row["counterpart_address"] as string,
    direction: row["direction"] === "outbound" ? "outbound" : "inbound",
    aiGenerated: row["ai_generated"] === 1,
    body: (row["body"] as string | null) ?? null,
    status: (row["status"] as string | null) ?? null,
    aiConfidence: (row["ai_confidence"] as number | null) ?? null,
    processingTimeMs: (row["processing_time_ms"] as number | null) ?? null,
    sentiment: (row["sentiment"] as number | null) ?? null,
    createdAt: row["created_at"] as number,
  };
}
