import Database from "better-sqlite3";
import { databasePath } from "../config/paths.js";

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS counterparts (
  id               TEXT NOT NULL,
  account_id       TEXT NOT NULL,
  address          TEXT NOT NULL,
  first_contact_at INTEGER NOT NULL,
  PRIMARY KEY (account_id, address)
);
CREATE INDEX IF NOT EXISTS idx_counterparts_created ON counterparts(account_id, first_contact_at);

CREATE TABLE IF NOT EXISTS messages (
  id                 TEXT PRIMARY KEY,
  event_id           TEXT,
  account_id         TEXT NOT NULL,
  counterpart_id     TEXT NOT NULL,
  counterpart_address TEXT NOT NULL,
  direction          TEXT NOT NULL CHECK(direction IN ('inbound','outbound')),
  ai_generated       INTEGER NOT NULL DEFAULT 0,
  body               TEXT,
  status             TEXT,
  ai_confidence      REAL,
  processing_time_ms INTEGER,
  sentiment          REAL,
  created_at         INTEGER NOT NULL
);
CREATE UNIQUE INDEX IF NOT EXISTS idx_messages_event
  ON messages(account_id, event_id) WHERE event_id IS NOT NULL;
CREATE INDEX IF NOT EXISTS idx_messages_account_time ON messages(account_id, created_at);
CREATE INDEX IF NOT EXISTS idx_messages_thread
  ON messages(account_id, counterpart_address, created_at);

CREATE TABLE IF NOT EXISTS usage_records (
  id                      TEXT NOT NULL,
  account_id              TEXT NOT NULL,
  year                    INTEGER NOT NULL,
  month                   INTEGER NOT NULL CHECK(month BETWEEN 1 AND 12),
  messages_sent           INTEGER NOT NULL DEFAULT 0,
  messages_received       INTEGER NOT NULL DEFAULT 0,
  ai_responses_generated  INTEGER NOT NULL DEFAULT 0,
  templates_used          INTEGER NOT NULL DEFAULT 0,
  total_cost_micros       INTEGER NOT NULL DEFAULT 0,
  unique_conversations    INTEGER,
  avg_response_time_s     REAL,
  sentiment_avg           REAL,
  engagement_score        REAL,
  peak_hour               INTEGER,
  peak_day                TEXT,
  created_at              INTEGER NOT NULL,
  PRIMARY KEY (account_id, year, month)
);

CREATE TABLE IF NOT EXISTS conversation_records (
  id                  TEXT NOT NULL,
  account_id          TEXT NOT NULL,
  counterpart_id      TEXT NOT NULL,
  counterpart_address TEXT NOT NULL,
  total_messages      INTEGER NOT NULL DEFAULT 0,
  ai_responses        INTEGER NOT NULL DEFAULT 0,
  response_rate       REAL NOT NULL DEFAULT 0,
  avg_response_time_s REAL,
  sentiment_score     REAL,
  engagement_score    REAL NOT NULL DEFAULT 0,
  last_interaction_at INTEGER NOT NULL,
  status              TEXT NOT NULL DEFAULT 'active' CHECK(status IN ('active','inactive')),
  peak_hours          TEXT NOT NULL DEFAULT '{}',
  daily_stats         TEXT NOT NULL DEFAULT '{}',
  created_at          INTEGER NOT NULL,
  updated_at          INTEGER NOT NULL,
  PRIMARY KEY (account_id, counterpart_address)
);
CREATE INDEX IF NOT EXISTS idx_conversations_recent
  ON conversation_records(account_id, status, last_interaction_at);
`;

export class AnalyticsDB {
  private db: Database.Database;

  constructor(stateDir: string) {
    this.db = new Database(databasePath(stateDir));
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("busy_timeout = 5000");
    this.db.exec(SCHEMA_SQL);
  }

  raw(): Database.Database {
    return this.db;
  }

  /**
   * Runs `fn` in an IMMEDIATE transaction so the write lock is taken before
   * any read. Nested calls become savepoints of the outer transaction.
   */
  write<T>(fn: () => T): T {
    const tx = this.db.transaction(fn);
    return this.db.inTransaction ? tx() : tx.immediate();
  }

  isOpen(): boolean {
    return this.db.open;
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}
