import { vi } from "vitest";
import { mkdtempSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { parseConfig } from "../../src/config/schema.js";
import type { TextpulseConfig } from "../../src/config/types.js";
import type { MessageEventInput } from "../../src/messages/types.js";
import { AnalyticsDB } from "../../src/store/db.js";

/** 2024-03-04T10:00:00Z, a Monday. */
export const T0 = Date.UTC(2024, 2, 4, 10, 0, 0);
export const MINUTE = 60_000;

export function makeConfig(raw: Record<string, unknown> = {}): TextpulseConfig {
  return parseConfig(raw);
}

export function makeEvent(overrides: Partial<MessageEventInput> = {}): MessageEventInput {
  return {
    accountId: "acct-1",
    counterpartId: "cp-1",
    counterpartAddress: "+15550001111",
    direction: "inbound",
    body: "Hello there",
    timestamp: T0,
    ...overrides,
  };
}

export function mockLogger() {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    child: vi.fn().mockReturnThis(),
    fatal: vi.fn(),
  } as any;
}

export interface TempDb {
  dir: string;
  db: AnalyticsDB;
  cleanup: () => void;
}

export function openTempDb(prefix = "textpulse-test-"): TempDb {
  const dir = mkdtempSync(join(tmpdir(), prefix));
  const db = new AnalyticsDB(dir);
  return {
    dir,
    db,
    cleanup: () => {
      db.close();
      rmSync(dir, { recursive: true, force: true });
    },
  };
}
