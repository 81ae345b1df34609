import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { AnalyticsQueries } from "../../src/analytics/queries.js";
import { ConversationAggregator } from "../../src/conversations/aggregator.js";
import { MaintenanceScheduler } from "../../src/cron/service.js";
import { MessageIngestor } from "../../src/messages/ingest.js";
import { UsageRecorder } from "../../src/usage/recorder.js";
import { DAY_MS } from "../../src/utils/time.js";
import { makeConfig, makeEvent, mockLogger, openTempDb, MINUTE, T0, type TempDb } from "../helpers/fixtures.js";

describe("MaintenanceScheduler", () => {
  let tmp: TempDb;
  let usage: UsageRecorder;
  let conversations: ConversationAggregator;
  let queries: AnalyticsQueries;
  let logger: ReturnType<typeof mockLogger>;
  let scheduler: MaintenanceScheduler;

  function build(maintenance: Record<string, unknown> = {}, now = T0): MaintenanceScheduler {
    return new MaintenanceScheduler({
      usage,
      conversations,
      queries,
      config: makeConfig({ maintenance }).maintenance,
      logger,
      clock: () => now,
    });
  }

  beforeEach(() => {
    tmp = openTempDb("textpulse-maint-");
    usage = new UsageRecorder(tmp.db);
    conversations = new ConversationAggregator(tmp.db);
    queries = new AnalyticsQueries(tmp.db, makeConfig().analytics);
    logger = mockLogger();
    scheduler = build();
  });

  afterEach(() => {
    scheduler.stop();
    vi.restoreAllMocks();
    tmp.cleanup();
  });

  it("offers the inactivity sweep only when configured", () => {
    expect(scheduler.jobNames()).toEqual(["engagement", "rollup", "retention"]);
    scheduler = build({ inactiveAfterDays: 30 });
    expect(scheduler.jobNames()).toEqual(["engagement", "rollup", "retention", "inactivity"]);
  });

  it("schedules every job on start", () => {
    scheduler.start();
    expect(scheduler.isScheduled("engagement")).toBe(true);
    expect(scheduler.isScheduled("rollup")).toBe(true);
    expect(scheduler.isScheduled("retention")).toBe(true);
    expect(scheduler.nextRun("rollup")).toBeInstanceOf(Date);
    expect(logger.info).toHaveBeenCalledWith(
      expect.objectContaining({ count: 3 }),
      "Maintenance scheduler started",
    );
  });

  it("schedules nothing when disabled", () => {
    scheduler = build({ enabled: false });
    scheduler.start();
    expect(scheduler.isScheduled("engagement")).toBe(false);
    expect(scheduler.nextRun("engagement")).toBeNull();
    expect(logger.info).toHaveBeenCalledWith("Maintenance disabled");
  });

  it("stops all scheduled jobs", () => {
    scheduler.start();
    scheduler.stop();
    expect(scheduler.isScheduled("engagement")).toBe(false);
    expect(logger.info).toHaveBeenCalledWith("Maintenance scheduler stopped");
  });

  it("applies the current month's rollup", () => {
    const ingestor = new MessageIngestor({ db: tmp.db, usage, conversations, logger });
    ingestor.ingest(makeEvent({ direction: "inbound", timestamp: T0 }));
    ingestor.ingest(makeEvent({ direction: "outbound", timestamp: T0 + 4 * MINUTE }));

    const entry = scheduler.runNow("rollup");

    expect(entry).toMatchObject({ job: "rollup", success: true, affected: 1 });
    const record = usage.get("acct-1", 2024, 3);
    expect(record?.uniqueConversations).toBe(1);
    expect(record?.avgResponseTimeSeconds).toBe(240);
    expect(record?.peakHour).toBe(10);
    expect(record?.peakDay).toBe("Monday");
  });

  it("finalises the previous month on the first of the month", () => {
    const ingestor = new MessageIngestor({ db: tmp.db, usage, conversations, logger });
    ingestor.ingest(makeEvent({ direction: "inbound", timestamp: T0 }));
    ingestor.ingest(makeEvent({ direction: "outbound", timestamp: T0 + 4 * MINUTE }));
    scheduler = build({}, Date.UTC(2024, 3, 1, 0, 15));

    const entry = scheduler.runNow("rollup");

    expect(entry).toMatchObject({ job: "rollup", success: true, affected: 1 });
    expect(usage.get("acct-1", 2024, 3)?.avgResponseTimeSeconds).toBe(240);
    expect(usage.get("acct-1", 2024, 4)).toBeNull();
  });

  it("rolls up only the current month on other days", () => {
    usage.recordReceived("acct-1", 1, T0);
    scheduler = build({}, Date.UTC(2024, 3, 2, 0, 15));
    expect(scheduler.runNow("rollup").affected).toBe(0);
    expect(usage.get("acct-1", 2024, 3)?.uniqueConversations).toBeNull();
  });

  it("purges usage beyond the retention horizon", () => {
    usage.getOrCreate("acct-1", 2021, 6);
    usage.getOrCreate("acct-1", 2024, 2);
    const entry = scheduler.runNow("retention");
    expect(entry.affected).toBe(1);
    expect(usage.listForAccount("acct-1")).toHaveLength(1);
  });

  it("marks idle conversations inactive", () => {
    scheduler = build({ inactiveAfterDays: 7 });
    conversations.addMessage("acct-1", "cp-1", "+15550001111", { at: T0 - 10 * DAY_MS });
    expect(scheduler.runNow("inactivity").affected).toBe(1);
    expect(conversations.get("acct-1", "+15550001111")?.status).toBe("inactive");
  });

  it("logs a failed run instead of throwing", () => {
    vi.spyOn(conversations, "refreshEngagement").mockImplementation(() => {
      throw new Error("disk full");
    });

    const entry = scheduler.runNow("engagement");

    expect(entry.success).toBe(false);
    expect(entry.error).toBe("disk full");
    expect(scheduler.runs.recent("engagement")[0]).toEqual(entry);
    expect(logger.error).toHaveBeenCalledWith(
      expect.objectContaining({ job: "engagement", error: "disk full" }),
      "Maintenance job failed",
    );
  });

  it("rejects unknown job names", () => {
    expect(() => scheduler.runNow("vacuum")).toThrow(
      "Unknown maintenance job: vacuum (available: engagement, rollup, retention)",
    );
  });
});
