import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { ConversationAggregator, halvingBlend, responseRate } from "../../src/conversations/aggregator.js";
import { DAY_MS } from "../../src/utils/time.js";
import { openTempDb, T0, type TempDb } from "../helpers/fixtures.js";

const ACCT = "acct-1";
const CP = "cp-1";
const ADDR = "+15550001111";

describe("ConversationAggregator", () => {
  let tmp: TempDb;
  let agg: ConversationAggregator;

  beforeEach(() => {
    tmp = openTempDb("textpulse-conv-");
    agg = new ConversationAggregator(tmp.db, { peakHourCap: 5, dailyStatsCap: 30 });
  });

  afterEach(() => {
    tmp.cleanup();
  });

  describe("getOrCreate", () => {
    it("creates an empty active conversation", () => {
      const rec = agg.getOrCreate(ACCT, CP, ADDR, T0);
      expect(rec.totalMessages).toBe(0);
      expect(rec.aiResponses).toBe(0);
      expect(rec.responseRate).toBe(0);
      expect(rec.avgResponseTimeSeconds).toBeNull();
      expect(rec.sentimentScore).toBeNull();
      expect(rec.engagementScore).toBe(0);
      expect(rec.lastInteractionAt).toBe(T0);
      expect(rec.status).toBe("active");
      expect(rec.peakHours).toEqual({});
      expect(rec.dailyStats).toEqual({});
    });

    it("returns the existing row on repeated calls", () => {
      const a = agg.getOrCreate(ACCT, CP, ADDR, T0);
      const b = agg.getOrCreate(ACCT, CP, ADDR, T0 + 1000);
      expect(b.id).toBe(a.id);
      expect(b.lastInteractionAt).toBe(T0);
    });

    it("returns null from get for an unknown conversation", () => {
      expect(agg.get(ACCT, "+15559999999")).toBeNull();
    });
  });

  describe("addMessage", () => {
    it("increments totals and recomputes the response rate", () => {
      agg.addMessage(ACCT, CP, ADDR, { at: T0 });
      agg.addMessage(ACCT, CP, ADDR, { at: T0 + 1 });
      agg.addMessage(ACCT, CP, ADDR, { at: T0 + 2 });
      const rec = agg.addMessage(ACCT, CP, ADDR, { aiGenerated: true, at: T0 + 3 });
      expect(rec.totalMessages).toBe(4);
      expect(rec.aiResponses).toBe(1);
      expect(rec.responseRate).toBe(0.25);
      expect(rec.lastInteractionAt).toBe(T0 + 3);
    });

    it("blends latencies by halving", () => {
      agg.addMessage(ACCT, CP, ADDR, { aiGenerated: true, responseLatencySeconds: 10, at: T0 });
      const second = agg.addMessage(ACCT, CP, ADDR, { aiGenerated: true, responseLatencySeconds: 20, at: T0 });
      expect(second.avgResponseTimeSeconds).toBe(15);
      const third = agg.addMessage(ACCT, CP, ADDR, { aiGenerated: true, responseLatencySeconds: 5, at: T0 });
      expect(third.avgResponseTimeSeconds).toBe(10);
    });

    it("leaves the latency untouched when none is given", () => {
      agg.addMessage(ACCT, CP, ADDR, { responseLatencySeconds: 30, at: T0 });
      const rec = agg.addMessage(ACCT, CP, ADDR, { at: T0 });
      expect(rec.avgResponseTimeSeconds).toBe(30);
    });

    it("rejects a negative latency", () => {
      expect(() => agg.addMessage(ACCT, CP, ADDR, { responseLatencySeconds: -1 })).toThrow(
        "Response latency must be a non-negative number, got -1",
      );
    });

    it("reactivates an inactive conversation", () => {
      agg.addMessage(ACCT, CP, ADDR, { at: T0 });
      expect(agg.markInactive(ACCT, CP, ADDR).status).toBe("inactive");
      expect(agg.addMessage(ACCT, CP, ADDR, { at: T0 + 1 }).status).toBe("active");
    });
  });

  describe("updateSentiment", () => {
    it("blends scores by halving", () => {
      expect(agg.updateSentiment(ACCT, CP, ADDR, 0.5).sentimentScore).toBe(0.5);
      expect(agg.updateSentiment(ACCT, CP, ADDR, -0.5).sentimentScore).toBe(0);
    });

    it("rejects scores outside [-1, 1]", () => {
      expect(() => agg.updateSentiment(ACCT, CP, ADDR, 1.5)).toThrow(
        "Sentiment must be within [-1, 1], got 1.5",
      );
    });
  });

  describe("updateEngagement", () => {
    it("persists the computed score", () => {
      agg.addMessage(ACCT, CP, ADDR, { aiGenerated: true, at: T0 });
      agg.addMessage(ACCT, CP, ADDR, { aiGenerated: true, at: T0 });
      // 0.4 * 1 + 0.3 * (2 / 50) + 0.2 * 1
      const rec = agg.updateEngagement(ACCT, CP, ADDR, T0);
      expect(rec.engagementScore).toBe(0.61);
      expect(agg.get(ACCT, ADDR)?.engagementScore).toBe(0.61);
    });
  });

  describe("updatePeakHours", () => {
    it("keeps exactly the five busiest hours", () => {
      for (let hour = 9; hour >= 0; hour--) {
        for (let i = 0; i <= hour; i++) {
          agg.updatePeakHours(ACCT, CP, ADDR, hour);
        }
      }
      const rec = agg.get(ACCT, ADDR);
      expect(rec?.peakHours).toEqual({ "5": 6, "6": 7, "7": 8, "8": 9, "9": 10 });
    });

    it("rejects hours outside 0..23", () => {
      expect(() => agg.updatePeakHours(ACCT, CP, ADDR, 24)).toThrow(
        "Hour must be an integer in 0..23, got 24",
      );
    });
  });

  describe("updateDailyStats", () => {
    const dates = Array.from({ length: 40 }, (_, i) =>
      new Date(Date.UTC(2024, 0, 1) + i * DAY_MS).toISOString().slice(0, 10),
    );

    it("keeps the 30 most recent dates when fed in order", () => {
      for (const date of dates) agg.updateDailyStats(ACCT, CP, ADDR, date, "sent");
      const keys = Object.keys(agg.get(ACCT, ADDR)?.dailyStats ?? {}).sort();
      expect(keys).toHaveLength(30);
      expect(keys[0]).toBe("2024-01-11");
      expect(keys[29]).toBe("2024-02-09");
    });

    it("keeps the 30 most recent dates when fed newest first", () => {
      for (const date of [...dates].reverse()) agg.updateDailyStats(ACCT, CP, ADDR, date, "received");
      const keys = Object.keys(agg.get(ACCT, ADDR)?.dailyStats ?? {}).sort();
      expect(keys).toHaveLength(30);
      expect(keys[0]).toBe("2024-01-11");
    });

    it("counts sent and received separately", () => {
      agg.updateDailyStats(ACCT, CP, ADDR, "2024-03-04", "sent");
      agg.updateDailyStats(ACCT, CP, ADDR, "2024-03-04", "received");
      const rec = agg.updateDailyStats(ACCT, CP, ADDR, "2024-03-04", "received");
      expect(rec.dailyStats).toEqual({ "2024-03-04": { sent: 1, received: 2 } });
    });

    it("rejects malformed date keys", () => {
      expect(() => agg.updateDailyStats(ACCT, CP, ADDR, "2024/03/04", "sent")).toThrow(
        "Date must be formatted YYYY-MM-DD, got 2024/03/04",
      );
    });
  });

  describe("listing", () => {
    beforeEach(() => {
      agg.addMessage(ACCT, "cp-a", "+15550000001", { at: T0 });
      agg.addMessage(ACCT, "cp-b", "+15550000002", { at: T0 + 1000 });
      agg.addMessage(ACCT, "cp-b", "+15550000002", { aiGenerated: true, at: T0 + 2000 });
      agg.addMessage(ACCT, "cp-c", "+15550000003", { at: T0 + 500 });
      agg.markInactive(ACCT, "cp-c", "+15550000003");
    });

    it("lists active conversations by last interaction", () => {
      const addresses = agg.listForAccount(ACCT).map((r) => r.counterpartAddress);
      expect(addresses).toEqual(["+15550000002", "+15550000001"]);
    });

    it("includes inactive conversations when asked", () => {
      expect(agg.listForAccount(ACCT, { activeOnly: false })).toHaveLength(3);
    });

    it("orders top conversations by the requested field", () => {
      const top = agg.top(ACCT, { orderBy: "totalMessages", limit: 1 });
      expect(top.map((r) => r.counterpartAddress)).toEqual(["+15550000002"]);
    });

    it("limits top conversations to active ones when asked", () => {
      const top = agg.top(ACCT, { orderBy: "totalMessages", activeOnly: true });
      expect(top).toHaveLength(2);
      expect(top.every((r) => r.status === "active")).toBe(true);
    });

    it("falls back to engagement ordering for unknown fields", () => {
      agg.updateEngagement(ACCT, "cp-b", "+15550000002", T0);
      const top = agg.top(ACCT, { orderBy: "nonsense" });
      expect(top[0]?.counterpartAddress).toBe("+15550000002");
      expect(top).toHaveLength(3);
    });
  });

  describe("maintenance sweeps", () => {
    it("refreshes engagement for active conversations", () => {
      agg.addMessage(ACCT, "cp-a", "+15550000001", { aiGenerated: true, at: T0 });
      agg.addMessage("acct-2", "cp-b", "+15550000002", { at: T0 });
      expect(agg.refreshEngagement(undefined, T0)).toBe(2);
      expect(agg.refreshEngagement(ACCT, T0)).toBe(1);
      // 0.4 * 1 + 0.3 * (1 / 50) + 0.2 * 1
      expect(agg.get(ACCT, "+15550000001")?.engagementScore).toBe(0.61);
    });

    it("marks idle conversations inactive", () => {
      agg.addMessage(ACCT, "cp-a", "+15550000001", { at: T0 - 40 * DAY_MS });
      agg.addMessage(ACCT, "cp-b", "+15550000002", { at: T0 });
      expect(agg.markIdleInactive(30, T0)).toBe(1);
      expect(agg.get(ACCT, "+15550000001")?.status).toBe("inactive");
      expect(agg.get(ACCT, "+15550000002")?.status).toBe("active");
    });
  });
});

describe("halvingBlend", () => {
  it("takes the sample when there is no prior", () => {
    expect(halvingBlend(null, 12)).toBe(12);
  });

  it("averages prior and sample", () => {
    expect(halvingBlend(12, 4)).toBe(8);
  });
});

describe("responseRate", () => {
  it("is 0 when there are no messages", () => {
    expect(responseRate(0, 0)).toBe(0);
  });

  it("divides AI responses by total", () => {
    expect(responseRate(2, 5)).toBe(0.4);
  });
});
