import type { AnalyticsQueries } from "./queries.js";

export type ExportFormat = "json" | "csv";
export type ExportSection = "dashboard" | "messages" | "timeSeries" | "clients" | "growth";

const SECTIONS: readonly ExportSection[] = ["dashboard", "messages", "timeSeries", "clients", "growth"];

export interface ExportRequest {
  period?: string;
  sections?: readonly string[];
  format?: string;
}

export interface ExportResult {
  readonly format: ExportFormat;
  readonly period: string;
  readonly filename: string;
  /** Section name → payload for JSON, the CSV document for CSV. */
  readonly data: Partial<Record<ExportSection, unknown>> | string;
}

type Row = ReadonlyArray<string | number | null>;

export function isExportSection(value: string): value is ExportSection {
  return SECTIONS.some((s) => s === value);
}

/** Keeps known section names in request order, deduplicated; none → dashboard only. */
export function normalizeSections(sections: readonly string[] | undefined): ExportSection[] {
  const picked: ExportSection[] = [];
  for (const name of sections ?? []) {
    if (isExportSection(name) && !picked.includes(name)) picked.push(name);
  }
  return picked.length > 0 ? picked : ["dashboard"];
}

/** RFC 4180: quote fields holding a comma, quote or line break; double embedded quotes. */
export function csvField(value: string | number | null): string {
  if (value === null) return "";
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

/** "avgResponseTimeMinutes" → "Avg Response Time Minutes". */
export function titleCase(key: string): string {
  const words = key.replace(/([a-z0-9])([A-Z])/g, "$1 $2").split(/[\s_]+/);
  return words.map((w) => w.charAt(0).toUpperCase() + w.slice(1)).join(" ");
}

export class AnalyticsExporter {
  constructor(private readonly queries: AnalyticsQueries) {}

  export(accountId: string, request: ExportRequest = {}, now = Date.now()): ExportResult {
    const format: ExportFormat = request.format === "csv" ? "csv" : "json";
    const window = this.queries.window(request.period, now);
    const period = window.period;
    const sections = normalizeSections(request.sections);
    const filename = `analytics-${period}-${accountId}.${format}`;

    const data: Partial<Record<ExportSection, unknown>> = {};
    const blocks: Row[][] = [];

    for (const section of sections) {
      switch (section) {
        case "dashboard": {
          const metrics = this.queries.coreMetrics(accountId, window);
          data.dashboard = metrics;
          blocks.push([
            ["Metric", "Value"],
            ...Object.entries(metrics).map(([key, value]): Row => [titleCase(key), value]),
          ]);
          break;
        }
        case "messages": {
          const types = this.queries.messageTypes(accountId, window);
          const peakHours = this.queries.peakHours(accountId, window);
          const avgMessageLength = this.queries.avgMessageLength(accountId, window);
          data.messages = { types, peakHours, avgMessageLength };
          blocks.push([
            ["Hour", "Messages"],
            ...peakHours.map((h): Row => [h.hour, h.count]),
          ]);
          break;
        }
        case "timeSeries": {
          const buckets = this.queries.breakdown(accountId, window, "daily");
          data.timeSeries = buckets;
          blocks.push([
            ["Date", "Total Messages", "Sent", "Received", "AI Generated"],
            ...buckets.map((b): Row => [b.bucket, b.total, b.sent, b.received, b.aiGenerated]),
          ]);
          break;
        }
        case "clients": {
          const clients = this.queries.clientActivity(accountId, window);
          data.clients = clients;
          blocks.push([
            ["Client", "Sent", "Received", "AI Messages", "Last Active"],
            ...clients.map((c): Row => [
              c.counterpartAddress,
              c.messagesSent,
              c.messagesReceived,
              c.aiMessages,
              c.lastActive,
            ]),
          ]);
          break;
        }
        case "growth": {
          const growth = this.queries.growth(accountId, window);
          data.growth = growth;
          blocks.push([
            ["Metric", "Current", "Previous", "Growth %"],
            ["Messages", growth.currentPeriod.messages, growth.previousPeriod.messages, growth.messageGrowth],
            ["New Clients", growth.currentPeriod.clients, growth.previousPeriod.clients, growth.clientGrowth],
            ["AI Messages", growth.currentPeriod.aiMessages, growth.previousPeriod.aiMessages, growth.aiUsageGrowth],
          ]);
          break;
        }
      }
    }

    if (format === "json") {
      return { format, period, filename, data };
    }

    const lines: string[] = [];
    for (const block of blocks) {
      for (const row of block) lines.push(row.map(csvField).join(","));
      lines.push("");
    }
    return { format, period, filename, data: `${lines.join("\n")}\n` };
  }
}
