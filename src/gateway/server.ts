import { Hono, type Context } from "hono";
import { serve } from "@hono/node-server";
import { z } from "zod";
import type { Logger } from "../logging/logger.js";
import type { MessageIngestor } from "../messages/ingest.js";
import { messageEventSchema } from "../messages/types.js";
import type { AnalyticsQueries } from "../analytics/queries.js";
import type { AnalyticsExporter } from "../analytics/export.js";
import type { ConversationAggregator } from "../conversations/aggregator.js";
import type { UsageRecorder } from "../usage/recorder.js";

const exportSchema = z.object({
  period: z.string().optional(),
  sections: z.array(z.string()).optional(),
  format: z.string().optional(),
});

const conversationQuerySchema = z.object({
  active: z.enum(["true", "false"]).optional(),
  orderBy: z.string().optional(),
  limit: z.coerce.number().int().positive().max(500).optional(),
});

const usageQuerySchema = z.object({
  months: z.coerce.number().int().positive().max(120).default(12),
});

export interface AnalyticsServerDeps {
  ingestor: MessageIngestor;
  queries: AnalyticsQueries;
  exporter: AnalyticsExporter;
  conversations: ConversationAggregator;
  usage: UsageRecorder;
  logger: Logger;
  port: number;
  hostname: string;
}

export class AnalyticsServer {
  readonly app: Hono;
  private server: ReturnType<typeof serve> | null = null;
  private readonly logger: Logger;
  private readonly startedAt = Date.now();

  constructor(private readonly deps: AnalyticsServerDeps) {
    this.logger = deps.logger.child({ component: "http" });
    this.app = new Hono();
    this.setupRoutes();
  }

  private setupRoutes(): void {
    this.app.onError((err, c) => {
      const accountId = c.req.param("accountId");
      this.logger.error({ err, accountId, path: c.req.path }, "Request failed");
      return c.json({ success: false, error: err.message }, 500);
    });

    this.app.get("/health", (c) => {
      return c.json({
        status: "ok",
        version: "0.1.0",
        uptime: Date.now() - this.startedAt,
      });
    });

    this.app.post("/events", async (c) => {
      const parsed = messageEventSchema.safeParse(await readJson(c));
      if (!parsed.success) {
        return c.json(
          { success: false, error: "Invalid request", details: parsed.error.flatten() },
          400,
        );
      }
      const result = this.deps.ingestor.ingest(parsed.data);
      return c.json({ success: true, ...result }, result.status === "recorded" ? 201 : 200);
    });

    this.app.get("/accounts/:accountId/analytics/dashboard", (c) => {
      const dashboard = this.deps.queries.dashboard(c.req.param("accountId"), c.req.query("period"));
      return c.json({ success: true, data: dashboard });
    });

    this.app.get("/accounts/:accountId/analytics/messages", (c) => {
      const accountId = c.req.param("accountId");
      const { queries } = this.deps;
      const window = queries.window(c.req.query("period"));
      return c.json({
        success: true,
        data: {
          period: window.period,
          types: queries.messageTypes(accountId, window),
          breakdown: queries.breakdown(accountId, window, c.req.query("breakdown")),
          peakHours: queries.peakHours(accountId, window),
          avgMessageLength: queries.avgMessageLength(accountId, window),
          avgResponseTimeMinutes: queries.avgResponseTime(accountId, window),
        },
      });
    });

    this.app.get("/accounts/:accountId/analytics/clients", (c) => {
      const accountId = c.req.param("accountId");
      const { queries } = this.deps;
      const window = queries.window(c.req.query("period"));
      const core = queries.coreMetrics(accountId, window);
      return c.json({
        success: true,
        data: {
          period: window.period,
          totalClients: core.totalClients,
          activeClients: core.activeClients,
          newClients: core.newClients,
          clientActivityRate: core.clientActivityRate,
          clients: queries.clientActivity(accountId, window),
          engagement: queries.engagementLevels(accountId, window),
        },
      });
    });

    this.app.get("/accounts/:accountId/analytics/growth", (c) => {
      const { queries } = this.deps;
      const window = queries.window(c.req.query("period"));
      return c.json({
        success: true,
        data: { period: window.period, ...queries.growth(c.req.param("accountId"), window) },
      });
    });

    this.app.get("/accounts/:accountId/conversations", (c) => {
      const parsed = conversationQuerySchema.safeParse(c.req.query());
      if (!parsed.success) {
        return c.json(
          { success: false, error: "Invalid query", details: parsed.error.flatten() },
          400,
        );
      }
      const accountId = c.req.param("accountId");
      const { active, orderBy, limit } = parsed.data;
      const activeOnly = active !== "false";
      const conversations =
        orderBy !== undefined || limit !== undefined
          ? this.deps.conversations.top(accountId, { orderBy, limit, activeOnly })
          : this.deps.conversations.listForAccount(accountId, { activeOnly });
      return c.json({ success: true, conversations });
    });

    this.app.get("/accounts/:accountId/usage", (c) => {
      const parsed = usageQuerySchema.safeParse(c.req.query());
      if (!parsed.success) {
        return c.json(
          { success: false, error: "Invalid query", details: parsed.error.flatten() },
          400,
        );
      }
      const records = this.deps.usage.listForAccount(c.req.param("accountId"), parsed.data.months);
      return c.json({ success: true, records });
    });

    this.app.post("/accounts/:accountId/analytics/export", async (c) => {
      const parsed = exportSchema.safeParse((await readJson(c)) ?? {});
      if (!parsed.success) {
        return c.json(
          { success: false, error: "Invalid request", details: parsed.error.flatten() },
          400,
        );
      }
      const result = this.deps.exporter.export(c.req.param("accountId"), parsed.data);
      return c.json({ success: true, ...result });
    });
  }

  async start(): Promise<void> {
    await new Promise<void>((resolve) => {
      this.server = serve(
        { fetch: this.app.fetch, port: this.deps.port, hostname: this.deps.hostname },
        () => resolve(),
      );
    });
    this.logger.info({ port: this.deps.port, hostname: this.deps.hostname }, "HTTP server listening");
  }

  /** Resolves once in-flight requests have finished and the socket is closed. */
  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;
    await new Promise<void>((resolve, reject) => {
      server.close((err?: Error) => (err ? reject(err) : resolve()));
    });
    this.logger.info("HTTP server closed");
  }
}

/** An unparseable body reads as `undefined`, which then fails schema validation. */
async function readJson(c: Context): Promise<unknown> {
  try {
    return await c.req.json();
  } catch {
    return undefined;
  }
}
