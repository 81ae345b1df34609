import { loadConfig } from "../config/loader.js";
import { getStateDir, ensureDir } from "../config/paths.js";
import type { TextpulseConfig } from "../config/types.js";
import { createLogger, type Logger } from "../logging/logger.js";
import { AnalyticsDB } from "../store/db.js";
import { UsageRecorder } from "../usage/recorder.js";
import { ConversationAggregator } from "../conversations/aggregator.js";
import { MessageIngestor } from "../messages/ingest.js";
import { AnalyticsQueries } from "../analytics/queries.js";
import { AnalyticsExporter } from "../analytics/export.js";
import { MaintenanceScheduler } from "../cron/service.js";
import { AnalyticsServer } from "./server.js";

export interface AnalyticsServices {
  config: TextpulseConfig;
  logger: Logger;
  db: AnalyticsDB;
  usage: UsageRecorder;
  conversations: ConversationAggregator;
  ingestor: MessageIngestor;
  queries: AnalyticsQueries;
  exporter: AnalyticsExporter;
  maintenance: MaintenanceScheduler;
}

export interface ServerContext extends AnalyticsServices {
  server: AnalyticsServer;
  shutdown: () => Promise<void>;
}

/** Wires the storage-backed components; nothing is started. */
export function createServices(
  config: TextpulseConfig,
  logger: Logger,
  stateDir: string = ensureDir(getStateDir()),
): AnalyticsServices {
  const db = new AnalyticsDB(stateDir);
  const usage = new UsageRecorder(db);
  const conversations = new ConversationAggregator(db, {
    peakHourCap: config.analytics.peakHourCap,
    dailyStatsCap: config.analytics.dailyStatsCap,
  });
  const ingestor = new MessageIngestor({ db, usage, conversations, logger });
  const queries = new AnalyticsQueries(db, config.analytics);
  const exporter = new AnalyticsExporter(queries);
  const maintenance = new MaintenanceScheduler({
    usage,
    conversations,
    queries,
    config: config.maintenance,
    logger,
  });
  return { config, logger, db, usage, conversations, ingestor, queries, exporter, maintenance };
}

const SHUTDOWN_TIMEOUT_MS = 10_000;

export async function startServer(configPath?: string): Promise<ServerContext> {
  const config = loadConfig(configPath);
  const logger = createLogger(config.logging);
  logger.info("Starting textpulse...");

  const services = createServices(config, logger);
  const server = new AnalyticsServer({
    ingestor: services.ingestor,
    queries: services.queries,
    exporter: services.exporter,
    conversations: services.conversations,
    usage: services.usage,
    logger,
    port: config.server.port,
    hostname: config.server.hostname,
  });
  await server.start();
  services.maintenance.start();

  let shutdownInProgress = false;
  const shutdown = async (): Promise<void> => {
    if (shutdownInProgress) return;
    shutdownInProgress = true;
    logger.info("Shutting down gracefully...");

    const forceExit = setTimeout(() => {
      logger.warn("Shutdown timeout reached, forcing exit");
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);
    forceExit.unref();

    services.maintenance.stop();
    await server.stop();
    services.db.close();

    clearTimeout(forceExit);
    logger.info("Shutdown complete");
  };

  const onSignal = (): void => {
    shutdown().catch((err: unknown) => {
      logger.error({ err }, "Shutdown failed");
      process.exitCode = 1;
    });
  };
  process.once("SIGTERM", onSignal);
  process.once("SIGINT", onSignal);

  logger.info("textpulse started");
  return { ...services, server, shutdown };
}
