import type { AnalyticsDB } from "../store/db.js";
import type { Logger } from "../logging/logger.js";
import type { UsageRecorder } from "../usage/recorder.js";
import type { ConversationAggregator } from "../conversations/aggregator.js";
import { utcDateKey, utcHour } from "../utils/time.js";
import { IngestEventBus } from "./events.js";
import { MessageLog } from "./log.js";
import {
  messageEventSchema,
  type IngestResult,
  type MessageEvent,
  type MessageEventInput,
  type MessageRecord,
} from "./types.js";

type WriteOutcome =
  | { readonly kind: "duplicate"; readonly existing: MessageRecord }
  | { readonly kind: "recorded"; readonly message: MessageRecord; readonly failure: Error | null };

export interface MessageIngestorDeps {
  readonly db: AnalyticsDB;
  readonly usage: UsageRecorder;
  readonly conversations: ConversationAggregator;
  readonly logger: Logger;
}

/**
 * Persists a message event and rolls it into usage and conversation
 * aggregates within one transaction. Aggregation runs in a savepoint:
 * if it fails, only the aggregate writes roll back and the message stays.
 */
export class MessageIngestor {
  readonly events: IngestEventBus;
  private readonly log: MessageLog;
  private readonly logger: Logger;

  constructor(private readonly deps: MessageIngestorDeps) {
    this.log = new MessageLog(deps.db);
    this.logger = deps.logger.child({ component: "ingest" });
    this.events = new IngestEventBus(this.logger);
  }

  ingest(input: MessageEventInput): IngestResult {
    const event = messageEventSchema.parse(input);
    const at = event.timestamp ?? Date.now();

    const outcome = this.deps.db.write((): WriteOutcome => {
      if (event.eventId) {
        const existing = this.log.findByEvent(event.accountId, event.eventId);
        if (existing) return { kind: "duplicate", existing };
      }

      this.log.ensureCounterpart(event.accountId, event.counterpartId, event.counterpartAddress, at);
      const message = this.log.append({
        eventId: event.eventId ?? null,
        accountId: event.accountId,
        counterpartId: event.counterpartId,
        counterpartAddress: event.counterpartAddress,
        direction: event.direction,
        aiGenerated: event.aiGenerated,
        body: event.body,
        status: event.status,
        aiConfidence: event.aiConfidence,
        processingTimeMs: event.processingTimeMs,
        sentiment: event.sentiment,
        createdAt: at,
      });

      let failure: Error | null = null;
      try {
        this.deps.db.write(() => this.aggregate(event, at));
      } catch (err) {
        failure = err instanceof Error ? err : new Error(String(err));
      }
      return { kind: "recorded", message, failure };
    });

    if (outcome.kind === "duplicate") {
      const eventId = event.eventId ?? "";
      this.logger.debug({ accountId: event.accountId, eventId }, "Duplicate message event skipped");
      this.events.emit("duplicate", event.accountId, eventId);
      return { status: "duplicate", messageId: outcome.existing.id };
    }

    const { message, failure } = outcome;
    if (failure) {
      this.logger.warn(
        { err: failure, accountId: event.accountId, messageId: message.id },
        "Aggregation failed; message kept",
      );
      this.events.emit("aggregationFailed", message, failure);
    }

    this.events.emit("recorded", message, failure === null);
    return { status: "recorded", messageId: message.id, aggregated: failure === null };
  }

  private aggregate(event: MessageEvent, at: number): void {
    const { usage, conversations } = this.deps;
    const { accountId, counterpartId, counterpartAddress } = event;

    if (event.direction === "outbound") {
      usage.recordSent(accountId, 1, event.aiGenerated, at);
      conversations.addMessage(accountId, counterpartId, counterpartAddress, {
        aiGenerated: event.aiGenerated,
        responseLatencySeconds: event.responseLatencySeconds,
        at,
      });
      conversations.updatePeakHours(accountId, counterpartId, counterpartAddress, utcHour(at));
      conversations.updateDailyStats(accountId, counterpartId, counterpartAddress, utcDateKey(at), "sent");
    } else {
      usage.recordReceived(accountId, 1, at);
      conversations.addMessage(accountId, counterpartId, counterpartAddress, { at });
      conversations.updateDailyStats(accountId, counterpartId, counterpartAddress, utcDateKey(at), "received");
    }

    if (event.cost !== undefined && event.cost > 0) {
      usage.recordCost(accountId, event.cost, at);
    }
    if (event.templateUsed) {
      usage.recordTemplateUsed(accountId, 1, at);
    }
    if (event.sentiment !== undefined && event.sentiment !== null) {
      conversations.updateSentiment(accountId, counterpartId, counterpartAddress, event.sentiment);
    }
    conversations.updateEngagement(accountId, counterpartId, counterpartAddress);
  }
}
