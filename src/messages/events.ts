import { EventEmitter } from "node:events";
import type { Logger } from "../logging/logger.js";
import type { MessageRecord } from "./types.js";

export interface IngestEvents {
  recorded: (message: MessageRecord, aggregated: boolean) => void;
  duplicate: (accountId: string, eventId: string) => void;
  aggregationFailed: (message: MessageRecord, err: Error) => void;
}

type EventName = keyof IngestEvents;
type RawListener = (...args: unknown[]) => void;

/**
 * Notifications published after an ingest transaction commits. A listener
 * that throws is logged and skipped; the ingest result is unaffected.
 */
export class IngestEventBus {
  private readonly emitter = new EventEmitter();

  constructor(private readonly logger: Logger) {}

  /** Returns a function that removes the listener. */
  on<K extends EventName>(event: K, listener: IngestEvents[K]): () => void {
    const call = listener as RawListener;
    const guarded: RawListener = (...args) => {
      try {
        call(...args);
      } catch (err) {
        this.logger.warn({ err, event }, "Ingest event listener failed");
      }
    };
    this.emitter.on(event, guarded);
    return () => {
      this.emitter.off(event, guarded);
    };
  }

  emit<K extends EventName>(event: K, ...args: Parameters<IngestEvents[K]>): void {
    this.emitter.emit(event, ...args);
  }

  listenerCount(event: EventName): number {
    return this.emitter.listenerCount(event);
  }
}
