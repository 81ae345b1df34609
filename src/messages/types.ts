import { z } from "zod";
import type { MessageDirection } from "../conversations/types.js";
import { MAX_EPOCH_MS } from "../utils/time.js";

const epochMsSchema = z.number().int().nonnegative().max(MAX_EPOCH_MS);

const timestampSchema = z.union([
  epochMsSchema,
  z.string().datetime({ offset: true }).transform((s) => Date.parse(s)).pipe(epochMsSchema),
]);

/**
 * A message-ingestion event as delivered by the telephony/AI layer.
 * Counterpart resolution (address → id) has already happened upstream.
 * Only outbound messages can be AI-generated.
 */
export const messageEventSchema = z
  .object({
    eventId: z.string().min(1).optional(),
    accountId: z.string().min(1),
    counterpartId: z.string().min(1),
    counterpartAddress: z.string().min(1),
    direction: z.enum(["inbound", "outbound"]),
    aiGenerated: z.boolean().default(false),
    body: z.string().nullable().optional(),
    status: z.string().nullable().optional(),
    timestamp: timestampSchema.optional(),
    sentiment: z.number().min(-1).max(1).nullable().optional(),
    aiConfidence: z.number().min(0).max(1).nullable().optional(),
    processingTimeMs: z.number().int().nonnegative().nullable().optional(),
    responseLatencySeconds: z.number().nonnegative().nullable().optional(),
    cost: z.number().nonnegative().optional(),
    templateUsed: z.boolean().optional(),
  })
  .refine((event) => event.direction === "outbound" || !event.aiGenerated, {
    message: "Inbound messages cannot be AI-generated",
    path: ["aiGenerated"],
  });

export type MessageEventInput = z.input<typeof messageEventSchema>;
export type MessageEvent = z.output<typeof messageEventSchema>;

export interface MessageRecord {
  readonly id: string;
  readonly eventId: string | null;
  readonly accountId: string;
  readonly counterpartId: string;
  readonly counterpartAddress: string;
  readonly direction: MessageDirection;
  readonly aiGenerated: boolean;
  readonly body: string | null;
  readonly status: string | null;
  readonly aiConfidence: number | null;
  readonly processingTimeMs: number | null;
  readonly sentiment: number | null;
  readonly createdAt: number;
}

export interface Counterpart {
  readonly id: string;
  readonly accountId: string;
  readonly address: string;
  readonly firstContactAt: number;
}

export type IngestResult =
  | { readonly status: "recorded"; readonly messageId: string; readonly aggregated: boolean }
  | { readonly status: "duplicate"; readonly messageId: string };
