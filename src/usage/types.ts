export interface UsageRecord {
  readonly id: string;
  readonly accountId: string;
  readonly year: number;
  readonly month: number;
  readonly messagesSent: number;
  readonly messagesReceived: number;
  readonly aiResponsesGenerated: number;
  readonly templatesUsed: number;
  /** Currency units, exact to six decimal places. */
  readonly totalCost: number;
  readonly uniqueConversations: number | null;
  readonly avgResponseTimeSeconds: number | null;
  readonly sentimentAvg: number | null;
  readonly engagementScore: number | null;
  readonly peakHour: number | null;
  readonly peakDay: string | null;
  readonly createdAt: number;
}

/** Month-level figures derived from the message log and conversations. */
export interface UsageRollup {
  readonly uniqueConversations: number;
  readonly avgResponseTimeSeconds: number | null;
  readonly sentimentAvg: number | null;
  readonly engagementScore: number | null;
  readonly peakHour: number | null;
  readonly peakDay: string | null;
}
