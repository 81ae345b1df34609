export type PeriodPreset = "1d" | "7d" | "30d" | "90d" | "1y";

export interface TextpulseConfig {
  readonly server: ServerConfig;
  readonly logging?: LoggingConfig;
  readonly analytics: AnalyticsConfig;
  readonly maintenance: MaintenanceConfig;
}

export interface ServerConfig {
  readonly port: number;
  readonly hostname: string;
}

export interface LoggingConfig {
  readonly level: "debug" | "info" | "warn" | "error";
  readonly file?: string;
  readonly json?: boolean;
}

export interface AnalyticsConfig {
  /** Window used when a request names no period, or an unknown one. */
  readonly defaultPeriod: PeriodPreset;
  /** Distinct hours kept in a conversation's peak-hour histogram. */
  readonly peakHourCap: number;
  /** Distinct dates kept in a conversation's daily stats. */
  readonly dailyStatsCap: number;
  /** Inbound→outbound gaps above this are treated as noise. */
  readonly maxResponseGapMinutes: number;
  /** Hours listed in the dashboard's message block. */
  readonly peakHoursLimit: number;
}

export interface MaintenanceConfig {
  readonly enabled: boolean;
  readonly engagementSchedule: string;
  readonly rollupSchedule: string;
  readonly retentionSchedule: string;
  readonly retentionMonths: number;
  /** Unset disables the inactivity sweep. */
  readonly inactiveAfterDays?: number;
}
