import { z } from "zod";
import type { TextpulseConfig } from "./types.js";

export const periodPresetSchema = z.enum(["1d", "7d", "30d", "90d", "1y"]);

const serverSchema = z.object({
  port: z.number().int().positive().default(8787),
  hostname: z.string().default("127.0.0.1"),
});

const loggingSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]).default("info"),
  file: z.string().optional(),
  json: z.boolean().optional(),
});

const analyticsSchema = z.object({
  defaultPeriod: periodPresetSchema.default("7d"),
  peakHourCap: z.number().int().min(1).max(24).default(5),
  dailyStatsCap: z.number().int().positive().default(30),
  maxResponseGapMinutes: z.number().positive().default(1440),
  peakHoursLimit: z.number().int().positive().default(3),
});

const maintenanceSchema = z.object({
  enabled: z.boolean().default(true),
  engagementSchedule: z.string().min(1).default("0 * * * *"),
  rollupSchedule: z.string().min(1).default("15 0 * * *"),
  retentionSchedule: z.string().min(1).default("30 3 1 * *"),
  retentionMonths: z.number().int().positive().default(24),
  inactiveAfterDays: z.number().int().positive().optional(),
});

export const textpulseConfigSchema = z.object({
  server: serverSchema.default({}),
  logging: loggingSchema.default({}),
  analytics: analyticsSchema.default({}),
  maintenance: maintenanceSchema.default({}),
});

export function parseConfig(raw: unknown): TextpulseConfig {
  return textpulseConfigSchema.parse(raw);
}
