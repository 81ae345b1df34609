import type { Logger } from "../logging/logger.js";

export type MaintenanceJobName = "engagement" | "rollup" | "retention" | "inactivity";

export interface JobRunEntry {
  readonly job: MaintenanceJobName;
  readonly startedAt: number;
  readonly completedAt: number;
  readonly success: boolean;
  /** Rows or accounts touched by the run. */
  readonly affected?: number;
  readonly error?: string;
}

const HISTORY_LIMIT = 50;

/** Logs each maintenance run and keeps the most recent ones in memory. */
export class JobRunLog {
  private readonly logger: Logger;
  private readonly entries: JobRunEntry[] = [];

  constructor(logger: Logger) {
    this.logger = logger.child({ component: "maintenance-run" });
  }

  record(entry: JobRunEntry): void {
    this.entries.push(entry);
    if (this.entries.length > HISTORY_LIMIT) this.entries.shift();

    const durationMs = entry.completedAt - entry.startedAt;
    if (entry.success) {
      this.logger.info({ job: entry.job, durationMs, affected: entry.affected }, "Maintenance job completed");
    } else {
      this.logger.error({ job: entry.job, durationMs, error: entry.error }, "Maintenance job failed");
    }
  }

  /** Newest first. */
  recent(job?: MaintenanceJobName): JobRunEntry[] {
    const matching = job ? this.entries.filter((e) => e.job === job) : [...this.entries];
    return matching.reverse();
  }
}
