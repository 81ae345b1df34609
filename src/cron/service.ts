import { Cron } from "croner";
import type { Logger } from "../logging/logger.js";
import type { MaintenanceConfig } from "../config/types.js";
import type { AnalyticsQueries } from "../analytics/queries.js";
import type { ConversationAggregator } from "../conversations/aggregator.js";
import type { UsageRecorder } from "../usage/recorder.js";
import { previousPeriod, utcPeriod, type MonthPeriod } from "../utils/time.js";
import { JobRunLog, type JobRunEntry, type MaintenanceJobName } from "./run-log.js";

export interface MaintenanceDeps {
  readonly usage: UsageRecorder;
  readonly conversations: ConversationAggregator;
  readonly queries: AnalyticsQueries;
  readonly config: MaintenanceConfig;
  readonly logger: Logger;
  readonly clock?: () => number;
}

interface JobDefinition {
  readonly name: MaintenanceJobName;
  readonly schedule: string;
  /** Returns the number of rows or accounts touched. */
  readonly run: (now: number) => number;
}

export class MaintenanceScheduler {
  private readonly scheduled = new Map<MaintenanceJobName, Cron>();
  private readonly jobs = new Map<MaintenanceJobName, JobDefinition>();
  private readonly logger: Logger;
  private readonly clock: () => number;
  readonly runs: JobRunLog;

  constructor(private readonly deps: MaintenanceDeps) {
    this.logger = deps.logger.child({ component: "maintenance" });
    this.runs = new JobRunLog(deps.logger);
    this.clock = deps.clock ?? Date.now;
    for (const job of this.definitions()) this.jobs.set(job.name, job);
  }

  /** Jobs available to this instance; `inactivity` only when configured. */
  jobNames(): MaintenanceJobName[] {
    return [...this.jobs.keys()];
  }

  start(): void {
    if (!this.deps.config.enabled) {
      this.logger.info("Maintenance disabled");
      return;
    }
    for (const job of this.jobs.values()) this.schedule(job);
    this.logger.info({ count: this.scheduled.size }, "Maintenance scheduler started");
  }

  stop(): void {
    for (const [name, cron] of this.scheduled) {
      cron.stop();
      this.logger.debug({ job: name }, "Stopped maintenance job");
    }
    this.scheduled.clear();
    this.logger.info("Maintenance scheduler stopped");
  }

  isScheduled(name: MaintenanceJobName): boolean {
    return this.scheduled.has(name);
  }

  nextRun(name: MaintenanceJobName): Date | null {
    return this.scheduled.get(name)?.nextRun() ?? null;
  }

  /** Runs a job immediately. Throws only for a job this instance does not have. */
  runNow(name: string): JobRunEntry {
    const job = [...this.jobs.values()].find((j) => j.name === name);
    if (!job) {
      throw new Error(`Unknown maintenance job: ${name} (available: ${this.jobNames().join(", ")})`);
    }
    return this.execute(job);
  }

  private schedule(job: JobDefinition): void {
    this.scheduled.get(job.name)?.stop();
    const cron = new Cron(job.schedule, { timezone: "UTC" }, () => {
      this.execute(job);
    });
    this.scheduled.set(job.name, cron);
    this.logger.debug({ job: job.name, schedule: job.schedule }, "Scheduled maintenance job");
  }

  private execute(job: JobDefinition): JobRunEntry {
    const startedAt = this.clock();
    let entry: JobRunEntry;
    try {
      const affected = job.run(startedAt);
      entry = { job: job.name, startedAt, completedAt: this.clock(), success: true, affected };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      entry = { job: job.name, startedAt, completedAt: this.clock(), success: false, error: message };
    }
    this.runs.record(entry);
    return entry;
  }

  private definitions(): JobDefinition[] {
    const { usage, conversations, queries, config } = this.deps;
    const jobs: JobDefinition[] = [
      {
        name: "engagement",
        schedule: config.engagementSchedule,
        run: (now) => conversations.refreshEngagement(undefined, now),
      },
      {
        name: "rollup",
        schedule: config.rollupSchedule,
        // On the 1st (UTC) the month that just ended is finalised as well.
        run: (now) => {
          const current = utcPeriod(now);
          const periods: MonthPeriod[] =
            new Date(now).getUTCDate() === 1 ? [previousPeriod(current), current] : [current];
          let applied = 0;
          for (const { year, month } of periods) {
            for (const accountId of usage.listAccounts(year, month)) {
              usage.applyRollup(accountId, year, month, queries.monthlyRollup(accountId, year, month));
              applied++;
            }
          }
          return applied;
        },
      },
      {
        name: "retention",
        schedule: config.retentionSchedule,
        run: (now) => usage.purgeOlderThan(config.retentionMonths, now),
      },
    ];

    const idleDays = config.inactiveAfterDays;
    if (idleDays !== undefined) {
      jobs.push({
        name: "inactivity",
        schedule: config.engagementSchedule,
        run: (now) => conversations.markIdleInactive(idleDays, now),
      });
    }
    return jobs;
  }
}
