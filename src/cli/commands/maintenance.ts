import { Command, Option } from "clipanion";
import { withServices } from "../context.js";

export class MaintenanceRunCommand extends Command {
  static override paths = [["maintenance", "run"]];

  static override usage = Command.Usage({
    description: "Run a maintenance job once: engagement, rollup, retention or inactivity",
    examples: [
      ["Recompute engagement scores", "textpulse maintenance run engagement"],
      ["Apply this month's rollup", "textpulse maintenance run rollup"],
    ],
  });

  job = Option.String({ name: "job", required: true });

  config = Option.String("--config,-c", {
    description: "Path to config file",
    required: false,
  });

  async execute(): Promise<void> {
    const entry = await withServices(this.config, ({ maintenance }) => {
      if (!maintenance.jobNames().some((name) => name === this.job)) {
        return null;
      }
      return maintenance.runNow(this.job);
    });

    if (!entry) {
      this.context.stdout.write(`Unknown maintenance job: ${this.job}\n`);
      process.exitCode = 1;
      return;
    }
    if (!entry.success) {
      this.context.stdout.write(`Job ${entry.job} failed: ${entry.error ?? "unknown error"}\n`);
      process.exitCode = 1;
      return;
    }
    this.context.stdout.write(
      `Job ${entry.job} completed in ${entry.completedAt - entry.startedAt}ms (affected: ${entry.affected ?? 0})\n`,
    );
  }
}
