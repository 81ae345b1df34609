import { Command, Option } from "clipanion";
import { withServices } from "../context.js";

export class ReportCommand extends Command {
  static override paths = [["report"]];

  static override usage = Command.Usage({
    description: "Print the analytics dashboard for an account as JSON",
    examples: [
      ["Last 7 days", "textpulse report --account acct-1"],
      ["Last 30 days", "textpulse report --account acct-1 --period 30d"],
    ],
  });

  account = Option.String("--account,-a", { description: "Account id", required: true });

  period = Option.String("--period,-p", {
    description: "1d, 7d, 30d, 90d or 1y",
    required: false,
  });

  config = Option.String("--config,-c", {
    description: "Path to config file",
    required: false,
  });

  async execute(): Promise<void> {
    const dashboard = await withServices(this.config, ({ queries }) =>
      queries.dashboard(this.account, this.period),
    );
    this.context.stdout.write(JSON.stringify(dashboard, null, 2) + "\n");
  }
}
