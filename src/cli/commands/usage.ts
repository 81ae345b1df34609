import { Command, Option } from "clipanion";
import { withServices } from "../context.js";

export class UsageShowCommand extends Command {
  static override paths = [["usage", "show"]];

  static override usage = Command.Usage({
    description: "List monthly usage records for an account, newest first",
    examples: [["Last 12 months", "textpulse usage show --account acct-1"]],
  });

  account = Option.String("--account,-a", { description: "Account id", required: true });

  months = Option.String("--months,-m", "12", { description: "Number of months" });

  config = Option.String("--config,-c", {
    description: "Path to config file",
    required: false,
  });

  async execute(): Promise<void> {
    const months = Number.parseInt(this.months, 10);
    if (!Number.isInteger(months) || months <= 0) {
      this.context.stdout.write(`Invalid --months: ${this.months}\n`);
      process.exitCode = 1;
      return;
    }

    const records = await withServices(this.config, ({ usage }) =>
      usage.listForAccount(this.account, months),
    );
    if (records.length === 0) {
      this.context.stdout.write(`No usage recorded for ${this.account}\n`);
      return;
    }

    this.context.stdout.write(`Usage for ${this.account}:\n\n`);
    for (const r of records) {
      const period = `${r.year}-${String(r.month).padStart(2, "0")}`;
      this.context.stdout.write(
        `  ${period}  sent=${r.messagesSent}  received=${r.messagesReceived}` +
          `  ai=${r.aiResponsesGenerated}  templates=${r.templatesUsed}  cost=${r.totalCost}\n`,
      );
    }
  }
}
