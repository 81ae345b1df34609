import { Command, Option } from "clipanion";
import { startServer } from "../../gateway/lifecycle.js";

export class ServeCommand extends Command {
  static override paths = [["serve"], Command.Default];

  static override usage = Command.Usage({
    description: "Start the analytics HTTP server and maintenance scheduler",
    examples: [
      ["Start with default config", "textpulse serve"],
      ["Start with custom config", "textpulse serve --config ./textpulse.config.json"],
    ],
  });

  config = Option.String("--config,-c", {
    description: "Path to config file",
    required: false,
  });

  async execute(): Promise<void> {
    try {
      await startServer(this.config);
    } catch (err) {
      this.context.stderr.write(
        `Failed to start: ${err instanceof Error ? err.message : String(err)}\n`,
      );
      process.exitCode = 1;
      return;
    }
    // The open listener keeps the process alive until a signal arrives.
  }
}
