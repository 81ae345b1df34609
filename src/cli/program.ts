import { Cli } from "clipanion";
import { ServeCommand } from "./commands/serve.js";
import { ConfigShowCommand, ConfigValidateCommand } from "./commands/config-cmd.js";
import { ReportCommand } from "./commands/report.js";
import { UsageShowCommand } from "./commands/usage.js";
import { MaintenanceRunCommand } from "./commands/maintenance.js";

export function createCli(): Cli {
  const cli = new Cli({
    binaryLabel: "textpulse",
    binaryName: "textpulse",
    binaryVersion: "0.1.0",
  });

  cli.register(ServeCommand);

  // Config commands
  cli.register(ConfigShowCommand);
  cli.register(ConfigValidateCommand);

  // Reporting
  cli.register(ReportCommand);
  cli.register(UsageShowCommand);

  // Maintenance
  cli.register(MaintenanceRunCommand);

  return cli;
}
