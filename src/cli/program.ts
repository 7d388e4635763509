import { Cli } from "clipanion";
import { VERSION } from "../gateway/server.js";
import { CatalogImportCommand, CatalogStatsCommand } from "./commands/catalog.js";
import { ChatCommand } from "./commands/chat.js";
import { ConfigShowCommand, ConfigValidateCommand } from "./commands/config-cmd.js";
import { ExperimentAssignCommand } from "./commands/experiment.js";
import { ServeCommand } from "./commands/serve.js";

export function createCli(): Cli {
  const cli = new Cli({
    binaryLabel: "Ticket Desk",
    binaryName: "ticketdesk",
    binaryVersion: VERSION,
  });

  cli.register(ServeCommand);
  cli.register(ChatCommand);

  // Config commands
  cli.register(ConfigShowCommand);
  cli.register(ConfigValidateCommand);

  // Catalog commands
  cli.register(CatalogImportCommand);
  cli.register(CatalogStatsCommand);

  cli.register(ExperimentAssignCommand);

  return cli;
}
