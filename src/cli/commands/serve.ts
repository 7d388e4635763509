import { Command, Option } from "clipanion";
import { startGateway } from "../../gateway/lifecycle.js";
import { VERSION } from "../../gateway/server.js";
import { errorMessage } from "../../errors.js";
import { printBanner } from "../banner.js";

export class ServeCommand extends Command {
  static override paths = [["serve"], Command.Default];

  static override usage = Command.Usage({
    description: "Start the HTTP gateway",
    examples: [
      ["Start with default config", "ticketdesk serve"],
      ["Start with custom config", "ticketdesk serve --config ./ticketdesk.config.json"],
    ],
  });

  config = Option.String("--config,-c", {
    description: "Path to config file",
    required: false,
  });

  async execute(): Promise<void> {
    printBanner(VERSION, (text) => this.context.stdout.write(text));

    try {
      await startGateway(this.config);
      // Runs until SIGINT or SIGTERM
      await new Promise(() => {});
    } catch (err) {
      this.context.stderr.write(`Failed to start gateway: ${errorMessage(err)}\n`);
      process.exit(1);
    }
  }
}
