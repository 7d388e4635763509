import { randomUUID } from "node:crypto";
import { Command, Option } from "clipanion";
import { loadConfig } from "../../config/loader.js";
import { ensureDir, getStateDir } from "../../config/paths.js";
import { errorMessage } from "../../errors.js";
import { createRuntime, type Runtime } from "../../gateway/runtime.js";
import { createLogger } from "../../logging/logger.js";

export class ChatCommand extends Command {
  static override paths = [["chat"]];

  static override usage = Command.Usage({
    description: "Run a single conversation turn and print the reply",
    examples: [
      ["Ask a question", 'ticketdesk chat "Any jazz concerts this weekend?"'],
      ["Continue a session", 'ticketdesk chat --session s-1 "What about next week?"'],
    ],
  });

  message = Option.String({ name: "message" });

  user = Option.String("--user,-u", "cli-user", { description: "User id used for variant assignment" });

  session = Option.String("--session,-s", { description: "Session id; history is kept per session", required: false });

  page = Option.String("--page,-p", { description: "Page context, e.g. event_detail_page", required: false });

  config = Option.String("--config,-c", { description: "Path to config file", required: false });

  async execute(): Promise<void> {
    let runtime: Runtime;
    try {
      const config = loadConfig(this.config);
      const logger = createLogger({ ...config.logging, level: config.logging?.level ?? "warn" });
      runtime = createRuntime(config, logger, ensureDir(getStateDir()));
    } catch (err) {
      this.context.stdout.write(`Failed to start: ${errorMessage(err)}\n`);
      process.exitCode = 1;
      return;
    }

    try {
      const result = await runtime.conversations.chat({
        message: this.message,
        userId: this.user,
        sessionId: this.session ?? randomUUID(),
        pageContext: this.page,
      });
      this.context.stdout.write(`${result.answer}\n`);
    } finally {
      runtime.close();
    }
  }
}
