import { Command, Option } from "clipanion";
import { loadConfig } from "../../config/loader.js";
import { errorMessage } from "../../errors.js";
import { bucketOf, resolveAssignments } from "../../experiment/assignor.js";
import { experimentConfigFrom } from "../../experiment/profiles.js";
import { EXPERIMENT_MODULES } from "../../experiment/types.js";

export class ExperimentAssignCommand extends Command {
  static override paths = [["experiment", "assign"]];

  static override usage = Command.Usage({
    description: "Show which variant each pipeline stage gives a user",
    examples: [["Assignments for a user", "ticketdesk experiment assign user-123"]],
  });

  userId = Option.String({ name: "userId" });

  config = Option.String("--config,-c", { description: "Path to config file", required: false });

  async execute(): Promise<void> {
    try {
      const config = loadConfig(this.config);
      const experiment = experimentConfigFrom(config.experiment);
      const assignments = resolveAssignments(this.userId, experiment);

      this.context.stdout.write(
        `User ${this.userId} (bucket ${bucketOf(this.userId)}, experiment ${experiment.enabled ? "enabled" : "disabled"})\n`,
      );
      for (const module of EXPERIMENT_MODULES) {
        const a = assignments[module];
        this.context.stdout.write(`  ${module.padEnd(16)} ${a.variant}${a.enabled ? " (under test)" : ""}\n`);
      }
    } catch (err) {
      this.context.stdout.write(`Failed to resolve assignments: ${errorMessage(err)}\n`);
      process.exitCode = 1;
    }
  }
}
