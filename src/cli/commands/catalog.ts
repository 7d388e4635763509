import { readFileSync } from "node:fs";
import { dirname } from "node:path";
import { Command, Option } from "clipanion";
import { CatalogDB } from "../../catalog/db.js";
import { catalogSeedSchema, importCatalog } from "../../catalog/import.js";
import { InsightCache } from "../../catalog/insight-cache.js";
import { CatalogInsights } from "../../catalog/insights.js";
import { loadConfig } from "../../config/loader.js";
import { ensureDir, getStateDir, resolveStatePath } from "../../config/paths.js";
import { errorMessage } from "../../errors.js";
import { createSilentLogger } from "../../logging/logger.js";

function openCatalog(configPath: string | undefined): CatalogDB {
  const config = loadConfig(configPath);
  const path = resolveStatePath(ensureDir(getStateDir()), config.catalog.database);
  ensureDir(dirname(path));
  return new CatalogDB(path);
}

export class CatalogImportCommand extends Command {
  static override paths = [["catalog", "import"]];

  static override usage = Command.Usage({
    description: "Import categories, organizers, venues and events from a JSON file",
    examples: [["Load the sample catalog", "ticketdesk catalog import data/sample-catalog.json"]],
  });

  file = Option.String({ name: "file" });

  config = Option.String("--config,-c", { description: "Path to config file", required: false });

  async execute(): Promise<void> {
    let catalog: CatalogDB | null = null;
    try {
      const seed = catalogSeedSchema.parse(JSON.parse(readFileSync(this.file, "utf-8")));
      catalog = openCatalog(this.config);
      const counts = importCatalog(catalog, seed);
      this.context.stdout.write(
        `Imported ${counts.events} events, ${counts.occurrences} occurrences, ` +
          `${counts.categories} categories, ${counts.organizers} organizers, ${counts.venues} venues\n`,
      );
    } catch (err) {
      this.context.stdout.write(`Import failed: ${errorMessage(err)}\n`);
      process.exitCode = 1;
    } finally {
      catalog?.close();
    }
  }
}

export class CatalogStatsCommand extends Command {
  static override paths = [["catalog", "stats"]];

  static override usage = Command.Usage({
    description: "Print the catalog insights the assistant works with",
    examples: [["Show insights", "ticketdesk catalog stats"]],
  });

  config = Option.String("--config,-c", { description: "Path to config file", required: false });

  async execute(): Promise<void> {
    let catalog: CatalogDB | null = null;
    try {
      catalog = openCatalog(this.config);
      const insights = new CatalogInsights(catalog, new InsightCache(), createSilentLogger()).load();
      for (const payload of Object.values(insights)) {
        if (payload) this.context.stdout.write(`${payload.summary}\n`);
      }
    } catch (err) {
      this.context.stdout.write(`Failed to read catalog: ${errorMessage(err)}\n`);
      process.exitCode = 1;
    } finally {
      catalog?.close();
    }
  }
}
