import type { CatalogInsights } from "../catalog/insights.js";
import { hasAnyCriterion, searchCriteriaShape } from "../search/criteria.js";
import type { QuerySynthesizer } from "../search/synthesizer.js";
import { defineTool, type Tool } from "./types.js";

export function createSearchTool(synthesizer: QuerySynthesizer, insights: CatalogInsights): Tool {
  return defineTool({
    name: "search",
    description:
      "Search published events. Give at least one criterion. Results include a link for each event; quote links exactly.",
    args: searchCriteriaShape,
    async execute(criteria, ctx) {
      if (!hasAnyCriterion(criteria)) {
        return { error: "Provide at least one search criterion." };
      }
      const result = await synthesizer.synthesizeAndExecute(criteria, insights.load(), {
        signal: ctx.signal,
      });
      if (!result.ok) {
        return { error: result.error, kind: result.kind };
      }
      return { results: result.summary, count: result.rows.length };
    },
  });
}
