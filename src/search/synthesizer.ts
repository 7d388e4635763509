import { enrichQuery } from "../catalog/category-matcher.js";
import { compileContext } from "../catalog/insights.js";
import type { InsightMap, QueryExecutor, Row } from "../catalog/types.js";
import { QUERY_SYNTHESIS_EXHAUSTED, errorMessage } from "../errors.js";
import type { Logger } from "../logging/logger.js";
import { synthesizeQueryContract } from "../reasoning/contracts.js";
import { stripCodeFence } from "../reasoning/parse.js";
import type { ReasoningProvider } from "../reasoning/types.js";
import { deriveQuery, describeCriteria, type SearchCriteria } from "./criteria.js";
import { formatRows, noResultsSummary, resultSummary } from "./format.js";
import { CATALOG_SCHEMA_PROMPT } from "./schema-prompt.js";

export const MAX_SYNTHESIS_ATTEMPTS = 3;

export interface SynthesisSuccess {
  ok: true;
  summary: string;
  rows: Row[];
  query: string;
  attempts: number;
}

export interface SynthesisFailure {
  ok: false;
  kind: typeof QUERY_SYNTHESIS_EXHAUSTED;
  error: string;
  attempts: number;
}

export type SynthesisResult = SynthesisSuccess | SynthesisFailure;

/** One failed attempt: the query it produced (if any) and why it failed. */
interface AttemptRecord {
  query: string | null;
  error: string;
}

export interface QuerySynthesizerOptions {
  baseUrl: string;
  maxAttempts?: number;
}

/**
 * Turns search criteria into a catalog query through the reasoning provider,
 * runs it, and retries with the failing query and its error as feedback.
 */
export class QuerySynthesizer {
  private readonly maxAttempts: number;

  constructor(
    private readonly reasoning: ReasoningProvider,
    private readonly executor: QueryExecutor,
    private readonly logger: Logger,
    private readonly options: QuerySynthesizerOptions,
  ) {
    this.maxAttempts = options.maxAttempts ?? MAX_SYNTHESIS_ATTEMPTS;
  }

  async synthesizeAndExecute(
    criteria: SearchCriteria,
    insights: InsightMap,
    opts: { signal?: AbortSignal } = {},
  ): Promise<SynthesisResult> {
    const query = enrichQuery(deriveQuery(criteria), insights.categories?.entries ?? []);
    const request = describeCriteria(criteria, query);
    const context = compileContext(insights);
    const failures: AttemptRecord[] = [];

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      const log = this.logger.child({ attempt });
      if (opts.signal?.aborted) {
        return this.fail("Search was cancelled", failures.length);
      }

      const previous = failures.at(-1);
      let generated: string;
      try {
        const out = await this.reasoning.invoke(
          synthesizeQueryContract,
          {
            request,
            schema: CATALOG_SCHEMA_PROMPT,
            insights: context,
            ...(previous
              ? { previousQuery: previous.query ?? undefined, previousError: previous.error }
              : {}),
          },
          { signal: opts.signal },
        );
        generated = stripCodeFence(out.query);
      } catch (err) {
        log.warn({ err }, "Query generation failed");
        failures.push({ query: previous?.query ?? null, error: `Query generation failed: ${errorMessage(err)}` });
        continue;
      }

      if (generated.length === 0) {
        failures.push({ query: null, error: "The generated query was empty" });
        continue;
      }

      let rows: Row[];
      try {
        rows = await this.executor.execute(generated);
      } catch (err) {
        log.info({ error: errorMessage(err) }, "Generated query failed");
        failures.push({ query: generated, error: errorMessage(err) });
        continue;
      }

      if (rows.length === 0) {
        log.info("Query returned no rows");
        return { ok: true, summary: noResultsSummary(insights), rows, query: generated, attempts: attempt };
      }

      const { lines, unlinked } = formatRows(rows, this.options.baseUrl);
      if (unlinked > 0) {
        log.warn({ unlinked }, "Rows without an identifier were left out");
      }
      if (lines.length === 0) {
        failures.push({
          query: generated,
          error: "Result rows have no identifier; select e.id AS id and e.slug AS slug",
        });
        continue;
      }

      log.info({ rows: rows.length }, "Search succeeded");
      return { ok: true, summary: resultSummary(lines), rows, query: generated, attempts: attempt };
    }

    const last = failures.at(-1)?.error ?? "unknown error";
    return this.fail(
      `Failed to generate a valid query after ${this.maxAttempts} attempts. Last error: ${last}`,
      failures.length,
    );
  }

  private fail(error: string, attempts: number): SynthesisFailure {
    this.logger.warn({ attempts }, error);
    return { ok: false, kind: QUERY_SYNTHESIS_EXHAUSTED, error, attempts };
  }
}
