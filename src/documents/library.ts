import { existsSync, readdirSync, readFileSync } from "node:fs";
import { basename, join } from "node:path";
import { fileURLToPath } from "node:url";

export const DEFAULT_DOCUMENTS_DIR = fileURLToPath(new URL("../../docs/context/", import.meta.url));

const SUMMARY_HEADING = "## Summary";
const DETAILS_HEADING = "## Details";
const SEPARATOR = "\n\n---\n\n";

export interface ReferenceDocument {
  readonly id: string;
  readonly title: string;
  readonly summary: string;
  readonly details: string;
}

export type DocumentDetailResult =
  | { readonly content: string; readonly fetched: readonly string[] }
  | { readonly error: string; readonly invalidIds: readonly string[]; readonly validIds: readonly string[] };

/** Extracts one `## ` section, heading included, up to the next heading. */
export function extractSection(content: string, heading: string): string | null {
  const start = content.indexOf(heading);
  if (start === -1) return null;
  const end = content.indexOf("\n## ", start + heading.length);
  return content.slice(start, end === -1 ? content.length : end).trim();
}

export function parseDocument(fileName: string, content: string): ReferenceDocument {
  const title = basename(fileName, ".md");
  const id = title.split("_")[0] ?? title;
  const summary =
    extractSection(content, SUMMARY_HEADING) ??
    `${SUMMARY_HEADING}\n${content.split("\n").slice(0, 10).join("\n").trim()}`;
  const detailsStart = content.indexOf(DETAILS_HEADING);
  const details =
    detailsStart === -1
      ? `${DETAILS_HEADING}\n\n${content.trim()}`
      : content.slice(detailsStart).trim();
  return { id, title, summary, details };
}

/**
 * Static reference documents, read once per process. Files are named
 * `<id>_<slug>.md`; README.md is skipped.
 */
export class DocumentLibrary {
  private documents: Map<string, ReferenceDocument> | null = null;
  private summaryText: string | null = null;

  constructor(private readonly dir: string = DEFAULT_DOCUMENTS_DIR) {}

  private load(): Map<string, ReferenceDocument> {
    if (this.documents) return this.documents;
    const documents = new Map<string, ReferenceDocument>();
    if (existsSync(this.dir)) {
      const files = readdirSync(this.dir)
        .filter((f) => f.endsWith(".md") && f !== "README.md")
        .sort();
      for (const file of files) {
        const doc = parseDocument(file, readFileSync(join(this.dir, file), "utf-8"));
        documents.set(doc.id, doc);
      }
    }
    this.documents = documents;
    return documents;
  }

  ids(): string[] {
    return [...this.load().keys()];
  }

  summaries(): string {
    if (this.summaryText === null) {
      this.summaryText = [...this.load().values()]
        .map((doc) => `**[${doc.id}] ${doc.title}**\n${doc.summary}`)
        .join(SEPARATOR);
    }
    return this.summaryText;
  }

  details(docIds: string | readonly string[]): DocumentDetailResult {
    const requested = typeof docIds === "string" ? [docIds] : [...docIds];
    const documents = this.load();
    const validIds = [...documents.keys()];
    const invalidIds = requested.filter((id) => !documents.has(id));
    if (invalidIds.length > 0 || requested.length === 0) {
      return {
        error:
          requested.length === 0
            ? "No document IDs given"
            : `Invalid document IDs: ${invalidIds.join(", ")}`,
        invalidIds,
        validIds,
      };
    }

    const parts: string[] = [];
    for (const id of requested) {
      const doc = documents.get(id);
      if (doc) parts.push(`**[${doc.id}] ${doc.title}**\n\n${doc.details}`);
    }
    return { content: parts.join(SEPARATOR), fetched: requested };
  }
}
