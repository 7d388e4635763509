import { z } from "zod";
import type { DocumentLibrary } from "../documents/library.js";
import { defineTool, type Tool } from "./types.js";

export function createDocumentSummaryTool(library: DocumentLibrary): Tool {
  return defineTool({
    name: "document_summary",
    description:
      "Summaries of every platform reference document with their IDs. Call this first for questions about policies, membership, ticket purchasing, customer service or contact details.",
    args: {},
    async execute() {
      return { summaries: library.summaries() };
    },
  });
}

export function createDocumentDetailTool(library: DocumentLibrary): Tool {
  return defineTool({
    name: "document_detail",
    description:
      "Full content of one or more reference documents, by the IDs listed in document_summary.",
    args: {
      docIds: z
        .union([z.string(), z.array(z.string())])
        .describe('A document ID such as "01", or a list of IDs.'),
    },
    async execute({ docIds }) {
      return library.details(docIds);
    },
  });
}
