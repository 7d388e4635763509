import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { DocumentLibrary, extractSection, parseDocument } from "../../src/documents/library.js";
import { createDocumentDetailTool, createDocumentSummaryTool } from "../../src/tools/documents.js";
import { makeTempDir, makeToolContext } from "../helpers/fixtures.js";

describe("extractSection", () => {
  it("returns a section up to the next heading", () => {
    expect(extractSection("# T\n## Summary\nShort.\n\n## Details\nLong.", "## Summary")).toBe("## Summary\nShort.");
  });

  it("runs to the end for the last section", () => {
    expect(extractSection("## Details\nLong.\n", "## Details")).toBe("## Details\nLong.");
  });

  it("returns null when the heading is missing", () => {
    expect(extractSection("plain text", "## Summary")).toBeNull();
  });
});

describe("parseDocument", () => {
  it("takes the id from the file name prefix", () => {
    const doc = parseDocument("03_refunds.md", "# Refunds\n\n## Summary\nWhen refunds apply.\n\n## Details\nAll of it.\n");
    expect(doc).toEqual({
      id: "03",
      title: "03_refunds",
      summary: "## Summary\nWhen refunds apply.",
      details: "## Details\nAll of it.",
    });
  });

  it("falls back to the whole text without sections", () => {
    const doc = parseDocument("09_misc.md", "Just text.\n");
    expect(doc.summary).toBe("## Summary\nJust text.");
    expect(doc.details).toBe("## Details\n\nJust text.");
  });
});

describe("DocumentLibrary", () => {
  let dir: string;
  let library: DocumentLibrary;

  beforeEach(() => {
    dir = makeTempDir("ticketdesk-docs-");
    writeFileSync(join(dir, "01_alpha.md"), "# Alpha\n\n## Summary\nShort alpha.\n\n## Details\nLong alpha.\n");
    writeFileSync(join(dir, "02_beta.md"), "Beta text\n");
    writeFileSync(join(dir, "README.md"), "Not a document.\n");
    writeFileSync(join(dir, "notes.txt"), "ignored");
    library = new DocumentLibrary(dir);
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("loads markdown documents except the README", () => {
    expect(library.ids()).toEqual(["01", "02"]);
  });

  it("joins the summaries", () => {
    expect(library.summaries()).toBe(
      "**[01] 01_alpha**\n## Summary\nShort alpha.\n\n---\n\n**[02] 02_beta**\n## Summary\nBeta text",
    );
  });

  it("reads the documents once", () => {
    const first = library.summaries();
    writeFileSync(join(dir, "03_gamma.md"), "Gamma\n");
    expect(library.summaries()).toBe(first);
    expect(library.ids()).toEqual(["01", "02"]);
  });

  it("returns details for one or more ids", () => {
    expect(library.details("01")).toEqual({
      content: "**[01] 01_alpha**\n\n## Details\nLong alpha.",
      fetched: ["01"],
    });
    expect(library.details(["02", "01"])).toEqual({
      content: "**[02] 02_beta**\n\n## Details\n\nBeta text\n\n---\n\n**[01] 01_alpha**\n\n## Details\nLong alpha.",
      fetched: ["02", "01"],
    });
  });

  it("names invalid ids and the valid ones", () => {
    expect(library.details(["01", "09", "x"])).toEqual({
      error: "Invalid document IDs: 09, x",
      invalidIds: ["09", "x"],
      validIds: ["01", "02"],
    });
  });

  it("rejects an empty list", () => {
    expect(library.details([])).toEqual({ error: "No document IDs given", invalidIds: [], validIds: ["01", "02"] });
  });

  it("is empty when the directory is missing", () => {
    expect(new DocumentLibrary(join(dir, "missing")).ids()).toEqual([]);
  });
});

describe("bundled reference documents", () => {
  it("ship seven documents", () => {
    expect(new DocumentLibrary().ids()).toEqual(["01", "02", "03", "04", "05", "06", "07"]);
  });
});

describe("document tools", () => {
  let dir: string;
  let library: DocumentLibrary;

  beforeEach(() => {
    dir = makeTempDir("ticketdesk-doc-tools-");
    writeFileSync(join(dir, "01_alpha.md"), "## Summary\nShort alpha.\n\n## Details\nLong alpha.\n");
    library = new DocumentLibrary(dir);
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("document_summary returns the summaries", async () => {
    expect(await createDocumentSummaryTool(library).run({}, makeToolContext())).toEqual({
      summaries: "**[01] 01_alpha**\n## Summary\nShort alpha.",
    });
  });

  it("document_detail accepts a single id", async () => {
    expect(await createDocumentDetailTool(library).run({ docIds: "01" }, makeToolContext())).toEqual({
      content: "**[01] 01_alpha**\n\n## Details\nLong alpha.",
      fetched: ["01"],
    });
  });

  it("document_detail reports unknown ids", async () => {
    expect(await createDocumentDetailTool(library).run({ docIds: ["05"] }, makeToolContext())).toEqual({
      error: "Invalid document IDs: 05",
      invalidIds: ["05"],
      validIds: ["01"],
    });
  });

  it("document_detail requires ids", async () => {
    const result = await createDocumentDetailTool(library).run({}, makeToolContext());
    expect(result).toMatchObject({ error: "Invalid arguments for document_detail" });
    expect(result).toHaveProperty(["issues", "docIds"]);
  });
});
