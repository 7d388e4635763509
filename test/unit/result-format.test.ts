import { describe, it, expect } from "vitest";
import type { InsightMap } from "../../src/catalog/types.js";
import {
  NO_RESULTS_MESSAGE,
  eventLink,
  formatRow,
  formatRows,
  noResultsSummary,
  resultSummary,
  rowIdentifier,
} from "../../src/search/format.js";

const BASE = "https://tickets.example.com";
const UTM = "utm_source=chatbot&utm_medium=ai&utm_campaign=event_search";

describe("rowIdentifier", () => {
  it("prefers the slug", () => {
    expect(rowIdentifier({ slug: "jazz-night", id: 42 })).toBe("jazz-night");
  });

  it("falls back to the id when the slug is blank", () => {
    expect(rowIdentifier({ slug: " ", id: 42 })).toBe("42");
    expect(rowIdentifier({ id: 7n })).toBe("7");
  });

  it("is null without slug or id", () => {
    expect(rowIdentifier({ event_name: "Jazz Night" })).toBeNull();
  });
});

describe("eventLink", () => {
  it("joins base and identifier with tracking parameters", () => {
    expect(eventLink("https://tickets.example.com/", "a b")).toBe(`${BASE}/events/a%20b?${UTM}`);
  });
});

describe("formatRow", () => {
  it("renders every known column", () => {
    expect(
      formatRow(
        {
          id: 42,
          slug: "jazz-night",
          event_name: "Jazz Night",
          description: "Live trio",
          city: "Causeway Bay",
          start_time: "2027-03-06T12:00:00.000Z",
        },
        BASE,
      ),
    ).toBe(
      `Event: 'Jazz Night', Description: 'Live trio', Location: 'Causeway Bay', Starts on: '2027-03-06T12:00:00.000Z', Link: ${BASE}/events/jazz-night?${UTM}`,
    );
  });

  it("renders the minimum for an id-only row", () => {
    expect(formatRow({ id: 42, event_name: "Jazz Night" }, BASE)).toBe(
      `Event: 'Jazz Night', Link: ${BASE}/events/42?${UTM}`,
    );
  });

  it("falls back to name, then a placeholder", () => {
    expect(formatRow({ id: 1, name: "Clay Night" }, BASE)).toBe(`Event: 'Clay Night', Link: ${BASE}/events/1?${UTM}`);
    expect(formatRow({ id: 1 }, BASE)).toBe(`Event: 'Untitled event', Link: ${BASE}/events/1?${UTM}`);
  });
});

describe("formatRows", () => {
  it("leaves out and counts rows it cannot link", () => {
    const { lines, unlinked } = formatRows([{ id: 1, event_name: "A" }, { event_name: "B" }], BASE);
    expect(lines).toEqual([`Event: 'A', Link: ${BASE}/events/1?${UTM}`]);
    expect(unlinked).toBe(1);
  });
});

describe("resultSummary", () => {
  it("uses the singular for one event", () => {
    expect(resultSummary(["x"])).toBe("Found 1 event. Details:\n- x");
  });

  it("lists every line", () => {
    expect(resultSummary(["x", "y"])).toBe("Found 2 events. Details:\n- x\n- y");
  });
});

describe("noResultsSummary", () => {
  it("suggests upcoming events and categories", () => {
    const insights: InsightMap = {
      categories: {
        entries: [
          { canonicalName: "Workshops", count: 1 },
          { canonicalName: "Music Concerts", count: 1 },
        ],
        summary: "",
      },
      locations: null,
      date_ranges: null,
      popular: {
        events: [
          { name: "A", category: "Workshops", slug: "a", nextOccurrence: "2027-01-01T00:00:00.000Z" },
          { name: "B", category: "Workshops", slug: "b", nextOccurrence: "2027-01-02T00:00:00.000Z" },
          { name: "C", category: "Music Concerts", slug: "c", nextOccurrence: "2027-01-03T00:00:00.000Z" },
          { name: "D", category: "Music Concerts", slug: "d", nextOccurrence: "2027-01-04T00:00:00.000Z" },
        ],
        summary: "",
      },
      stats: null,
    };
    expect(noResultsSummary(insights)).toBe(
      [
        NO_RESULTS_MESSAGE,
        "Upcoming events you might like: A (Workshops), B (Workshops), C (Music Concerts)",
        "Available categories: Workshops, Music Concerts",
      ].join("\n"),
    );
  });

  it("is just the message without insights", () => {
    expect(
      noResultsSummary({ categories: null, locations: null, date_ranges: null, popular: null, stats: null }),
    ).toBe("No events found matching the specified criteria.");
  });
});
