import { describe, it, expect } from "vitest";
import { similarityRatio } from "../../src/utils/similarity.js";

describe("similarityRatio", () => {
  it("is 1 for identical strings", () => {
    expect(similarityRatio("workshops", "workshops")).toBe(1);
  });

  it("is 1 for two empty strings", () => {
    expect(similarityRatio("", "")).toBe(1);
  });

  it("is 0 when one side is empty", () => {
    expect(similarityRatio("abc", "")).toBe(0);
  });

  it("counts matched characters over both lengths", () => {
    expect(similarityRatio("abcd", "bcde")).toBe(0.75);
    expect(similarityRatio("workshop", "workshops")).toBeCloseTo(16 / 17, 10);
  });

  it("matches blocks on both sides of the longest match", () => {
    // k, itt, n match: 2 * 8 / 13
    expect(similarityRatio("kitten", "sitting")).toBeCloseTo(8 / 13, 10);
  });

  it("is 0 when nothing matches", () => {
    expect(similarityRatio("jazz", "tech")).toBe(0);
  });
});
