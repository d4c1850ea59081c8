import { describe, expect, it } from "vitest";
import {
  bm25TermScore,
  compareRankedMatches,
  expandQueryTerm,
  inverseDocumentFrequency,
  isFuzzyMatch,
  levenshteinDistance,
  tokenizeQuery,
} from "@/lib/search/ranking";

describe("tokenizeQuery", () => {
  it("deduplicates query terms and keeps first-seen order", () => {
    expect(tokenizeQuery("World hello world")).toEqual(["world", "hello"]);
  });
});

describe("bm25TermScore", () => {
  it("uses a non-negative idf", () => {
    expect(inverseDocumentFrequency(1, 1)).toBeCloseTo(Math.log(1 + 0.5 / 1.5), 10);
    expect(inverseDocumentFrequency(2, 2)).toBeGreaterThan(0);
  });

  it("scores an average-length single occurrence as exactly its idf", () => {
    const score = bm25TermScore({
      termFrequency: 1,
      documentLength: 2,
      averageDocumentLength: 2,
      documentFrequency: 1,
      documentCount: 1,
    });

    expect(score).toBeCloseTo(0.2876820724, 8);
  });

  it("rewards repeated terms and penalizes long segments", () => {
    const base = { documentFrequency: 1, documentCount: 10, averageDocumentLength: 5 };
    const once = bm25TermScore({ ...base, termFrequency: 1, documentLength: 5 });
    const twice = bm25TermScore({ ...base, termFrequency: 2, documentLength: 5 });
    const longer = bm25TermScore({ ...base, termFrequency: 1, documentLength: 20 });

    expect(twice).toBeGreaterThan(once);
    expect(longer).toBeLessThan(once);
    expect(bm25TermScore({ ...base, termFrequency: 0, documentLength: 5 })).toBe(0);
  });
});

describe("expandQueryTerm", () => {
  it("puts the exact term first, then prefix and fuzzy variants", () => {
    const variants = expandQueryTerm("world", ["worlds", "worldwide", "worls", "world", "hello"]);

    expect(variants).toEqual([
      { term: "world", kind: "exact", weight: 1 },
      { term: "worlds", kind: "prefix", weight: 0.5 },
      { term: "worldwide", kind: "prefix", weight: 0.5 },
      { term: "worls", kind: "fuzzy", weight: 0.25 },
    ]);
  });

  it("does not expand short query terms", () => {
    expect(expandQueryTerm("wo", ["world", "wo"])).toEqual([{ term: "wo", kind: "exact", weight: 1 }]);
  });
});

describe("isFuzzyMatch", () => {
  it("accepts one edit on short terms and rejects transposed prefixes", () => {
    expect(isFuzzyMatch("worls", "world")).toBe(true);
    expect(isFuzzyMatch("wordl", "world")).toBe(false);
    expect(isFuzzyMatch("cat", "car")).toBe(false);
  });

  it("computes edit distance", () => {
    expect(levenshteinDistance("kitten", "sitting")).toBe(3);
    expect(levenshteinDistance("", "abc")).toBe(3);
  });
});

describe("compareRankedMatches", () => {
  it("orders by score, newer date, video id, then seq", () => {
    const keys = [
      { score: 1, publishDate: null, videoId: "a", seq: 0 },
      { score: 1, publishDate: "2024-01-01", videoId: "b", seq: 1 },
      { score: 1, publishDate: "2024-01-01", videoId: "b", seq: 0 },
      { score: 1, publishDate: "2024-01-01", videoId: "a", seq: 3 },
      { score: 1, publishDate: "2024-05-01", videoId: "z", seq: 0 },
      { score: 2, publishDate: null, videoId: "y", seq: 0 },
    ];

    const ordered = [...keys].sort(compareRankedMatches).map((key) => `${key.videoId}#${key.seq}`);

    expect(ordered).toEqual(["y#0", "z#0", "a#3", "b#0", "b#1", "a#0"]);
  });
});
