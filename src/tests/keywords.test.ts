import { describe, expect, it } from "vitest";
import { findTokenOffset, findTokenSpan, resolveStopwords, tokenizeText } from "@/lib/pipeline/keywords";

describe("tokenizeText", () => {
  it("lowercases and splits on non-alphanumeric boundaries", () => {
    expect(tokenizeText("Hello, World! It's 2024-06-01.")).toEqual(["hello", "world", "it", "s", "2024", "06", "01"]);
  });

  it("keeps letters outside ASCII", () => {
    expect(tokenizeText("Café naïve 東京")).toEqual(["café", "naïve", "東京"]);
  });

  it("keeps every word when no stopwords are configured", () => {
    expect(tokenizeText("the cat and the hat")).toEqual(["the", "cat", "and", "the", "hat"]);
  });

  it("drops the english stopword list when configured", () => {
    const stopwords = resolveStopwords("english");

    expect(tokenizeText("The cat and the hat", { stopwords })).toEqual(["cat", "hat"]);
    expect(resolveStopwords("none").size).toBe(0);
  });
});

describe("findTokenOffset", () => {
  it("finds whole tokens only, case-insensitively", () => {
    expect(findTokenOffset("Worldwide world", "world")).toBe(10);
    expect(findTokenOffset("Hello WORLD", "world")).toBe(6);
    expect(findTokenOffset("worldwide", "world")).toBe(-1);
    expect(findTokenOffset("anything", "")).toBe(-1);
  });

  it("reports offsets in the original text when lowercasing widens characters", () => {
    expect(findTokenOffset("İİ needle", "needle")).toBe(3);
    expect(findTokenSpan("İstanbul NEEDLE", "needle")).toEqual({ index: 9, length: 6 });
  });
});
