import { describe, expect, it } from "vitest";
import { buildSnippet } from "@/lib/search/snippet";

const LONG_TEXT = "alpha bravo charlie delta echo foxtrot golf hotel needle india juliet kilo lima";

describe("buildSnippet", () => {
  it("returns short text unchanged", () => {
    expect(buildSnippet("hello world", ["world"])).toBe("hello world");
  });

  it("centres the window on the matched token", () => {
    expect(buildSnippet(LONG_TEXT, ["needle"], 20)).toBe("… hotel needle india …");
  });

  it("clamps the window at either end of the text", () => {
    expect(buildSnippet("needle first then a long tail of words that keeps going", ["needle"], 20)).toBe(
      "needle first then a …",
    );
    expect(buildSnippet("a long lead of words that keeps going before the needle", ["needle"], 20)).toBe(
      "…ng before the needle",
    );
  });

  it("anchors on the earliest of several matched terms", () => {
    expect(buildSnippet(LONG_TEXT, ["lima", "needle"], 20)).toBe("… hotel needle india …");
  });

  it("keeps the window on the term when lowercasing changes the text length", () => {
    expect(buildSnippet("İİİİİİİİİİİİ alpha needle bravo charlie delta echo", ["needle"], 20)).toBe(
      "… alpha needle bravo …",
    );
  });

  it("falls back to the head of the text", () => {
    expect(buildSnippet(LONG_TEXT, ["missing"], 20)).toBe("alpha bravo charlie …");
  });
});
