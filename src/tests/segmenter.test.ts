import { describe, expect, it } from "vitest";
import { MalformedTranscriptError } from "@/lib/pipeline/errors";
import { collapseWhitespace, segmentTranscript } from "@/lib/pipeline/segmenter";

describe("segmentTranscript", () => {
  it("assigns contiguous zero-based seq values and collapses whitespace", () => {
    const segments = segmentTranscript("abc123", [
      { start: 0, end: 2, text: "  hello \n world " },
      { start: 2, end: 4, text: "goodbye world" },
      { start: 2, end: 5, text: "same start is allowed" },
    ]);

    expect(segments).toEqual([
      { videoId: "abc123", seq: 0, startSec: 0, endSec: 2, text: "hello world" },
      { videoId: "abc123", seq: 1, startSec: 2, endSec: 4, text: "goodbye world" },
      { videoId: "abc123", seq: 2, startSec: 2, endSec: 5, text: "same start is allowed" },
    ]);
  });

  it("rejects a line that ends before it starts", () => {
    expect(() => segmentTranscript("abc123", [{ start: 5, end: 2, text: "x" }])).toThrow(
      "Line 0 ends at 2s before it starts at 5s",
    );
  });

  it("rejects out-of-order lines instead of sorting them", () => {
    try {
      segmentTranscript("abc123", [
        { start: 4, end: 6, text: "second" },
        { start: 1, end: 2, text: "first" },
      ]);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(MalformedTranscriptError);
      expect(error).toMatchObject({ lineIndex: 1, code: "MalformedTranscript" });
    }
  });

  it("rejects an end offset that goes backwards", () => {
    expect(() =>
      segmentTranscript("abc123", [
        { start: 0, end: 10, text: "a" },
        { start: 1, end: 2, text: "b" },
      ]),
    ).toThrow("Line 1 ends at 2s, earlier than the previous line at 10s");
  });

  it("rejects negative offsets, non-finite offsets and empty text", () => {
    expect(() => segmentTranscript("abc123", [{ start: -1, end: 2, text: "x" }])).toThrow(
      "Line 0 has a negative offset",
    );
    expect(() => segmentTranscript("abc123", [{ start: Number.NaN, end: 2, text: "x" }])).toThrow(
      "Line 0 has a non-finite offset",
    );
    expect(() =>
      segmentTranscript("abc123", [
        { start: 0, end: 1, text: "ok" },
        { start: 1, end: 2, text: " \n\t " },
      ]),
    ).toThrow("Line 1 has no text");
  });

  it("returns no segments for no lines", () => {
    expect(segmentTranscript("abc123", [])).toEqual([]);
  });
});

describe("collapseWhitespace", () => {
  it("trims and folds runs of whitespace", () => {
    expect(collapseWhitespace("\ta  b\n\nc ")).toBe("a b c");
  });
});
