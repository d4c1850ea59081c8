import { describe, expect, it } from "vitest";
import { FetchError, MalformedMetadataError, MalformedTranscriptError } from "@/lib/pipeline/errors";
import { approveChannels, requireManualApproval } from "@/lib/pipeline/ingest/auto-approval";
import { parseTranscriptLines, parseVideoMetadata } from "@/lib/pipeline/transcript/supplier";
import { extractVideoId, isValidVideoId } from "@/lib/pipeline/video-id";

describe("parseVideoMetadata", () => {
  it("trims text fields and defaults a missing publish date to null", () => {
    expect(parseVideoMetadata({ title: "  Bread  ", channel: "Kitchen ", durationSec: 61.5, extra: true })).toEqual({
      title: "Bread",
      channel: "Kitchen",
      publishDate: null,
      durationSec: 61.5,
    });
  });

  it("rejects shapes outside the video metadata contract", () => {
    expect(() => parseVideoMetadata({ title: "Bread", channel: "Kitchen", publishDate: "2024/01/01", durationSec: 1 })).toThrow(
      MalformedMetadataError,
    );
    expect(() => parseVideoMetadata({ title: "Bread", channel: "Kitchen", durationSec: -1 })).toThrow(
      "Unexpected metadata shape: durationSec",
    );
    expect(() => parseVideoMetadata(null)).toThrow(MalformedMetadataError);
  });
});

describe("parseTranscriptLines", () => {
  it("returns well-formed lines", () => {
    expect(parseTranscriptLines({ lines: [{ start: 0, end: 1.5, text: "hi" }] })).toEqual([
      { start: 0, end: 1.5, text: "hi" },
    ]);
  });

  it("treats an empty transcript as unavailable", () => {
    try {
      parseTranscriptLines({ lines: [] });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(FetchError);
      expect(error).toMatchObject({ kind: "NoTranscript" });
    }
  });

  it("points at the first malformed line", () => {
    try {
      parseTranscriptLines({ lines: [{ start: 0, end: 1, text: "ok" }, { start: "1", end: 2, text: "bad" }] });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(MalformedTranscriptError);
      expect(error).toMatchObject({ lineIndex: 1 });
    }

    expect(() => parseTranscriptLines({ title: "no lines" })).toThrow(MalformedTranscriptError);
  });
});

describe("video ids", () => {
  it("validates bare ids", () => {
    expect(isValidVideoId("abc123")).toBe(true);
    expect(isValidVideoId("AbC-d_E1234")).toBe(true);
    expect(isValidVideoId("ab")).toBe(false);
    expect(isValidVideoId("has space")).toBe(false);
  });

  it("extracts ids from common URL forms", () => {
    expect(extractVideoId(" AbCdEfGhIjK ")).toBe("AbCdEfGhIjK");
    expect(extractVideoId("https://www.youtube.com/watch?v=AbCdEfGhIjK&t=30s")).toBe("AbCdEfGhIjK");
    expect(extractVideoId("https://youtu.be/AbCdEfGhIjK?si=share")).toBe("AbCdEfGhIjK");
    expect(extractVideoId("https://www.youtube.com/shorts/AbCdEfGhIjK")).toBe("AbCdEfGhIjK");
    expect(extractVideoId("https://www.youtube.com/embed/AbCdEfGhIjK")).toBe("AbCdEfGhIjK");
    expect(extractVideoId("https://example.com/")).toBeNull();
  });
});

describe("auto-approval policies", () => {
  const candidate = {
    videoId: "abc123",
    metadata: { title: "Bread", channel: "Kitchen", publishDate: null, durationSec: 10 },
    segments: [],
  };

  it("requires manual approval by default", () => {
    expect(requireManualApproval(candidate)).toBe(false);
    expect(approveChannels([])(candidate)).toBe(false);
  });

  it("approves listed channels case-insensitively", () => {
    expect(approveChannels([" kitchen "])(candidate)).toBe(true);
    expect(approveChannels(["Garage"])(candidate)).toBe(false);
  });
});
