import { MalformedTranscriptError } from "@/lib/pipeline/errors";
import type { RawTranscriptLine, Segment } from "@/lib/pipeline/types";

/**
 * Converts supplier lines into contiguous zero-based segments.
 *
 * Lines are taken in supplier order and never reordered or clamped: a negative or
 * non-finite offset, an end before its start, a start or end earlier than the
 * previous line's, or a line without text fails the whole transcript.
 */
export function segmentTranscript(videoId: string, lines: RawTranscriptLine[]): Segment[] {
  const segments: Segment[] = [];
  let previousStart = 0;
  let previousEnd = 0;

  for (let index = 0; index < lines.length; index += 1) {
    const line = lines[index];

    if (!Number.isFinite(line.start) || !Number.isFinite(line.end)) {
      throw new MalformedTranscriptError(`Line ${index} has a non-finite offset`, index);
    }

    if (line.start < 0 || line.end < 0) {
      throw new MalformedTranscriptError(`Line ${index} has a negative offset`, index);
    }

    if (line.end < line.start) {
      throw new MalformedTranscriptError(
        `Line ${index} ends at ${line.end}s before it starts at ${line.start}s`,
        index,
      );
    }

    if (index > 0 && line.start < previousStart) {
      throw new MalformedTranscriptError(
        `Line ${index} starts at ${line.start}s, earlier than the previous line at ${previousStart}s`,
        index,
      );
    }

    if (index > 0 && line.end < previousEnd) {
      throw new MalformedTranscriptError(
        `Line ${index} ends at ${line.end}s, earlier than the previous line at ${previousEnd}s`,
        index,
      );
    }

    const text = collapseWhitespace(line.text);
    if (!text) {
      throw new MalformedTranscriptError(`Line ${index} has no text`, index);
    }

    segments.push({
      videoId,
      seq: segments.length,
      startSec: line.start,
      endSec: line.end,
      text,
    });

    previousStart = line.start;
    previousEnd = line.end;
  }

  return segments;
}

export function collapseWhitespace(input: string): string {
  return input.replace(/\s+/g, " ").trim();
}
