import { z } from "zod";
import { FetchError, MalformedMetadataError, MalformedTranscriptError } from "@/lib/pipeline/errors";
import type { RawTranscriptLine, VideoMetadata } from "@/lib/pipeline/types";

/**
 * External source of transcripts and metadata. Implementations throw `FetchError`
 * for anything attributable to the remote platform; the payload itself is untrusted
 * and validated by the pipeline.
 */
export interface TranscriptSupplier {
  fetch(videoId: string, signal: AbortSignal): Promise<unknown>;
}

export const VideoMetadataSchema = z.object({
  title: z.string().trim().min(1),
  channel: z.string().trim().min(1),
  publishDate: z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD")
    .nullish()
    .transform((value) => value ?? null),
  durationSec: z.number().finite().nonnegative(),
});

const TranscriptLineSchema = z.object({
  start: z.number(),
  end: z.number(),
  text: z.string(),
});

const PayloadEnvelopeSchema = z
  .object({
    lines: z.array(z.unknown()),
  })
  .passthrough();

export type SupplierPayload = {
  metadata: VideoMetadata;
  lines: RawTranscriptLine[];
};

export function parseVideoMetadata(raw: unknown): VideoMetadata {
  const parsed = VideoMetadataSchema.safeParse(raw);

  if (!parsed.success) {
    throw new MalformedMetadataError(`Unexpected metadata shape: ${formatIssues(parsed.error)}`);
  }

  return parsed.data;
}

export function parseTranscriptLines(raw: unknown): RawTranscriptLine[] {
  const envelope = PayloadEnvelopeSchema.safeParse(raw);

  if (!envelope.success) {
    throw new MalformedTranscriptError(`Unexpected transcript shape: ${formatIssues(envelope.error)}`);
  }

  if (envelope.data.lines.length === 0) {
    throw new FetchError("NoTranscript", "Supplier returned no transcript lines");
  }

  return envelope.data.lines.map((line, index) => {
    const parsed = TranscriptLineSchema.safeParse(line);

    if (!parsed.success) {
      throw new MalformedTranscriptError(`Line ${index} is malformed: ${formatIssues(parsed.error)}`, index);
    }

    return parsed.data;
  });
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}
