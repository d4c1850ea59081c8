import type { Segment, VideoMetadata } from "@/lib/pipeline/types";

export type AutoApprovalCandidate = {
  videoId: string;
  metadata: VideoMetadata;
  segments: Segment[];
};

/** Decides whether a successful ingestion lands in `approved` instead of `pending`. */
export type AutoApprovalPolicy = (candidate: AutoApprovalCandidate) => boolean;

export const requireManualApproval: AutoApprovalPolicy = () => false;

/** Approves videos from the listed channels (case-insensitive); everything else waits. */
export function approveChannels(channels: string[]): AutoApprovalPolicy {
  const allowed = new Set(channels.map((channel) => channel.trim().toLowerCase()).filter(Boolean));

  if (allowed.size === 0) {
    return requireManualApproval;
  }

  return (candidate) => allowed.has(candidate.metadata.channel.trim().toLowerCase());
}
