import type { Segment, VideoRecord } from "@/lib/pipeline/types";

export type DateRange = {
  /** Inclusive, `YYYY-MM-DD`. */
  from?: string;
  /** Inclusive, `YYYY-MM-DD`. */
  to?: string;
};

export type DurationRange = {
  min?: number;
  max?: number;
};

export type SearchFilters = {
  channel?: string;
  dateRange?: DateRange;
  durationRange?: DurationRange;
};

export type SearchMatch = {
  video: VideoRecord;
  segment: Segment;
  score: number;
  snippet: string;
  matchedTerms: string[];
};

export type IndexVerificationReport = {
  approvedCount: number;
  indexedCount: number;
  missingFromIndex: string[];
  notApproved: string[];
  segmentCountMismatches: Array<{ videoId: string; stored: number; indexed: number }>;
};
