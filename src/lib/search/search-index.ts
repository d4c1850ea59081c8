import { QueryError } from "@/lib/pipeline/errors";
import { tokenizeText } from "@/lib/pipeline/keywords";
import type { Segment, VideoFacets } from "@/lib/pipeline/types";
import { bm25TermScore, compareRankedMatches, expandQueryTerm, tokenizeQuery } from "@/lib/search/ranking";
import type { SearchFilters } from "@/types/search";

export type IndexedSegment = Pick<Segment, "seq" | "startSec" | "endSec" | "text">;

export type IndexedVideo = {
  videoId: string;
  facets: VideoFacets;
  segments: IndexedSegment[];
};

export type IndexMatch = {
  videoId: string;
  segment: IndexedSegment;
  facets: VideoFacets;
  score: number;
  matchedTerms: string[];
};

export type SearchIndexOptions = {
  stopwords?: ReadonlySet<string>;
};

export type SearchIndexStats = {
  videoCount: number;
  segmentCount: number;
  termCount: number;
};

type IndexedDocument = {
  key: string;
  videoId: string;
  segment: IndexedSegment;
  length: number;
  termFrequencies: Map<string, number>;
};

type VideoEntry = {
  facets: VideoFacets;
  documents: IndexedDocument[];
};

const EMPTY_FACETS: VideoFacets = {
  channel: null,
  publishDate: null,
  durationSec: null,
};

/**
 * In-memory inverted index over segment text. Holds only what callers put in; keeping
 * it equal to the approved corpus is the job of the pipeline and review workflow.
 */
export class SearchIndex {
  private readonly videos = new Map<string, VideoEntry>();
  private readonly documents = new Map<string, IndexedDocument>();
  private readonly postings = new Map<string, Map<string, number>>();
  private totalLength = 0;
  readonly stopwords: ReadonlySet<string>;

  constructor(options: SearchIndexOptions = {}) {
    this.stopwords = options.stopwords ?? new Set();
  }

  /** Replaces every entry of `videoId` with the given segments. */
  update(videoId: string, segments: IndexedSegment[], facets: VideoFacets = EMPTY_FACETS): void {
    this.remove(videoId);

    const documents: IndexedDocument[] = [];

    for (const segment of [...segments].sort((left, right) => left.seq - right.seq)) {
      const tokens = tokenizeText(segment.text, { stopwords: this.stopwords });
      const termFrequencies = new Map<string, number>();

      for (const token of tokens) {
        termFrequencies.set(token, (termFrequencies.get(token) ?? 0) + 1);
      }

      const document: IndexedDocument = {
        key: toDocumentKey(videoId, segment.seq),
        videoId,
        segment: { seq: segment.seq, startSec: segment.startSec, endSec: segment.endSec, text: segment.text },
        length: tokens.length,
        termFrequencies,
      };

      documents.push(document);
      this.documents.set(document.key, document);
      this.totalLength += document.length;

      for (const [term, frequency] of termFrequencies) {
        let posting = this.postings.get(term);
        if (!posting) {
          posting = new Map();
          this.postings.set(term, posting);
        }
        posting.set(document.key, frequency);
      }
    }

    this.videos.set(videoId, { facets: { ...facets }, documents });
  }

  /** Drops every entry of `videoId`. Returns false when the video was not indexed. */
  remove(videoId: string): boolean {
    const entry = this.videos.get(videoId);
    if (!entry) {
      return false;
    }

    for (const document of entry.documents) {
      this.documents.delete(document.key);
      this.totalLength -= document.length;

      for (const term of document.termFrequencies.keys()) {
        const posting = this.postings.get(term);
        if (!posting) {
          continue;
        }

        posting.delete(document.key);
        if (posting.size === 0) {
          this.postings.delete(term);
        }
      }
    }

    this.videos.delete(videoId);
    return true;
  }

  has(videoId: string): boolean {
    return this.videos.has(videoId);
  }

  videoIds(): string[] {
    return Array.from(this.videos.keys()).sort();
  }

  getVideo(videoId: string): IndexedVideo | null {
    const entry = this.videos.get(videoId);
    if (!entry) {
      return null;
    }

    return {
      videoId,
      facets: { ...entry.facets },
      segments: entry.documents.map((document) => ({ ...document.segment })),
    };
  }

  /** Puts a video back exactly as `getVideo` returned it; `null` means "was not indexed". */
  restore(videoId: string, snapshot: IndexedVideo | null): void {
    if (snapshot) {
      this.update(videoId, snapshot.segments, snapshot.facets);
      return;
    }

    this.remove(videoId);
  }

  clear(): void {
    this.videos.clear();
    this.documents.clear();
    this.postings.clear();
    this.totalLength = 0;
  }

  stats(): SearchIndexStats {
    return {
      videoCount: this.videos.size,
      segmentCount: this.documents.size,
      termCount: this.postings.size,
    };
  }

  query(text: string, filters: SearchFilters = {}): IndexMatch[] {
    const queryTerms = tokenizeQuery(text, { stopwords: this.stopwords });

    if (queryTerms.length === 0) {
      throw new QueryError();
    }

    const documentCount = this.documents.size;
    if (documentCount === 0) {
      return [];
    }

    const averageDocumentLength = this.totalLength / documentCount;
    const eligibleVideos = new Map<string, boolean>();
    const accumulators = new Map<string, { best: number[]; terms: Array<string | null> }>();

    queryTerms.forEach((queryTerm, termIndex) => {
      for (const variant of expandQueryTerm(queryTerm, this.postings.keys())) {
        const posting = this.postings.get(variant.term);
        if (!posting) {
          continue;
        }

        for (const [key, termFrequency] of posting) {
          const document = this.documents.get(key);
          if (!document || !this.isEligible(document.videoId, filters, eligibleVideos)) {
            continue;
          }

          const score =
            variant.weight *
            bm25TermScore({
              termFrequency,
              documentLength: document.length,
              averageDocumentLength,
              documentFrequency: posting.size,
              documentCount,
            });

          let accumulator = accumulators.get(key);
          if (!accumulator) {
            accumulator = {
              best: queryTerms.map(() => 0),
              terms: queryTerms.map(() => null),
            };
            accumulators.set(key, accumulator);
          }

          if (score > accumulator.best[termIndex]) {
            accumulator.best[termIndex] = score;
            accumulator.terms[termIndex] = variant.term;
          }
        }
      }
    });

    const matches: IndexMatch[] = [];

    for (const [key, accumulator] of accumulators) {
      const document = this.documents.get(key);
      const entry = document ? this.videos.get(document.videoId) : undefined;
      if (!document || !entry) {
        continue;
      }

      const matchedTerms = accumulator.terms.filter((term): term is string => term !== null);
      const coverage = matchedTerms.length / queryTerms.length;
      const total = accumulator.best.reduce((sum, value) => sum + value, 0);

      matches.push({
        videoId: document.videoId,
        segment: { ...document.segment },
        facets: { ...entry.facets },
        score: total * coverage,
        matchedTerms,
      });
    }

    return matches.sort((left, right) =>
      compareRankedMatches(
        { score: left.score, publishDate: left.facets.publishDate, videoId: left.videoId, seq: left.segment.seq },
        { score: right.score, publishDate: right.facets.publishDate, videoId: right.videoId, seq: right.segment.seq },
      ),
    );
  }

  private isEligible(videoId: string, filters: SearchFilters, cache: Map<string, boolean>): boolean {
    const cached = cache.get(videoId);
    if (cached !== undefined) {
      return cached;
    }

    const entry = this.videos.get(videoId);
    const eligible = entry ? matchesFilters(entry.facets, filters) : false;
    cache.set(videoId, eligible);
    return eligible;
  }
}

export function matchesFilters(facets: VideoFacets, filters: SearchFilters): boolean {
  if (filters.channel !== undefined) {
    const wanted = filters.channel.trim().toLowerCase();
    if (!facets.channel || facets.channel.trim().toLowerCase() !== wanted) {
      return false;
    }
  }

  const from = filters.dateRange?.from;
  const to = filters.dateRange?.to;
  if (from !== undefined || to !== undefined) {
    if (facets.publishDate === null) {
      return false;
    }

    if (from !== undefined && facets.publishDate < from) {
      return false;
    }

    if (to !== undefined && facets.publishDate > to) {
      return false;
    }
  }

  const min = filters.durationRange?.min;
  const max = filters.durationRange?.max;
  if (min !== undefined || max !== undefined) {
    if (facets.durationSec === null) {
      return false;
    }

    if (min !== undefined && facets.durationSec < min) {
      return false;
    }

    if (max !== undefined && facets.durationSec > max) {
      return false;
    }
  }

  return true;
}

function toDocumentKey(videoId: string, seq: number): string {
  return `${videoId}#${seq}`;
}
