import type { ArchiveStore } from "@/lib/db/archive-store";
import { QueryError } from "@/lib/pipeline/errors";
import { toVideoFacets, type Logger, type VideoRecord } from "@/lib/pipeline/types";
import { reindexVideo, repairSearchIndex, verifySearchIndex } from "@/lib/search/index-maintenance";
import { compareRankedMatches, tokenizeQuery } from "@/lib/search/ranking";
import { matchesFilters, type SearchIndex } from "@/lib/search/search-index";
import { buildSnippet } from "@/lib/search/snippet";
import { KeyedLock } from "@/lib/utils/keyed-lock";
import type { IndexVerificationReport, SearchFilters, SearchMatch } from "@/types/search";

const MAX_LIMIT = 100;
const MIN_LIMIT = 1;
export const DEFAULT_SEARCH_LIMIT = 20;
export const DEFAULT_VERIFY_INTERVAL_MS = 60_000;

export type SearchOptions = {
  /** Caps the result count; every match is returned when omitted. */
  limit?: number;
};

type SearchServiceDeps = {
  index: SearchIndex;
  store: ArchiveStore;
  /** The lock ingestion and review hold per video. */
  lock?: KeyedLock;
  logger?: Logger;
  persistIndex?: () => Promise<void>;
  /** Minimum time between full index-versus-store comparisons. */
  verifyIntervalMs?: number;
  now?: () => Date;
};

export type SearchService = {
  search(query: string, filters?: SearchFilters, options?: SearchOptions): Promise<SearchMatch[]>;
};

export function createSearchService(deps: SearchServiceDeps): SearchService {
  const lock = deps.lock ?? new KeyedLock();
  const logger = deps.logger ?? (() => undefined);
  const persistIndex = deps.persistIndex ?? (async () => undefined);
  const verifyIntervalMs = deps.verifyIntervalMs ?? DEFAULT_VERIFY_INTERVAL_MS;
  const now = deps.now ?? (() => new Date());
  let verifiedAt: number | null = null;

  async function reconcile(): Promise<void> {
    const startedAt = now().getTime();
    if (verifiedAt !== null && startedAt - verifiedAt < verifyIntervalMs) {
      return;
    }

    const report = withoutLockedVideos(await verifySearchIndex(deps.index, deps.store), lock);
    verifiedAt = startedAt;

    if (report.missingFromIndex.length === 0 && report.notApproved.length === 0) {
      return;
    }

    await repairSearchIndex(deps.index, deps.store, report, logger, lock);
    await persistIndex();
  }

  async function repairStaleHits(videoIds: string[]): Promise<void> {
    for (const videoId of videoIds) {
      const outcome = await lock.runExclusive(videoId, () => reindexVideo(deps.index, deps.store, videoId));
      logger(`[reindex] ${videoId} ${outcome}`);
    }

    if (videoIds.length > 0) {
      await persistIndex();
    }
  }

  return {
    async search(query, filters = {}, options = {}) {
      if (tokenizeQuery(query, { stopwords: deps.index.stopwords }).length === 0) {
        throw new QueryError();
      }

      await reconcile();

      const limit = options.limit === undefined ? null : clampLimit(options.limit);
      const candidates = deps.index.query(query, filters);
      const videos = new Map<string, VideoRecord | null>();
      const staleVideoIds: string[] = [];
      const results: SearchMatch[] = [];

      for (const candidate of candidates) {
        let video = videos.get(candidate.videoId);
        if (video === undefined) {
          video = await deps.store.getVideo(candidate.videoId);
          videos.set(candidate.videoId, video);

          // A locked video is mid-transition; its lock holder settles the index.
          if ((!video || video.state !== "approved") && !lock.isLocked(candidate.videoId)) {
            logger(`[index-inconsistency] ${candidate.videoId} matched but is ${video?.state ?? "missing"}`);
            staleVideoIds.push(candidate.videoId);
          }
        }

        // The index may trail the store by one transition; the store decides.
        if (!video || video.state !== "approved" || !matchesFilters(toVideoFacets(video), filters)) {
          continue;
        }

        results.push({
          video,
          segment: { videoId: candidate.videoId, ...candidate.segment },
          score: candidate.score,
          snippet: buildSnippet(candidate.segment.text, candidate.matchedTerms),
          matchedTerms: candidate.matchedTerms,
        });
      }

      await repairStaleHits(staleVideoIds);

      const ranked = results.sort((left, right) => compareRankedMatches(toRankKey(left), toRankKey(right)));
      return limit === null ? ranked : ranked.slice(0, limit);
    },
  };
}

function withoutLockedVideos(report: IndexVerificationReport, lock: KeyedLock): IndexVerificationReport {
  return {
    ...report,
    missingFromIndex: report.missingFromIndex.filter((videoId) => !lock.isLocked(videoId)),
    notApproved: report.notApproved.filter((videoId) => !lock.isLocked(videoId)),
  };
}

function toRankKey(match: SearchMatch) {
  return {
    score: match.score,
    publishDate: match.video.publishDate,
    videoId: match.video.videoId,
    seq: match.segment.seq,
  };
}

export function clampLimit(value: number): number {
  if (!Number.isFinite(value)) {
    return DEFAULT_SEARCH_LIMIT;
  }

  return Math.min(Math.max(Math.floor(value), MIN_LIMIT), MAX_LIMIT);
}
