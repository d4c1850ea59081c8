#!/usr/bin/env node

import { readFile, writeFile } from "node:fs/promises";
import { Command } from "commander";
import { openTranscriptArchive } from "@/lib/archive/open-archive";
import type { TranscriptArchive } from "@/lib/archive/transcript-archive";
import { ensureEnvLoaded, loadArchiveConfig } from "@/lib/config";
import { FetchError, describeError } from "@/lib/pipeline/errors";
import { segmentTranscript } from "@/lib/pipeline/segmenter";
import { createYoutubeTranscriptSupplier } from "@/lib/pipeline/transcript/fetch-transcript";
import { parseTranscriptLines, parseVideoMetadata } from "@/lib/pipeline/transcript/supplier";
import { isReviewState, type ReviewState, type VideoRecord } from "@/lib/pipeline/types";
import { extractVideoId } from "@/lib/pipeline/video-id";
import { DEFAULT_SEARCH_LIMIT } from "@/lib/search/search-service";
import { withTimeout } from "@/lib/utils/timeout";
import type { SearchFilters } from "@/types/search";

const program = new Command();

program
  .name("transcript-archive")
  .description("Transcript archive: ingestion, review and search")
  .version("0.1.0");

const transcript = program.command("transcript").description("Transcript operations");

transcript
  .command("fetch")
  .description("Fetch and segment one transcript without storing it")
  .requiredOption("--video-id <videoId>", "YouTube video id or URL")
  .option("--out <path>", "Output file path (JSON)")
  .action(async (options: { videoId: string; out?: string }) => {
    try {
      const videoId = requireVideoId(options.videoId);
      const config = loadConfigFromEnv();
      const supplier = createYoutubeTranscriptSupplier();
      const raw = await withTimeout(
        (signal) => supplier.fetch(videoId, signal),
        config.fetchTimeoutMs,
        () => new FetchError("Timeout", `Fetching ${videoId} timed out after ${config.fetchTimeoutMs}ms`),
      );
      const metadata = parseVideoMetadata(raw);
      const segments = segmentTranscript(videoId, parseTranscriptLines(raw));
      const payload = JSON.stringify({ videoId, metadata, segments }, null, 2);

      if (options.out) {
        await writeFile(options.out, payload, "utf8");
        console.log(`Saved ${segments.length} segments to ${options.out}`);
        return;
      }

      console.log(payload);
    } catch (error) {
      if (error instanceof FetchError) {
        console.error(`Transcript unavailable (${error.kind}): ${error.message}`);
      } else {
        console.error(`Transcript fetch failed: ${describeError(error)}`);
      }

      process.exitCode = 1;
    }
  });

const ingest = program.command("ingest").description("Ingestion operations");

ingest
  .command("run")
  .option("--video-id <videoId...>", "Video ids or URLs to ingest")
  .option("--video-ids-file <path>", "Path to newline-delimited video ids")
  .option("--force", "Re-ingest even when the ledger already has the video", false)
  .option("--delay-ms <ms>", "Pause between fetched videos (default ARCHIVE_BATCH_DELAY_MS)", parseNumber)
  .action(async (options: { videoId?: string[]; videoIdsFile?: string; force: boolean; delayMs?: number }) => {
    try {
      const fromFlag = options.videoId ?? [];
      const fromFile = options.videoIdsFile ? await readLinesFromFile(options.videoIdsFile) : [];
      const videoIds = Array.from(
        new Set([...fromFlag, ...fromFile].map((value) => extractVideoId(value) ?? value.trim()).filter(Boolean)),
      );

      if (videoIds.length === 0) {
        console.error("No video ids provided. Use --video-id or --video-ids-file.");
        process.exitCode = 1;
        return;
      }

      const archive = await openFromEnv();
      const controller = new AbortController();
      const stop = () => controller.abort();
      process.once("SIGINT", stop);

      const result = await archive.ingestMany(videoIds, {
        force: options.force,
        signal: controller.signal,
        delayMs: options.delayMs,
      });
      process.off("SIGINT", stop);

      console.log(
        `Ingestion complete. processed=${result.processedVideoIds.length} skipped=${result.skippedVideoIds.length} failed=${result.failed.length}`,
      );

      if (result.failed.length > 0) {
        for (const failed of result.failed) {
          console.error(`- ${failed.videoId}: ${failed.reason}`);
        }

        process.exitCode = 1;
      }
    } catch (error) {
      console.error(`Ingestion failed: ${describeError(error)}`);
      process.exitCode = 1;
    }
  });

const review = program.command("review").description("Review workflow");

review
  .command("approve")
  .argument("<videoId>", "Video id")
  .action(async (videoId: string) => {
    await runReviewTransition((archive) => archive.approve(requireVideoId(videoId)));
  });

review
  .command("reject")
  .argument("<videoId>", "Video id")
  .action(async (videoId: string) => {
    await runReviewTransition((archive) => archive.reject(requireVideoId(videoId)));
  });

review
  .command("list")
  .option("--state <state>", "pending, approved, rejected or failed", "pending")
  .action(async (options: { state: string }) => {
    try {
      const state = parseReviewState(options.state);
      const archive = await openFromEnv();
      const videos = await archive.listVideos({ state });

      for (const video of videos) {
        console.log(formatVideoLine(video));
      }

      console.log(`${videos.length} ${state} video(s)`);
    } catch (error) {
      console.error(`Review list failed: ${describeError(error)}`);
      process.exitCode = 1;
    }
  });

const video = program.command("video").description("Stored videos");

video
  .command("show")
  .argument("<videoId>", "Video id")
  .option("--segments", "Print every segment", false)
  .action(async (videoId: string, options: { segments: boolean }) => {
    try {
      const archive = await openFromEnv();
      const stored = await archive.getVideo(requireVideoId(videoId));

      if (!stored) {
        console.error(`Video ${videoId} is not in the archive`);
        process.exitCode = 1;
        return;
      }

      console.log(formatVideoLine(stored.video));
      if (stored.video.failureReason) {
        console.log(`failure: ${stored.video.failureReason}`);
      }
      console.log(`segments: ${stored.segments.length}`);

      if (options.segments) {
        for (const segment of stored.segments) {
          console.log(`#${segment.seq} [${formatSeconds(segment.startSec)}-${formatSeconds(segment.endSec)}] ${segment.text}`);
        }
      }
    } catch (error) {
      console.error(`Video lookup failed: ${describeError(error)}`);
      process.exitCode = 1;
    }
  });

video
  .command("remove")
  .argument("<videoId>", "Video id")
  .action(async (videoId: string) => {
    try {
      const archive = await openFromEnv();
      await archive.removeVideo(requireVideoId(videoId));
      console.log(`Removed ${videoId}`);
    } catch (error) {
      console.error(`Video removal failed: ${describeError(error)}`);
      process.exitCode = 1;
    }
  });

program
  .command("search")
  .argument("<query>", "Search text")
  .option("--channel <channel>", "Only this channel (case-insensitive)")
  .option("--from <date>", "Published on or after YYYY-MM-DD")
  .option("--to <date>", "Published on or before YYYY-MM-DD")
  .option("--min-duration <seconds>", "Minimum video duration", parseNumber)
  .option("--max-duration <seconds>", "Maximum video duration", parseNumber)
  .option("--limit <count>", "Result count (1-100)", parseInteger, DEFAULT_SEARCH_LIMIT)
  .action(
    async (
      query: string,
      options: {
        channel?: string;
        from?: string;
        to?: string;
        minDuration?: number;
        maxDuration?: number;
        limit: number;
      },
    ) => {
      try {
        const archive = await openFromEnv();
        const matches = await archive.search(query, buildFilters(options), { limit: options.limit });

        for (const match of matches) {
          console.log(
            `${match.score.toFixed(3)} ${match.video.videoId}#${match.segment.seq} [${formatSeconds(match.segment.startSec)}] ${match.video.title ?? ""}`,
          );
          console.log(`    ${match.snippet}`);
        }

        console.log(`${matches.length} match(es)`);
      } catch (error) {
        console.error(`Search failed: ${describeError(error)}`);
        process.exitCode = 1;
      }
    },
  );

const index = program.command("index").description("Search index maintenance");

index.command("rebuild").action(async () => {
  try {
    const archive = await openFromEnv();
    const count = await archive.rebuildIndex();
    console.log(`Indexed ${count} approved video(s)`);
  } catch (error) {
    console.error(`Index rebuild failed: ${describeError(error)}`);
    process.exitCode = 1;
  }
});

index
  .command("verify")
  .option("--deep", "Also compare per-video segment counts", false)
  .option("--repair", "Reindex every inconsistent video", false)
  .action(async (options: { deep: boolean; repair: boolean }) => {
    try {
      const archive = await openFromEnv();
      const report = await archive.verifyIndex(options);

      console.log(`approved=${report.approvedCount} indexed=${report.indexedCount}`);
      for (const videoId of report.missingFromIndex) {
        console.log(`- missing from index: ${videoId}`);
      }
      for (const videoId of report.notApproved) {
        console.log(`- indexed but not approved: ${videoId}`);
      }
      for (const mismatch of report.segmentCountMismatches) {
        console.log(`- segment count ${mismatch.videoId}: stored=${mismatch.stored} indexed=${mismatch.indexed}`);
      }

      const inconsistent =
        report.missingFromIndex.length + report.notApproved.length + report.segmentCountMismatches.length;
      if (inconsistent > 0 && !options.repair) {
        process.exitCode = 1;
      }
    } catch (error) {
      console.error(`Index verify failed: ${describeError(error)}`);
      process.exitCode = 1;
    }
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(describeError(error));
  process.exitCode = 1;
});

function loadConfigFromEnv() {
  ensureEnvLoaded();
  return loadArchiveConfig();
}

function openFromEnv(): Promise<TranscriptArchive> {
  return openTranscriptArchive(loadConfigFromEnv(), { logger: (line) => console.log(line) });
}

async function runReviewTransition(transition: (archive: TranscriptArchive) => Promise<VideoRecord>): Promise<void> {
  try {
    const archive = await openFromEnv();
    const updated = await transition(archive);
    console.log(formatVideoLine(updated));
  } catch (error) {
    console.error(`Review failed: ${describeError(error)}`);
    process.exitCode = 1;
  }
}

function buildFilters(options: {
  channel?: string;
  from?: string;
  to?: string;
  minDuration?: number;
  maxDuration?: number;
}): SearchFilters {
  const filters: SearchFilters = {};

  if (options.channel) {
    filters.channel = options.channel;
  }

  if (options.from || options.to) {
    filters.dateRange = { from: parseDate(options.from), to: parseDate(options.to) };
  }

  if (options.minDuration !== undefined || options.maxDuration !== undefined) {
    filters.durationRange = { min: options.minDuration, max: options.maxDuration };
  }

  return filters;
}

function requireVideoId(input: string): string {
  const videoId = extractVideoId(input);

  if (!videoId) {
    throw new Error(`Not a video id or URL: ${input}`);
  }

  return videoId;
}

function parseReviewState(value: string): ReviewState {
  if (!isReviewState(value)) {
    throw new Error(`Unknown review state: ${value}`);
  }

  return value;
}

function parseDate(value: string | undefined): string | undefined {
  if (value === undefined) {
    return undefined;
  }

  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) {
    throw new Error(`Invalid date (expected YYYY-MM-DD): ${value}`);
  }

  return value;
}

function formatVideoLine(video: VideoRecord): string {
  const date = video.publishDate ?? "????-??-??";
  const duration = video.durationSec === null ? "?" : formatSeconds(video.durationSec);
  return `${video.videoId} [${video.state}] ${date} ${duration} ${video.channel ?? "-"} | ${video.title ?? "-"}`;
}

function formatSeconds(value: number): string {
  const total = Math.floor(value);
  const minutes = Math.floor(total / 60);
  const seconds = total % 60;
  return `${minutes}:${seconds.toString().padStart(2, "0")}`;
}

function parseInteger(value: string): number {
  const parsed = Number.parseInt(value, 10);

  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new Error(`Invalid integer value: ${value}`);
  }

  return parsed;
}

function parseNumber(value: string): number {
  const parsed = Number.parseFloat(value);

  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new Error(`Invalid number value: ${value}`);
  }

  return parsed;
}

async function readLinesFromFile(path: string): Promise<string[]> {
  const content = await readFile(path, "utf8");

  return content
    .split(/\r?\n/g)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith("#"));
}
