import { createTranscriptArchive, type TranscriptArchive } from "@/lib/archive/transcript-archive";
import type { ArchiveConfig } from "@/lib/config";
import { getSupabaseAdminClient } from "@/lib/db/supabase-admin";
import { createSupabaseArchiveStore } from "@/lib/db/supabase-archive-store";
import { IndexSnapshotError, describeError } from "@/lib/pipeline/errors";
import { approveChannels } from "@/lib/pipeline/ingest/auto-approval";
import { loadDedupLedger } from "@/lib/pipeline/ingest/dedup-ledger";
import { resolveStopwords } from "@/lib/pipeline/keywords";
import { createYoutubeTranscriptSupplier } from "@/lib/pipeline/transcript/fetch-transcript";
import type { TranscriptSupplier } from "@/lib/pipeline/transcript/supplier";
import type { Logger } from "@/lib/pipeline/types";
import { rebuildSearchIndex } from "@/lib/search/index-maintenance";
import { createSnapshotWriter, readIndexSnapshot } from "@/lib/search/index-snapshot";
import { SearchIndex } from "@/lib/search/search-index";

type OpenArchiveOptions = {
  logger?: Logger;
  supplier?: TranscriptSupplier;
};

/**
 * Wires the Supabase stores, the ledger file and the index snapshot for `config`.
 * A missing or unreadable snapshot is replaced by a rebuild from the approved corpus.
 */
export async function openTranscriptArchive(
  config: ArchiveConfig,
  options: OpenArchiveOptions = {},
): Promise<TranscriptArchive> {
  const logger = options.logger ?? (() => undefined);
  const store = createSupabaseArchiveStore(getSupabaseAdminClient(config.target), {
    maxRetries: config.maxRetries,
    baseDelayMs: config.retryBaseMs,
    onRetry: (attempt, error, delayMs) =>
      logger(`[retry] attempt=${attempt} delay=${delayMs}ms ${describeError(error)}`),
  });
  const ledger = await loadDedupLedger(config.ledgerPath);
  const index = new SearchIndex({ stopwords: resolveStopwords(config.stopwords) });
  const persistIndex = createSnapshotWriter(index, config.indexPath);

  let loaded = false;
  try {
    loaded = await readIndexSnapshot(index, config.indexPath);
  } catch (error) {
    if (!(error instanceof IndexSnapshotError)) {
      throw error;
    }

    logger(`[index-inconsistency] ${error.message}; rebuilding`);
  }

  if (!loaded) {
    await rebuildSearchIndex(index, store, logger);
    await persistIndex();
  }

  return createTranscriptArchive({
    store,
    ledger,
    supplier: options.supplier ?? createYoutubeTranscriptSupplier(),
    index,
    autoApprove: approveChannels(config.autoApproveChannels),
    fetchTimeoutMs: config.fetchTimeoutMs,
    fetchRetries: config.maxRetries,
    fetchRetryBaseMs: config.retryBaseMs,
    batchDelayMs: config.batchDelayMs,
    logger,
    persistIndex,
  });
}
