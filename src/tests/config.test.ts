import { describe, expect, it } from "vitest";
import { DEFAULT_BATCH_DELAY_MS, DEFAULT_INDEX_PATH, DEFAULT_LEDGER_PATH, loadArchiveConfig } from "@/lib/config";

describe("loadArchiveConfig", () => {
  it("falls back to defaults", () => {
    expect(loadArchiveConfig({})).toEqual({
      target: "local",
      ledgerPath: DEFAULT_LEDGER_PATH,
      indexPath: DEFAULT_INDEX_PATH,
      fetchTimeoutMs: 30_000,
      stopwords: "none",
      autoApproveChannels: [],
      maxRetries: 4,
      retryBaseMs: 250,
      batchDelayMs: DEFAULT_BATCH_DELAY_MS,
    });
  });

  it("reads every variable", () => {
    const config = loadArchiveConfig({
      ARCHIVE_TARGET: "prod",
      ARCHIVE_LEDGER_PATH: "/tmp/ledger.json",
      ARCHIVE_INDEX_PATH: "/tmp/index.json",
      ARCHIVE_FETCH_TIMEOUT_MS: "5000",
      ARCHIVE_STOPWORDS: "english",
      ARCHIVE_AUTO_APPROVE_CHANNELS: " Kitchen , ,Garage ",
      ARCHIVE_MAX_RETRIES: "0",
      ARCHIVE_RETRY_BASE_MS: "10",
      ARCHIVE_BATCH_DELAY_MS: "0",
    });

    expect(config).toEqual({
      target: "prod",
      ledgerPath: "/tmp/ledger.json",
      indexPath: "/tmp/index.json",
      fetchTimeoutMs: 5000,
      stopwords: "english",
      autoApproveChannels: ["Kitchen", "Garage"],
      maxRetries: 0,
      retryBaseMs: 10,
      batchDelayMs: 0,
    });
  });

  it("rejects invalid values", () => {
    expect(() => loadArchiveConfig({ ARCHIVE_TARGET: "staging" })).toThrow(
      "Invalid ARCHIVE_TARGET: staging (expected one of local, prod)",
    );
    expect(() => loadArchiveConfig({ ARCHIVE_FETCH_TIMEOUT_MS: "0" })).toThrow(
      "Invalid ARCHIVE_FETCH_TIMEOUT_MS: must be greater than zero",
    );
    expect(() => loadArchiveConfig({ ARCHIVE_MAX_RETRIES: "-1" })).toThrow("Invalid ARCHIVE_MAX_RETRIES: -1");
  });
});
