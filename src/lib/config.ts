import { config as loadDotEnv } from "dotenv";
import type { SupabaseTarget } from "@/lib/db/supabase-admin";
import type { StopwordPolicy } from "@/lib/pipeline/keywords";

export type ArchiveConfig = {
  target: SupabaseTarget;
  ledgerPath: string;
  indexPath: string;
  fetchTimeoutMs: number;
  stopwords: StopwordPolicy;
  autoApproveChannels: string[];
  maxRetries: number;
  retryBaseMs: number;
  batchDelayMs: number;
};

export const DEFAULT_LEDGER_PATH = ".cache/dedup-ledger.json";
export const DEFAULT_INDEX_PATH = ".cache/search-index.json";
export const DEFAULT_FETCH_TIMEOUT_MS = 30_000;
// Five fetches a minute.
export const DEFAULT_BATCH_DELAY_MS = 12_000;

let envLoaded = false;

/** Loads `.env.local` first so its values win over `.env`; runs once per process. */
export function ensureEnvLoaded(): void {
  if (envLoaded) {
    return;
  }

  loadDotEnv({ path: ".env.local" });
  loadDotEnv();
  envLoaded = true;
}

export function requireEnv(name: string): string {
  const value = process.env[name];

  if (!value) {
    throw new Error(`Missing required environment variable: ${name}`);
  }

  return value;
}

export function loadArchiveConfig(env: NodeJS.ProcessEnv = process.env): ArchiveConfig {
  return {
    target: parseChoice(env, "ARCHIVE_TARGET", ["local", "prod"], "local"),
    ledgerPath: readString(env, "ARCHIVE_LEDGER_PATH") ?? DEFAULT_LEDGER_PATH,
    indexPath: readString(env, "ARCHIVE_INDEX_PATH") ?? DEFAULT_INDEX_PATH,
    fetchTimeoutMs: parsePositiveInteger(env, "ARCHIVE_FETCH_TIMEOUT_MS", DEFAULT_FETCH_TIMEOUT_MS),
    stopwords: parseChoice(env, "ARCHIVE_STOPWORDS", ["none", "english"], "none"),
    autoApproveChannels: parseList(readString(env, "ARCHIVE_AUTO_APPROVE_CHANNELS")),
    maxRetries: parseNonNegativeInteger(env, "ARCHIVE_MAX_RETRIES", 4),
    retryBaseMs: parseNonNegativeInteger(env, "ARCHIVE_RETRY_BASE_MS", 250),
    batchDelayMs: parseNonNegativeInteger(env, "ARCHIVE_BATCH_DELAY_MS", DEFAULT_BATCH_DELAY_MS),
  };
}

function readString(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function parseChoice<T extends string>(env: NodeJS.ProcessEnv, name: string, choices: readonly T[], fallback: T): T {
  const value = readString(env, name);

  if (value === undefined) {
    return fallback;
  }

  const match = choices.find((choice) => choice === value);
  if (!match) {
    throw new Error(`Invalid ${name}: ${value} (expected one of ${choices.join(", ")})`);
  }

  return match;
}

function parsePositiveInteger(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const parsed = parseNonNegativeInteger(env, name, fallback);

  if (parsed === 0) {
    throw new Error(`Invalid ${name}: must be greater than zero`);
  }

  return parsed;
}

function parseNonNegativeInteger(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const value = readString(env, name);

  if (value === undefined) {
    return fallback;
  }

  if (!/^\d+$/.test(value)) {
    throw new Error(`Invalid ${name}: ${value}`);
  }

  return Number.parseInt(value, 10);
}

function parseList(value: string | undefined): string[] {
  if (!value) {
    return [];
  }

  return value
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);
}
