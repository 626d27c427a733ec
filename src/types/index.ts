/**
 * Type Definitions
 *
 * Re-exports all Zod-inferred types from schemas
 * and defines pipeline configuration interfaces.
 */

// ============================================
// Re-export all schema types
// ============================================

export type {
  AccountRecord,
  ReelRecord,
  AccountWithReels,
  RunCounts,
  PipelineStatus,
} from '../schemas/index.js';

import type { AccountWithReels, PipelineStatus } from '../schemas/index.js';

// ============================================
// Upstream Payloads
// ============================================

/**
 * Any JSON object returned by the upstream API.
 * Field sets vary between API versions, so values stay unknown until normalized.
 */
export type UpstreamRecord = Record<string, unknown>;

/** Account entry from the search endpoint */
export type RawAccount = UpstreamRecord;

/** Unwrapped profile from the profile endpoint */
export type RawProfile = UpstreamRecord;

/** Media entry from the reels endpoint */
export type RawReel = UpstreamRecord;

// ============================================
// Pipeline Configuration
// ============================================

/**
 * Pipeline configuration - parsed from CLI options
 */
export interface PipelineConfig {
  /** Search keyword */
  query: string;

  /** Maximum accounts kept from search (after dedup) */
  maxAccounts: number;

  /** Recent reels fetched per account */
  recentReels: number;

  /** Reels kept per account after ranking */
  topK: number;

  /** Output path prefix; any extension is stripped */
  outputPrefix: string;

  /** Accounts enriched in parallel */
  concurrency: number;

  /** JSONL file that receives API failure records */
  errorLogPath: string;

  /** Pipeline timeout in seconds */
  timeoutSeconds: number;

  /** Enable verbose logging */
  verbose: boolean;

  /** Validate config and exit without running pipeline */
  dryRun: boolean;
}

/**
 * Default configuration values.
 * `query` has no default; the CLI requires it.
 */
export const DEFAULT_CONFIG: PipelineConfig = {
  query: '',
  maxAccounts: 200,
  recentReels: 50,
  topK: 10,
  outputPrefix: 'outputs/instagram_accounts',
  concurrency: 10,
  errorLogPath: 'error_log.jsonl',
  timeoutSeconds: 1800,
  verbose: false,
  dryRun: false,
};

/**
 * API credentials, kept apart from PipelineConfig so they never reach
 * the status file.
 */
export interface ApiCredentials {
  token: string;
}

// ============================================
// Pipeline Result Types
// ============================================

/**
 * Paths of the files written by one run
 */
export interface OutputPaths {
  base: string;
  accountsJsonl: string;
  accountsCsv: string;
  reelsCsv: string;
  status: string;
}

/**
 * Collection stage result
 */
export interface CollectionResult {
  /** Accounts with ranked reels, ordered by follower count */
  items: AccountWithReels[];
  /** Search hits after dedup, before profile enrichment */
  candidateCount: number;
  /** Search hits skipped because no profile could be fetched */
  skippedCount: number;
}

/**
 * Complete pipeline result
 */
export interface PipelineResult {
  status: PipelineStatus;
  /** Undefined when nothing was found and no data files were written */
  outputs?: OutputPaths;
  items: AccountWithReels[];
}

// ============================================
// API Settings
// ============================================

/**
 * HikerAPI REST endpoints
 */
export const HIKER_API = {
  baseUrl: 'https://api.hikerapi.com',
  searchAccounts: '/v3/fbsearch/accounts',
  userById: '/v2/user/by/id',
  userClipsChunk: '/v1/user/clips/chunk',
} as const;

/**
 * Per-request timeout in milliseconds
 */
export const API_REQUEST_TIMEOUT_MS = 30000;

/**
 * Upper bound on reel pages per account, in case upstream keeps handing out cursors
 */
export const MAX_REEL_PAGES = 50;
