/**
 * Collector Orchestrator
 *
 * Main entry point for the collection stage:
 * search → per-account profile + reels (bounded concurrency) → normalize → top-K.
 *
 * Each account is independent; a failed account is skipped and the rest
 * of the run continues.
 */

import type {
  ApiCredentials,
  AccountWithReels,
  CollectionResult,
  PipelineConfig,
  RawAccount,
} from '../types/index.js';
import { searchAccounts } from './accounts.js';
import { fetchProfile } from './profiles.js';
import { fetchReels } from './reels.js';
import {
  accountKey,
  asString,
  normalizeClip,
  normalizeProfile,
  selectTopK,
  sortByFollowers,
} from '../processing/index.js';
import { processWithConcurrency } from '../utils/concurrency.js';
import {
  logInfo,
  logProgress,
  logStage,
  logSuccess,
  logVerbose,
  logWarning,
} from '../utils/logger.js';

// ============================================
// Per-account Enrichment
// ============================================

/**
 * Enrich one search hit: fetch profile and reels, normalize, rank.
 *
 * @returns The account with its top reels, or null when no profile was found
 */
export async function enrichAccount(
  raw: RawAccount,
  config: Pick<PipelineConfig, 'recentReels' | 'topK'>,
  credentials: ApiCredentials
): Promise<AccountWithReels | null> {
  const pk = accountKey(raw);
  const username = asString(raw.username) ?? '(unknown)';
  logInfo(`Processing ${username} (pk=${pk})`);

  const profile = await fetchProfile(raw, credentials);
  if (!profile) {
    logWarning(`Skipping ${username}: no profile`);
    return null;
  }

  const account = normalizeProfile(raw, profile);
  const clips = await fetchReels(account.id, config.recentReels, credentials);
  const reels = clips.map((clip) => normalizeClip(clip, account.id, account.username));
  const topReels = selectTopK(reels, config.topK);

  logVerbose(`${username}: ${clips.length} reels fetched, ${topReels.length} kept`);

  return { account, top_reels: topReels };
}

// ============================================
// Main Export
// ============================================

/**
 * Run search and per-account enrichment.
 *
 * @param config - Pipeline configuration
 * @param credentials - API token
 * @returns Accounts with top reels, ordered by follower count
 */
export async function collectAll(
  config: PipelineConfig,
  credentials: ApiCredentials
): Promise<CollectionResult> {
  logStage('Account Search');
  logInfo(`Searching accounts for '${config.query}' ...`);

  const candidates = await searchAccounts(config.query, config.maxAccounts, credentials);
  logInfo(`Found ${candidates.length} candidate accounts`);

  logStage('Profile & Reel Enrichment');
  const enriched = await processWithConcurrency(
    candidates,
    (raw) => enrichAccount(raw, config, credentials),
    config.concurrency,
    (done, total) => logProgress(done, total)
  );

  const items = sortByFollowers(
    enriched.filter((item): item is AccountWithReels => item !== null)
  );
  const skippedCount = candidates.length - items.length;

  logSuccess(
    `Collected ${items.length} accounts` +
      (skippedCount > 0 ? ` (${skippedCount} skipped without profile)` : '')
  );

  return {
    items,
    candidateCount: candidates.length,
    skippedCount,
  };
}

export { searchAccounts } from './accounts.js';
export { fetchProfile, unwrapProfile } from './profiles.js';
export { fetchReels, parseReelsChunk } from './reels.js';
