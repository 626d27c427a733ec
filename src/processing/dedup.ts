/**
 * Account Deduplication
 *
 * Search pages can repeat accounts. Accounts are keyed by their upstream
 * primary key (pk, falling back to id); the first occurrence wins and
 * keeps its position.
 */

import type { RawAccount } from '../types/index.js';
import { firstPresent, toId } from './normalize.js';
import { logVerbose } from '../utils/logger.js';

// ============================================
// Types
// ============================================

/**
 * Result of deduplication with metadata
 */
export interface DeduplicationResult {
  /** Deduplicated accounts in first-seen order */
  items: RawAccount[];
  /** Entries dropped because their key was already seen */
  duplicatesRemoved: number;
  /** Entries dropped because they carried no pk or id */
  missingIdRemoved: number;
}

// ============================================
// Deduplication Functions
// ============================================

/**
 * Get the dedup key of a search hit: String(pk ?? id), or '' when absent.
 */
export function accountKey(account: RawAccount): string {
  return toId(firstPresent(account.pk, account.id));
}

/**
 * Deduplicate search hits by account key and cap the result.
 *
 * @param accounts - Raw search hits in page order
 * @param limit - Maximum accounts to keep (<= 0 keeps none)
 */
export function deduplicateAccounts(accounts: RawAccount[], limit: number): DeduplicationResult {
  const seen = new Set<string>();
  const items: RawAccount[] = [];
  let duplicatesRemoved = 0;
  let missingIdRemoved = 0;

  for (const account of accounts) {
    if (items.length >= limit) break;

    const key = accountKey(account);
    if (!key) {
      missingIdRemoved++;
      continue;
    }
    if (seen.has(key)) {
      duplicatesRemoved++;
      logVerbose(`Dedup: dropping repeated account ${key}`);
      continue;
    }

    seen.add(key);
    items.push(account);
  }

  return { items, duplicatesRemoved, missingIdRemoved };
}
