/**
 * Ranking
 *
 * Deterministic ordering of reels within an account and of accounts
 * within a run. Both sorts are stable, so equal keys keep input order.
 */

import type { AccountWithReels, ReelRecord } from '../schemas/index.js';

/**
 * View count used for ranking; missing or non-numeric views rank as 0.
 */
function viewsKey(reel: ReelRecord): number {
  return typeof reel.views === 'number' && Number.isFinite(reel.views) ? reel.views : 0;
}

/**
 * Recency used for tie-breaks; anything but an integer timestamp ranks as 0.
 */
function recencyKey(reel: ReelRecord): number {
  return typeof reel.taken_at === 'number' && Number.isInteger(reel.taken_at) ? reel.taken_at : 0;
}

/**
 * Compare two reels: views descending, then taken_at descending.
 */
export function compareReels(a: ReelRecord, b: ReelRecord): number {
  const byViews = viewsKey(b) - viewsKey(a);
  if (byViews !== 0) return byViews;
  return recencyKey(b) - recencyKey(a);
}

/**
 * Select the top K reels.
 *
 * @param reels - Normalized reels of one account
 * @param k - Number of reels to keep (<= 0 keeps none)
 * @returns New array, best first
 */
export function selectTopK(reels: readonly ReelRecord[], k: number): ReelRecord[] {
  if (k <= 0) return [];
  return [...reels].sort(compareReels).slice(0, k);
}

/**
 * Order results by follower count, largest first; unknown counts rank as 0.
 */
export function sortByFollowers(results: readonly AccountWithReels[]): AccountWithReels[] {
  return [...results].sort(
    (a, b) => (b.account.follower_count ?? 0) - (a.account.follower_count ?? 0)
  );
}
