/**
 * Account Search Collector
 *
 * Paginated keyword search against /v3/fbsearch/accounts.
 *
 * Pagination is best-effort: the first failed page ends the search and
 * whatever was gathered so far is kept. Pages may repeat accounts, so the
 * result is deduplicated and capped at maxAccounts.
 */

import type { ApiCredentials, RawAccount } from '../types/index.js';
import { HIKER_API } from '../types/index.js';
import { hikerGet } from './hikerapi.js';
import { deduplicateAccounts } from '../processing/dedup.js';
import { asString, firstPresent, isRecord } from '../processing/normalize.js';
import { logApiError } from '../utils/errorLog.js';
import { logVerbose, logWarning } from '../utils/logger.js';

/**
 * Error-log context for search failures
 */
const SEARCH_CONTEXT = 'fbsearch_accounts_v3';

/**
 * Read the next page token. API versions use either page_token or
 * next_page_token.
 */
export function nextPageToken(page: Record<string, unknown>): string | null {
  return asString(firstPresent(page.page_token, page.next_page_token));
}

/**
 * Search accounts by keyword.
 *
 * @param query - Search keyword
 * @param maxAccounts - Cap on deduplicated accounts
 * @param credentials - API token
 * @returns Deduplicated raw search hits in page order
 */
export async function searchAccounts(
  query: string,
  maxAccounts: number,
  credentials: ApiCredentials
): Promise<RawAccount[]> {
  if (maxAccounts <= 0) {
    return [];
  }

  const candidates: RawAccount[] = [];
  let pageToken: string | null = null;
  let page = 0;

  while (candidates.length < maxAccounts) {
    page++;
    const result = await hikerGet(
      HIKER_API.searchAccounts,
      { query, page_token: pageToken ?? undefined },
      credentials
    );

    if (!result.success) {
      logWarning(`${SEARCH_CONTEXT} failed: ${result.error.message}`);
      await logApiError(SEARCH_CONTEXT, { query, page }, result.error);
      break;
    }

    const res = result.data;
    if (!isRecord(res)) {
      logVerbose(`Search page ${page}: unexpected payload, stopping`);
      break;
    }

    // HikerAPI can return an error payload instead of data
    if (res.state === false) {
      const err = asString(firstPresent(res.error, res.exc_type)) ?? 'Unknown API error';
      logWarning(`API error: ${err}`);
      break;
    }

    const users = Array.isArray(res.users) ? res.users.filter(isRecord) : [];
    candidates.push(...users);
    logVerbose(`Search page ${page}: ${users.length} accounts (${candidates.length} total)`);

    const token = nextPageToken(res);
    if (!res.has_more || !token || token === pageToken) {
      break;
    }
    pageToken = token;
  }

  const deduped = deduplicateAccounts(candidates, maxAccounts);
  logVerbose(
    `Search dedup: kept ${deduped.items.length}, ` +
      `${deduped.duplicatesRemoved} repeats, ${deduped.missingIdRemoved} without id`
  );

  return deduped.items;
}
