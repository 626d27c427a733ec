/**
 * Reels Collector
 *
 * Fetches an account's most recent reels from /v1/user/clips/chunk,
 * following end_cursor until enough reels are collected.
 *
 * Chunk responses come in several shapes:
 * - `[items, nextCursor]` tuple
 * - bare item array (no further pages)
 * - `{ items, end_cursor | next_page_id }` object
 *
 * Items may be wrapped as `{ media: {...} }`; the wrapper is removed.
 */

import type { ApiCredentials, RawReel } from '../types/index.js';
import { HIKER_API, MAX_REEL_PAGES } from '../types/index.js';
import { hikerGet } from './hikerapi.js';
import { asString, firstPresent, isRecord } from '../processing/normalize.js';
import { logApiError } from '../utils/errorLog.js';
import { logVerbose, logWarning } from '../utils/logger.js';

const REELS_CONTEXT = 'user_clips';

/**
 * One parsed page of reels
 */
export interface ReelsChunk {
  items: RawReel[];
  cursor: string | null;
}

/**
 * Keep object items and strip `{ media: ... }` wrappers.
 */
function toReels(items: unknown[]): RawReel[] {
  return items.filter(isRecord).map((item) => (isRecord(item.media) ? item.media : item));
}

/**
 * Parse a chunk response.
 *
 * @returns Parsed page, or null for error payloads and unknown shapes
 */
export function parseReelsChunk(payload: unknown): ReelsChunk | null {
  if (Array.isArray(payload)) {
    if (payload.length === 2 && Array.isArray(payload[0])) {
      return { items: toReels(payload[0]), cursor: asString(payload[1]) };
    }
    return { items: toReels(payload), cursor: null };
  }

  if (!isRecord(payload) || payload.state === false) {
    return null;
  }

  const body = isRecord(payload.response) ? payload.response : payload;
  const items = Array.isArray(body.items) ? body.items : [];
  return {
    items: toReels(items),
    cursor: asString(firstPresent(body.end_cursor, body.next_page_id, payload.end_cursor)),
  };
}

/**
 * Fetch up to `count` recent reels for an account.
 *
 * A failed page ends pagination; reels from earlier pages are kept.
 *
 * @param userId - Account pk
 * @param count - Maximum reels to return (<= 0 returns none)
 * @param credentials - API token
 */
export async function fetchReels(
  userId: string,
  count: number,
  credentials: ApiCredentials
): Promise<RawReel[]> {
  if (count <= 0 || !userId) {
    return [];
  }

  const reels: RawReel[] = [];
  let cursor: string | null = null;

  for (let page = 1; page <= MAX_REEL_PAGES && reels.length < count; page++) {
    const result = await hikerGet(
      HIKER_API.userClipsChunk,
      { user_id: userId, end_cursor: cursor ?? undefined },
      credentials
    );

    if (!result.success) {
      logWarning(`${REELS_CONTEXT} failed for user_id=${userId}: ${result.error.message}`);
      await logApiError(
        REELS_CONTEXT,
        { user_id: userId, requested_count: count, page },
        result.error
      );
      break;
    }

    const chunk = parseReelsChunk(result.data);
    if (!chunk) {
      await logApiError(`${REELS_CONTEXT}_bad_payload`, { user_id: userId, page });
      break;
    }

    reels.push(...chunk.items);
    logVerbose(`Reels for ${userId}: page ${page} gave ${chunk.items.length}`);

    if (chunk.items.length === 0 || !chunk.cursor || chunk.cursor === cursor) {
      break;
    }
    cursor = chunk.cursor;
  }

  return reels.slice(0, count);
}
