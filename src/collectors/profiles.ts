/**
 * Profile Collector
 *
 * Fetches a full profile by account id from /v2/user/by/id.
 *
 * v2 responses are usually wrapped ({ state: true, user: {...} }), some
 * come back as { data: {...} } or already flat. The collector always hands
 * back the inner profile object.
 */

import type { ApiCredentials, RawAccount, RawProfile } from '../types/index.js';
import { HIKER_API } from '../types/index.js';
import { hikerGet } from './hikerapi.js';
import { accountKey } from '../processing/dedup.js';
import { asString, isRecord } from '../processing/normalize.js';
import { logApiError } from '../utils/errorLog.js';
import { logWarning } from '../utils/logger.js';

const PROFILE_CONTEXT = 'user_by_id_v2';

/**
 * Unwrap a profile response envelope.
 *
 * @returns The inner profile, or null for error payloads and non-objects
 */
export function unwrapProfile(payload: unknown): RawProfile | null {
  if (!isRecord(payload)) {
    return null;
  }
  if (payload.state === false) {
    return null;
  }

  const inner = payload.user ?? payload.data ?? payload;
  return isRecord(inner) ? inner : null;
}

/**
 * Fetch the full profile for a search hit.
 *
 * @param rawUser - Account entry from search
 * @param credentials - API token
 * @returns Unwrapped profile, or null when it could not be fetched
 */
export async function fetchProfile(
  rawUser: RawAccount,
  credentials: ApiCredentials
): Promise<RawProfile | null> {
  const pk = accountKey(rawUser);
  if (!pk) {
    return null;
  }

  const result = await hikerGet(HIKER_API.userById, { id: pk }, credentials);

  if (!result.success) {
    logWarning(`${PROFILE_CONTEXT} failed for pk=${pk}: ${result.error.message}`);
    await logApiError(
      PROFILE_CONTEXT,
      { pk, username: asString(rawUser.username) },
      result.error
    );
    return null;
  }

  const payload = result.data;
  if (isRecord(payload) && payload.state === false) {
    // API-level error, e.g. insufficient funds or not found
    await logApiError(`${PROFILE_CONTEXT}_state_false`, { pk, payload });
    return null;
  }

  return unwrapProfile(payload);
}
