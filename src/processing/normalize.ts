/**
 * Field Normalization
 *
 * Maps upstream account and media payloads onto the fixed AccountRecord
 * and ReelRecord shapes. Upstream API versions disagree on field names
 * (pk vs id, play_count vs view_count, nested edge counts, caption objects),
 * so every field is read through an ordered list of aliases.
 */

import type { AccountRecord, ReelRecord } from '../schemas/index.js';
import type { RawAccount, RawProfile, RawReel, UpstreamRecord } from '../types/index.js';

// ============================================
// Value Helpers
// ============================================

/**
 * Check that a value is a plain JSON object (not null, not an array).
 */
export function isRecord(value: unknown): value is UpstreamRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * A value counts as present unless it is undefined, null or ''.
 * Zero and false are present.
 */
export function isPresent(value: unknown): boolean {
  return value !== undefined && value !== null && value !== '';
}

/**
 * Return the first present value, or undefined.
 */
export function firstPresent(...values: unknown[]): unknown {
  return values.find(isPresent);
}

/**
 * Read a nested field from an object-valued field, e.g. edge_liked_by.count.
 */
function nested(record: UpstreamRecord, field: string, key: string): unknown {
  const inner = record[field];
  return isRecord(inner) ? inner[key] : undefined;
}

/**
 * Non-empty string, else null.
 */
export function asString(value: unknown): string | null {
  return typeof value === 'string' && value.length > 0 ? value : null;
}

/**
 * Upstream ids arrive as numbers or strings; always emit a string.
 * Returns '' when no usable id is present.
 */
export function toId(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  if (typeof value === 'bigint') return value.toString();
  return '';
}

/**
 * Finite number, or a numeric string converted to one; else null.
 */
export function asNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string' && /^-?\d+(\.\d+)?$/.test(value.trim())) {
    return Number(value.trim());
  }
  return null;
}

export function asBoolean(value: unknown): boolean | null {
  return typeof value === 'boolean' ? value : null;
}

/**
 * Normalize a timestamp to Unix seconds.
 *
 * Accepted inputs:
 * - Unix seconds (number or numeric string); fractions are dropped
 * - Unix milliseconds (13+ digits)
 * - ISO 8601 strings
 * - `{ timestamp: ... }` wrappers holding any of the above
 *
 * @returns Unix seconds, or null when the value cannot be read
 */
export function toUnixSeconds(value: unknown): number | null {
  const unwrapped = isRecord(value) ? value.timestamp : value;

  const numeric = asNumber(unwrapped);
  if (numeric !== null) {
    return Math.floor(Math.abs(numeric) >= 1e12 ? numeric / 1000 : numeric);
  }

  if (typeof unwrapped === 'string' && unwrapped.trim().length > 0) {
    const parsed = Date.parse(unwrapped);
    return isNaN(parsed) ? null : Math.floor(parsed / 1000);
  }

  return null;
}

// ============================================
// Account Normalization
// ============================================

/**
 * Surname = last whitespace-separated token of the full name,
 * only when the name has at least two tokens.
 */
export function extractSurname(fullName: string | null): string | null {
  if (fullName === null) return null;
  const parts = fullName.trim().split(/\s+/).filter((p) => p.length > 0);
  return parts.length >= 2 ? parts[parts.length - 1] : null;
}

/**
 * Normalize an account to the stable AccountRecord schema.
 *
 * The fetched profile is the primary source; the search hit fills in
 * identity fields the profile lacks.
 *
 * @param raw - Account entry from search
 * @param profile - Unwrapped profile, or null when the fetch failed
 */
export function normalizeProfile(raw: RawAccount, profile: RawProfile | null): AccountRecord {
  const src = profile ?? raw;
  const fullName = asString(firstPresent(src.full_name, raw.full_name));

  return {
    id: toId(firstPresent(src.pk, raw.pk, src.id, raw.id)),
    username: asString(firstPresent(src.username, raw.username)),
    full_name: fullName,
    surname: extractSurname(fullName),
    biography: asString(src.biography),
    external_url: asString(src.external_url),
    follower_count: asNumber(src.follower_count),
    following_count: asNumber(src.following_count),
    media_count: asNumber(src.media_count),
    is_verified: asBoolean(src.is_verified),
    is_private: asBoolean(src.is_private),
  };
}

// ============================================
// Reel Normalization
// ============================================

/**
 * Extract caption text from the flat field, a caption string, or a
 * caption object.
 */
function extractCaption(raw: RawReel): string | null {
  if (isPresent(raw.caption_text)) {
    return asString(raw.caption_text);
  }

  const caption = raw.caption;
  if (typeof caption === 'string') {
    return asString(caption);
  }
  if (isRecord(caption)) {
    return asString(firstPresent(caption.text, caption.caption_text));
  }
  return null;
}

/**
 * Media id as a string.
 *
 * A numeric pk past 2^53 has already lost digits in JSON.parse; the string
 * id ("<pk>_<owner>") still carries the exact value.
 */
export function extractMediaId(raw: RawReel): string {
  if (typeof raw.pk === 'number' && !Number.isSafeInteger(raw.pk) && typeof raw.id === 'string') {
    const exact = raw.id.split('_')[0];
    if (/^\d+$/.test(exact)) {
      return exact;
    }
  }
  return toId(firstPresent(raw.pk, raw.id));
}

/**
 * Build the public reel URL. Requires both shortcode and account username.
 */
export function buildPermalink(code: string | null, accountUsername: string | null): string | null {
  return code && accountUsername ? `https://www.instagram.com/reel/${code}/` : null;
}

/**
 * Normalize a media item to the stable ReelRecord schema.
 *
 * @param raw - Media entry from the reels endpoint
 * @param accountId - Owning account id
 * @param accountUsername - Owning account username
 */
export function normalizeClip(
  raw: RawReel,
  accountId: string,
  accountUsername: string | null
): ReelRecord {
  const code = asString(firstPresent(raw.code, raw.shortcode));

  return {
    media_id: extractMediaId(raw),
    code,
    taken_at: toUnixSeconds(firstPresent(raw.taken_at, raw.taken_at_timestamp, raw.timestamp)),
    views: asNumber(firstPresent(raw.play_count, raw.view_count, raw.video_view_count)),
    like_count: asNumber(firstPresent(raw.like_count, nested(raw, 'edge_liked_by', 'count'))),
    comment_count: asNumber(
      firstPresent(raw.comment_count, nested(raw, 'edge_media_to_comment', 'count'))
    ),
    caption_text: extractCaption(raw),
    permalink: buildPermalink(code, accountUsername),
    account_id: accountId,
    account_username: accountUsername,
  };
}
