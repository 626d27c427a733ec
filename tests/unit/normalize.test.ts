/**
 * Normalization Unit Tests
 *
 * Tests for the value helpers and the AccountRecord / ReelRecord mappers.
 */

import { describe, it, expect } from 'vitest';
import {
  isRecord,
  isPresent,
  firstPresent,
  asNumber,
  toId,
  toUnixSeconds,
  extractSurname,
  normalizeProfile,
  normalizeClip,
  buildPermalink,
} from '../../src/processing/normalize.js';
import { AccountRecordSchema, ReelRecordSchema } from '../../src/schemas/index.js';

// ============================================
// Value Helpers
// ============================================

describe('isPresent / firstPresent', () => {
  it('treats zero and false as present', () => {
    expect(isPresent(0)).toBe(true);
    expect(isPresent(false)).toBe(true);
  });

  it('treats undefined, null and empty string as absent', () => {
    expect(isPresent(undefined)).toBe(false);
    expect(isPresent(null)).toBe(false);
    expect(isPresent('')).toBe(false);
  });

  it('returns the first present value', () => {
    expect(firstPresent(undefined, null, '', 0, 5)).toBe(0);
    expect(firstPresent(undefined, null)).toBeUndefined();
  });
});

describe('asNumber', () => {
  it('accepts finite numbers and numeric strings', () => {
    expect(asNumber(42)).toBe(42);
    expect(asNumber('1500')).toBe(1500);
    expect(asNumber(' 2.5 ')).toBe(2.5);
  });

  it('rejects everything else', () => {
    expect(asNumber(NaN)).toBeNull();
    expect(asNumber(Infinity)).toBeNull();
    expect(asNumber('12k')).toBeNull();
    expect(asNumber(true)).toBeNull();
    expect(asNumber(undefined)).toBeNull();
  });
});

describe('toId', () => {
  it('stringifies numeric ids', () => {
    expect(toId(123456789)).toBe('123456789');
    expect(toId(BigInt('9007199254740993'))).toBe('9007199254740993');
  });

  it('keeps string ids and returns empty string otherwise', () => {
    expect(toId('987')).toBe('987');
    expect(toId(undefined)).toBe('');
    expect(toId({})).toBe('');
  });
});

describe('toUnixSeconds', () => {
  it('keeps Unix seconds', () => {
    expect(toUnixSeconds(1700000000)).toBe(1700000000);
    expect(toUnixSeconds('1700000000')).toBe(1700000000);
  });

  it('converts milliseconds to seconds', () => {
    expect(toUnixSeconds(1700000000123)).toBe(1700000000);
  });

  it('drops fractional seconds', () => {
    expect(toUnixSeconds(1700000000.5)).toBe(1700000000);
    expect(toUnixSeconds('1700000000.75')).toBe(1700000000);
  });

  it('parses ISO strings', () => {
    expect(toUnixSeconds('2023-11-14T22:13:20Z')).toBe(1700000000);
  });

  it('unwraps { timestamp } objects', () => {
    expect(toUnixSeconds({ timestamp: 1700000000 })).toBe(1700000000);
  });

  it('returns null for unreadable values', () => {
    expect(toUnixSeconds('not a date')).toBeNull();
    expect(toUnixSeconds(null)).toBeNull();
    expect(toUnixSeconds({})).toBeNull();
  });
});

describe('extractSurname', () => {
  it('returns the last token of a multi-word name', () => {
    expect(extractSurname('Ana Maria  Lopez ')).toBe('Lopez');
  });

  it('returns null for single-word or missing names', () => {
    expect(extractSurname('Ana')).toBeNull();
    expect(extractSurname('   ')).toBeNull();
    expect(extractSurname(null)).toBeNull();
  });
});

// ============================================
// normalizeProfile
// ============================================

describe('normalizeProfile', () => {
  const rawHit = { pk: 111, username: 'chef_ana', full_name: 'Ana Lopez' };

  it('maps a full profile', () => {
    const profile = {
      pk: '111',
      username: 'chef_ana',
      full_name: 'Ana Lopez',
      biography: 'Street food every day',
      external_url: 'https://example.com',
      follower_count: 5400,
      following_count: 120,
      media_count: 310,
      is_verified: false,
      is_private: false,
    };

    const account = normalizeProfile(rawHit, profile);

    expect(account).toEqual({
      id: '111',
      username: 'chef_ana',
      full_name: 'Ana Lopez',
      surname: 'Lopez',
      biography: 'Street food every day',
      external_url: 'https://example.com',
      follower_count: 5400,
      following_count: 120,
      media_count: 310,
      is_verified: false,
      is_private: false,
    });
    expect(AccountRecordSchema.safeParse(account).success).toBe(true);
  });

  it('fills identity fields from the search hit', () => {
    const account = normalizeProfile(rawHit, { follower_count: 10 });

    expect(account.id).toBe('111');
    expect(account.username).toBe('chef_ana');
    expect(account.full_name).toBe('Ana Lopez');
    expect(account.surname).toBe('Lopez');
    expect(account.biography).toBeNull();
  });

  it('falls back to the search hit when there is no profile', () => {
    const account = normalizeProfile({ id: 222, username: 'solo', follower_count: 7 }, null);

    expect(account.id).toBe('222');
    expect(account.username).toBe('solo');
    expect(account.full_name).toBeNull();
    expect(account.surname).toBeNull();
    expect(account.follower_count).toBe(7);
  });

  it('keeps zero counts', () => {
    const account = normalizeProfile(rawHit, { pk: 111, follower_count: 0 });
    expect(account.follower_count).toBe(0);
  });
});

// ============================================
// normalizeClip
// ============================================

describe('buildPermalink', () => {
  it('needs both code and username', () => {
    expect(buildPermalink('Cx1', 'chef_ana')).toBe('https://www.instagram.com/reel/Cx1/');
    expect(buildPermalink(null, 'chef_ana')).toBeNull();
    expect(buildPermalink('Cx1', null)).toBeNull();
  });
});

describe('normalizeClip', () => {
  it('maps a v1 clip', () => {
    const reel = normalizeClip(
      {
        pk: 3001,
        code: 'Cx1',
        taken_at: 1700000000,
        play_count: 9000,
        like_count: 300,
        comment_count: 12,
        caption_text: 'Tacos',
      },
      '111',
      'chef_ana'
    );

    expect(reel).toEqual({
      media_id: '3001',
      code: 'Cx1',
      taken_at: 1700000000,
      views: 9000,
      like_count: 300,
      comment_count: 12,
      caption_text: 'Tacos',
      permalink: 'https://www.instagram.com/reel/Cx1/',
      account_id: '111',
      account_username: 'chef_ana',
    });
    expect(ReelRecordSchema.safeParse(reel).success).toBe(true);
  });

  it('reads alternate field names', () => {
    const reel = normalizeClip(
      {
        id: 'm-2',
        shortcode: 'Cy2',
        taken_at_timestamp: 1700000000000,
        video_view_count: 450,
        edge_liked_by: { count: 40 },
        edge_media_to_comment: { count: 3 },
        caption: { text: 'Noodles' },
      },
      '111',
      'chef_ana'
    );

    expect(reel.media_id).toBe('m-2');
    expect(reel.code).toBe('Cy2');
    expect(reel.taken_at).toBe(1700000000);
    expect(reel.views).toBe(450);
    expect(reel.like_count).toBe(40);
    expect(reel.comment_count).toBe(3);
    expect(reel.caption_text).toBe('Noodles');
    expect(reel.permalink).toBe('https://www.instagram.com/reel/Cy2/');
  });

  it('prefers play_count over view_count, even when zero', () => {
    const reel = normalizeClip({ pk: 1, play_count: 0, view_count: 99 }, '111', 'chef_ana');
    expect(reel.views).toBe(0);
  });

  it('accepts a plain caption string', () => {
    const reel = normalizeClip({ pk: 1, caption: 'Dumplings' }, '111', 'chef_ana');
    expect(reel.caption_text).toBe('Dumplings');
  });

  it('keeps every digit of a media id beyond 2^53', () => {
    const raw: unknown = JSON.parse('{"pk":3256789012345678901,"id":"3256789012345678901_42"}');
    if (!isRecord(raw)) throw new Error('bad fixture');

    expect(normalizeClip(raw, '42', 'tester').media_id).toBe('3256789012345678901');
  });

  it('leaves missing fields null', () => {
    const reel = normalizeClip({ pk: 1 }, '111', null);

    expect(reel.code).toBeNull();
    expect(reel.taken_at).toBeNull();
    expect(reel.views).toBeNull();
    expect(reel.like_count).toBeNull();
    expect(reel.comment_count).toBeNull();
    expect(reel.caption_text).toBeNull();
    expect(reel.permalink).toBeNull();
    expect(reel.account_username).toBeNull();
  });
});
