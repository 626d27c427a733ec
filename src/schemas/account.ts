import { z } from 'zod';

/**
 * Schema Version - stamped on status files for backwards compatibility
 */
export const SCHEMA_VERSION = '1.0.0' as const;

/**
 * Column order for the accounts CSV.
 * Also the key order of every AccountRecord.
 */
export const ACCOUNT_CSV_FIELDS = [
  'id',
  'username',
  'full_name',
  'surname',
  'biography',
  'external_url',
  'follower_count',
  'following_count',
  'media_count',
  'is_verified',
  'is_private',
] as const;

/**
 * AccountRecord Schema - normalized Instagram account
 *
 * Built from the profile response when one was fetched, falling back to the
 * search hit. Every field except `id` may be null when upstream omits it.
 */
export const AccountRecordSchema = z.object({
  /** Upstream primary key (pk), stringified */
  id: z.string(),

  username: z.string().nullable(),
  full_name: z.string().nullable(),

  /** Last token of full_name, only when full_name has two or more tokens */
  surname: z.string().nullable(),

  biography: z.string().nullable(),
  external_url: z.string().nullable(),

  follower_count: z.number().nullable(),
  following_count: z.number().nullable(),
  media_count: z.number().nullable(),

  is_verified: z.boolean().nullable(),
  is_private: z.boolean().nullable(),
});

export type AccountRecord = z.infer<typeof AccountRecordSchema>;
