import { z } from 'zod';
import { AccountRecordSchema } from './account.js';

/**
 * Column order for the reels CSV.
 */
export const REEL_CSV_FIELDS = [
  'account_id',
  'account_username',
  'media_id',
  'code',
  'taken_at',
  'views',
  'like_count',
  'comment_count',
  'caption_text',
  'permalink',
] as const;

/**
 * ReelRecord Schema - normalized short-video post
 */
export const ReelRecordSchema = z.object({
  /** Upstream media pk, stringified */
  media_id: z.string(),

  /** Shortcode used in the public URL */
  code: z.string().nullable(),

  /** Unix seconds */
  taken_at: z.number().nullable(),

  views: z.number().nullable(),
  like_count: z.number().nullable(),
  comment_count: z.number().nullable(),
  caption_text: z.string().nullable(),
  permalink: z.string().nullable(),

  /** Owning account (foreign key to AccountRecord.id) */
  account_id: z.string(),
  account_username: z.string().nullable(),
});

export type ReelRecord = z.infer<typeof ReelRecordSchema>;

/**
 * One JSONL line: an account paired with its ranked reels
 */
export const AccountWithReelsSchema = z.object({
  account: AccountRecordSchema,
  top_reels: z.array(ReelRecordSchema),
});

export type AccountWithReels = z.infer<typeof AccountWithReelsSchema>;
