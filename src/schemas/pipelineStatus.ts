import { z } from 'zod';
import { SCHEMA_VERSION } from './account.js';

/**
 * Pipeline Status Schema
 *
 * Validates <base>_status.json output for debugging runs after the fact.
 * The resolved config is stored in full; the API token is never part of it.
 */

// ============================================
// Pipeline Config Schema
// ============================================

export const PipelineConfigSchema = z.object({
  /** Search keyword */
  query: z.string().min(1),

  /** Cap on deduplicated search hits */
  maxAccounts: z.number().int().min(0),

  /** Reels fetched per account before ranking */
  recentReels: z.number().int().min(0),

  /** Reels kept per account after ranking */
  topK: z.number().int().min(0),

  /** Output path prefix (extension stripped) */
  outputPrefix: z.string().min(1),

  /** Accounts enriched in parallel */
  concurrency: z.number().int().positive(),

  /** JSONL file that receives API failure records */
  errorLogPath: z.string().min(1),

  /** Pipeline timeout in seconds */
  timeoutSeconds: z.number().int().positive(),

  verbose: z.boolean(),
  dryRun: z.boolean(),
});

// ============================================
// Run Counts
// ============================================

export const RunCountsSchema = z.object({
  /** Accounts returned by search after dedup */
  candidates: z.number().int().min(0),
  /** Accounts written (profile fetched) */
  accounts: z.number().int().min(0),
  /** Reels written across all accounts */
  reels: z.number().int().min(0),
});

export type RunCounts = z.infer<typeof RunCountsSchema>;

// ============================================
// Pipeline Status Schema
// ============================================

export const PipelineStatusSchema = z.object({
  schemaVersion: z.literal(SCHEMA_VERSION),
  success: z.boolean(),
  startedAt: z.string().datetime(),
  completedAt: z.string().datetime().optional(),
  durationMs: z.number().int().min(0).optional(),
  /** Stage that was running when the pipeline failed */
  stage: z.string().optional(),
  error: z.string().optional(),
  config: PipelineConfigSchema,
  counts: RunCountsSchema.optional(),
});

/**
 * Pipeline status for <base>_status.json
 */
export type PipelineStatus = z.infer<typeof PipelineStatusSchema>;
