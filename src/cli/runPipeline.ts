/**
 * Pipeline Orchestration
 *
 * Runs the two stages in order:
 * 1. Collection - search, profile and reel enrichment, ranking
 * 2. Output - accounts JSONL, accounts CSV, reels CSV
 *
 * The status file is written last on success. Errors propagate to the
 * error handler (errorHandler.ts), wrapped with the stage they came from.
 */

import type {
  ApiCredentials,
  PipelineConfig,
  PipelineResult,
  PipelineStatus,
  RunCounts,
} from '../types/index.js';
import { SCHEMA_VERSION } from '../schemas/index.js';
import { collectAll } from '../collectors/index.js';
import { createOutputWriter, type OutputWriter } from '../utils/fileWriter.js';
import { getErrorLogPath, setErrorLogPath } from '../utils/errorLog.js';
import {
  logStage,
  logSuccess,
  logInfo,
  logVerbose,
  logPipelineResult,
  setVerbose,
} from '../utils/logger.js';
import { PipelineStageError } from './errorHandler.js';

// ============================================
// Helper Functions
// ============================================

/**
 * Create success status for pipeline completion.
 */
function createSuccessStatus(
  config: PipelineConfig,
  startTime: number,
  counts: RunCounts
): PipelineStatus {
  const now = Date.now();
  return {
    schemaVersion: SCHEMA_VERSION,
    success: true,
    startedAt: new Date(startTime).toISOString(),
    completedAt: new Date(now).toISOString(),
    durationMs: now - startTime,
    config,
    counts,
  };
}

/**
 * Run one stage, tagging any failure with the stage name.
 */
async function runStage<T>(stage: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (error instanceof PipelineStageError) throw error;
    throw new PipelineStageError(stage, error instanceof Error ? error : new Error(String(error)));
  }
}

// ============================================
// Main Pipeline Function
// ============================================

/**
 * Options for pipeline execution.
 */
export interface PipelineOptions {
  /** Writer for a pre-created output base. Created from config.outputPrefix when absent. */
  writer?: OutputWriter;
}

/**
 * Execute the full pipeline.
 *
 * @param config - Pipeline configuration
 * @param credentials - API token, kept apart from config so it never reaches the status file
 * @param options - Optional pipeline execution options
 * @returns Pipeline result with counts and output paths
 * @throws PipelineStageError if a stage fails
 */
export async function runPipeline(
  config: PipelineConfig,
  credentials: ApiCredentials,
  options?: PipelineOptions
): Promise<PipelineResult> {
  setVerbose(config.verbose);
  setErrorLogPath(config.errorLogPath);

  const startTime = Date.now();
  const writer = options?.writer ?? (await createOutputWriter(config.outputPrefix));

  logInfo(`Pipeline started for: "${config.query}"`);
  logVerbose(`Output base: ${writer.paths.base}`);
  logVerbose(`API failures go to ${getErrorLogPath()}`);

  // Stage 1: Collection
  const collection = await runStage('collection', () => collectAll(config, credentials));
  const { items } = collection;

  const counts: RunCounts = {
    candidates: collection.candidateCount,
    accounts: items.length,
    reels: items.reduce((sum, item) => sum + item.top_reels.length, 0),
  };

  // Stage 2: Output
  let wroteData = false;
  if (items.length === 0) {
    logInfo('No accounts with reels found.');
  } else {
    logStage('Writing Output');
    await runStage('output', () => writer.writeResults(items));
    wroteData = true;

    logSuccess(`Wrote ${writer.paths.accountsJsonl}`);
    logSuccess(`Wrote ${writer.paths.accountsCsv}`);
    logSuccess(`Wrote ${writer.paths.reelsCsv}`);
  }

  const status = createSuccessStatus(config, startTime, counts);
  await runStage('output', () => writer.writeStatus(status));

  const durationMs = Date.now() - startTime;
  logPipelineResult(true, durationMs, wroteData ? writer.paths.base : writer.paths.status);

  return {
    status,
    outputs: wroteData ? writer.paths : undefined,
    items,
  };
}
