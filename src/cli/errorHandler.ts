/**
 * CLI Error Handler
 *
 * Provides error handling utilities for the CLI pipeline execution.
 * Handles error logging, status file writing, and exit code management.
 */

import type { PipelineConfig, PipelineStatus } from '../types/index.js';
import { SCHEMA_VERSION } from '../schemas/index.js';
import { sanitize, logError, logPipelineResult } from '../utils/logger.js';
import { writePipelineStatus, safeWrite } from '../utils/fileWriter.js';

// ============================================
// Exit Codes
// ============================================

/**
 * Exit codes for CLI.
 *
 * 0: Success - Pipeline completed (possibly with partial results)
 * 1: Pipeline error - Runtime failure during execution
 * 2: Configuration error - Missing token or invalid options
 * 130: Interrupted by SIGINT
 */
export const EXIT_CODES = {
  SUCCESS: 0,
  PIPELINE_ERROR: 1,
  CONFIG_ERROR: 2,
  INTERRUPTED: 130,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

// ============================================
// Stage Errors
// ============================================

/**
 * Error raised from inside a pipeline stage; carries the stage name so the
 * status file can record where the run stopped.
 */
export class PipelineStageError extends Error {
  constructor(
    public readonly stage: string,
    public readonly original: Error
  ) {
    super(original.message);
    this.name = 'PipelineStageError';
  }
}

// ============================================
// Error Context
// ============================================

/**
 * Error context for pipeline failures.
 */
export interface ErrorContext {
  /** Current pipeline stage when error occurred */
  stage?: string;
  /** Status file path (if the output base was created) */
  statusPath?: string;
  /** Pipeline configuration */
  config: PipelineConfig;
  /** Pipeline start time (Date.now()) */
  startTime: number;
}

// ============================================
// Error Classification
// ============================================

/**
 * Patterns that indicate a configuration error.
 * These errors exit with CONFIG_ERROR (2) instead of PIPELINE_ERROR (1).
 */
const CONFIG_ERROR_PATTERNS = [
  /missing required api key/i,
  /invalid.*option/i,
  /invalid output path/i,
  /configuration.*invalid/i,
  /\.env/i,
  /environment.*variable/i,
  /api token/i,
];

/**
 * Determine if an error is a configuration error.
 */
export function isConfigError(error: Error): boolean {
  return CONFIG_ERROR_PATTERNS.some((pattern) => pattern.test(error.message));
}

/**
 * Get the appropriate exit code for an error.
 *
 * @returns 1 for pipeline errors, 2 for config errors
 */
export function getExitCode(error: Error): ExitCode {
  return isConfigError(error) ? EXIT_CODES.CONFIG_ERROR : EXIT_CODES.PIPELINE_ERROR;
}

// ============================================
// Pipeline Status Helpers
// ============================================

/**
 * Create initial pipeline status for tracking.
 */
export function createPipelineStatus(config: PipelineConfig, startTime: number): PipelineStatus {
  return {
    schemaVersion: SCHEMA_VERSION,
    success: false,
    startedAt: new Date(startTime).toISOString(),
    config,
  };
}

/**
 * Update pipeline status on completion.
 *
 * @param error - Optional error message (sanitized before storing)
 */
export function completePipelineStatus(
  status: PipelineStatus,
  success: boolean,
  durationMs: number,
  error?: string
): PipelineStatus {
  return {
    ...status,
    success,
    completedAt: new Date().toISOString(),
    durationMs,
    error: error ? sanitize(error) : undefined,
  };
}

/**
 * Update pipeline status with current stage.
 */
export function updatePipelineStage(status: PipelineStatus, stage: string): PipelineStatus {
  return {
    ...status,
    stage,
  };
}

// ============================================
// Error Handling
// ============================================

/**
 * Handle pipeline error - log, write status, and return exit code.
 *
 * @param error - The error that occurred
 * @param context - Error context for status writing
 * @returns Exit code (1 or 2)
 */
export async function handlePipelineError(
  error: Error,
  context: ErrorContext
): Promise<ExitCode> {
  const durationMs = Date.now() - context.startTime;
  const stage = error instanceof PipelineStageError ? error.stage : context.stage;
  const rootError = error instanceof PipelineStageError ? error.original : error;
  const sanitizedMessage = sanitize(rootError.message);

  logError(stage ? `[${stage}] ${sanitizedMessage}` : sanitizedMessage);
  logPipelineResult(false, durationMs, context.statusPath ?? 'N/A', sanitizedMessage);

  const statusPath = context.statusPath;
  if (statusPath) {
    let status = completePipelineStatus(
      createPipelineStatus(context.config, context.startTime),
      false,
      durationMs,
      rootError.message
    );
    if (stage) {
      status = updatePipelineStage(status, stage);
    }

    await safeWrite(() => writePipelineStatus(statusPath, status), statusPath);
  }

  return getExitCode(rootError);
}

// ============================================
// Execution Wrapper
// ============================================

/**
 * Result type for withErrorHandling.
 */
export type ErrorHandlingResult<T> =
  | { success: true; result: T }
  | { success: false; exitCode: ExitCode };

/**
 * Wrap pipeline execution with error handling.
 *
 * @example
 * ```typescript
 * const result = await withErrorHandling(
 *   () => runPipeline(config, credentials),
 *   { config, startTime: Date.now() }
 * );
 *
 * if (!result.success) {
 *   process.exit(result.exitCode);
 * }
 * ```
 */
export async function withErrorHandling<T>(
  fn: () => Promise<T>,
  context: ErrorContext
): Promise<ErrorHandlingResult<T>> {
  try {
    const result = await fn();
    return { success: true, result };
  } catch (error) {
    const err = error instanceof Error ? error : new Error(String(error));
    const exitCode = await handlePipelineError(err, context);
    return { success: false, exitCode };
  }
}

/**
 * Create an error context from common parameters.
 */
export function createErrorContext(
  config: PipelineConfig,
  startTime: number,
  statusPath?: string,
  stage?: string
): ErrorContext {
  return {
    config,
    startTime,
    statusPath,
    stage,
  };
}
