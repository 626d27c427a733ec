/**
 * Pre-flight Checks
 *
 * Validates the token, query and output path before pipeline execution.
 * Supports --dry-run for validation-only runs.
 */

import type { PipelineConfig } from '../types/index.js';
import type { TokenResolution } from '../config.js';
import { resolveToken } from '../config.js';
import { validateOutputPath, resolveOutputPaths } from '../utils/fileWriter.js';
import { EXIT_CODES, type ExitCode } from './errorHandler.js';
import {
  logTokenStatus,
  logConfig,
  logError,
  logInfo,
  logSuccess,
  logNewline,
  registerSecret,
} from '../utils/logger.js';

// ============================================
// Types
// ============================================

/**
 * Result of pre-flight checks.
 */
export interface PreflightResult {
  /** Whether to continue with pipeline execution */
  shouldContinue: boolean;
  /** Exit code if shouldContinue is false */
  exitCode?: ExitCode;
  /** Token resolution result */
  token: TokenResolution;
}

/**
 * CLI options relevant to pre-flight checks
 */
export interface PreflightOptions {
  /** --token value, if given */
  cliToken?: string;
  /** Validate config and exit without running */
  dryRun?: boolean;
}

// ============================================
// Pre-flight Functions
// ============================================

/**
 * Run pre-flight checks before pipeline execution.
 *
 * Handles:
 * - token resolution (always)
 * - query and output path validation
 * - --dry-run (print summary and exit with code 0)
 *
 * @param config - Resolved pipeline configuration
 * @param options - CLI options for checking modes
 * @returns PreflightResult indicating whether to continue
 */
export function runPreflightChecks(
  config: PipelineConfig,
  options: PreflightOptions
): PreflightResult {
  const token = resolveToken(options.cliToken);
  if (token.token) {
    registerSecret(token.token);
  }
  logTokenStatus(token.valid, token.source);

  if (!token.valid) {
    logNewline();
    logError('Cannot proceed without an API token.');
    logInfo('Set HIKER_API_TOKEN in your .env file or pass --token.');
    logInfo('See .env.example for reference.');

    return { shouldContinue: false, exitCode: EXIT_CODES.CONFIG_ERROR, token };
  }

  if (config.query.length === 0) {
    logError('Search keyword cannot be empty');
    return { shouldContinue: false, exitCode: EXIT_CODES.CONFIG_ERROR, token };
  }

  try {
    validateOutputPath(config.outputPrefix);
  } catch (error) {
    logError(error instanceof Error ? error.message : String(error));
    return { shouldContinue: false, exitCode: EXIT_CODES.CONFIG_ERROR, token };
  }

  if (options.dryRun) {
    printDryRunSummary(config);
    return { shouldContinue: false, exitCode: EXIT_CODES.SUCCESS, token };
  }

  return { shouldContinue: true, token };
}

/**
 * Print dry-run summary (config validation only).
 */
export function printDryRunSummary(config: PipelineConfig): void {
  logNewline();
  logInfo('Dry Run Mode - Validating configuration only');

  logConfig(config);

  const paths = resolveOutputPaths(config.outputPrefix);
  logInfo('Would write:');
  logInfo(`  ${paths.accountsJsonl}`);
  logInfo(`  ${paths.accountsCsv}`);
  logInfo(`  ${paths.reelsCsv}`);
  logInfo(`  ${paths.status}`);
  logInfo(`Error log: ${config.errorLogPath}`);
  logInfo(`Timeout: ${config.timeoutSeconds}s`);
  logNewline();

  logSuccess('Configuration is valid. Ready to run pipeline.');
  logNewline();
}
