#!/usr/bin/env node
/**
 * Reel Ranker CLI
 *
 * Main entry point for the CLI application.
 * Parses arguments, validates configuration, and runs the pipeline.
 *
 * Usage:
 *   npx tsx src/index.ts --query <keyword> [options]
 */

import { CommanderError } from 'commander';
import {
  createProgram,
  parseCliOptions,
  runPreflightChecks,
  runPipeline,
  withErrorHandling,
  createErrorContext,
  EXIT_CODES,
} from './cli/index.js';
import { buildConfig, requireToken } from './config.js';
import {
  setVerbose,
  logInfo,
  logVerbose,
  sanitize,
  withTimeout,
  createOutputWriter,
} from './utils/index.js';

// ============================================
// Main Entry Point
// ============================================

/**
 * Main CLI entry point.
 *
 * Flow:
 * 1. Parse CLI arguments with Commander
 * 2. Build configuration from options
 * 3. Run pre-flight checks (token, output path, dry-run)
 * 4. Execute pipeline with error handling and the global timeout
 * 5. Exit with appropriate code
 */
async function main(): Promise<void> {
  const program = createProgram();

  // Throw instead of exiting so parse failures map to CONFIG_ERROR
  program.exitOverride();

  let opts: Record<string, unknown>;

  try {
    program.parse(process.argv);
    opts = program.opts();
  } catch (error) {
    if (error instanceof CommanderError) {
      // --help and --version also land here, with exit code 0
      process.exit(error.exitCode === 0 ? EXIT_CODES.SUCCESS : EXIT_CODES.CONFIG_ERROR);
    }
    throw error;
  }

  const { options, token: cliToken } = parseCliOptions(opts);
  const config = buildConfig(options);

  setVerbose(config.verbose);

  const preflight = runPreflightChecks(config, {
    cliToken,
    dryRun: config.dryRun,
  });

  if (!preflight.shouldContinue) {
    process.exit(preflight.exitCode ?? EXIT_CODES.SUCCESS);
  }

  const credentials = { token: requireToken(cliToken) };

  // Create the output base before running so a failed run can still write its status file
  const writer = await createOutputWriter(config.outputPrefix);
  logVerbose(`Pre-created output base: ${writer.paths.base}`);

  const startTime = Date.now();
  const timeoutMs = config.timeoutSeconds * 1000;

  const result = await withErrorHandling(
    () =>
      withTimeout(
        () => runPipeline(config, credentials, { writer }),
        timeoutMs,
        'Pipeline execution'
      ),
    createErrorContext(config, startTime, writer.paths.status)
  );

  process.exit(result.success ? EXIT_CODES.SUCCESS : result.exitCode);
}

// ============================================
// Execution
// ============================================

process.on('SIGINT', () => {
  logInfo('Interrupted.');
  process.exit(EXIT_CODES.INTERRUPTED);
});

main().catch((error: unknown) => {
  // Only the sanitized message; stack traces can carry paths and tokens
  const errorMessage =
    error instanceof Error ? error.message : 'An unexpected error occurred';
  console.error('Unexpected error:', sanitize(errorMessage));
  process.exit(EXIT_CODES.PIPELINE_ERROR);
});
