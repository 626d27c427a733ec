/**
 * CLI Module Exports
 *
 * Barrel export for all CLI components.
 */

// ============================================
// Program Configuration
// ============================================

export {
  createProgram,
  parseCliOptions,
  type ParsedCliResult,
} from './program.js';

// ============================================
// Pre-flight Checks
// ============================================

export {
  runPreflightChecks,
  printDryRunSummary,
  type PreflightResult,
  type PreflightOptions,
} from './preflight.js';

// ============================================
// Pipeline Execution
// ============================================

export {
  runPipeline,
  type PipelineOptions,
} from './runPipeline.js';

// ============================================
// Error Handling
// ============================================

export {
  withErrorHandling,
  handlePipelineError,
  EXIT_CODES,
  PipelineStageError,
  isConfigError,
  getExitCode,
  createPipelineStatus,
  completePipelineStatus,
  updatePipelineStage,
  createErrorContext,
  type ExitCode,
  type ErrorContext,
  type ErrorHandlingResult,
} from './errorHandler.js';
