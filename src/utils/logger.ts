/**
 * Logger with Secrets Sanitization
 *
 * All logging functions sanitize output to prevent API token leakage.
 * Supports verbose mode for detailed debugging output.
 */

import chalk from 'chalk';
import { ENV_KEYS } from '../config.js';

// ============================================
// Logger State
// ============================================

/**
 * Global verbose mode flag.
 * Set via setVerbose() before running pipeline.
 */
let verboseMode = false;

/**
 * Secrets supplied outside the environment (e.g. --token).
 */
const extraSecrets = new Set<string>();

/**
 * Enable or disable verbose logging
 */
export function setVerbose(enabled: boolean): void {
  verboseMode = enabled;
}

/**
 * Register a secret value that must be redacted from all output.
 */
export function registerSecret(value: string): void {
  if (value.trim().length > 0) {
    extraSecrets.add(value);
  }
}

// ============================================
// Secrets Sanitization
// ============================================

/**
 * Patterns that look like access keys (to catch unknown keys).
 * HikerAPI keys are long alphanumeric strings.
 */
const API_KEY_PATTERNS = [
  /sk-[a-zA-Z0-9]{20,}/g,
  /[a-f0-9]{32,}/gi, // Long hex strings
  /[A-Za-z0-9]{40,}/g, // Long opaque tokens
];

/**
 * Sanitize text to remove API tokens and sensitive data.
 *
 * SECURITY: This function MUST be called before any console or file output.
 *
 * @param text - Text to sanitize
 * @returns Sanitized text with tokens replaced by [REDACTED]
 */
export function sanitize(text: string): string {
  let sanitized = text;

  const secrets = [
    ...Object.values(ENV_KEYS).map((envKey) => process.env[envKey]),
    ...extraSecrets,
  ];
  for (const value of secrets) {
    if (value && value.length > 0) {
      sanitized = sanitized.split(value).join('[REDACTED]');
    }
  }

  for (const pattern of API_KEY_PATTERNS) {
    sanitized = sanitized.replace(pattern, '[REDACTED]');
  }

  return sanitized;
}

// ============================================
// Timestamp Formatting
// ============================================

/**
 * Get current timestamp in HH:MM:SS format
 */
function timestamp(): string {
  const now = new Date();
  return now.toTimeString().slice(0, 8);
}

/**
 * Format duration in human-readable format
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  if (ms < 60000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60000);
  const seconds = ((ms % 60000) / 1000).toFixed(0);
  return `${minutes}m ${seconds}s`;
}

// ============================================
// Logging Functions
// ============================================

/**
 * Log a stage header with timestamp.
 *
 * @param name - Stage name (e.g., "Account Search")
 */
export function logStage(name: string): void {
  const line = '─'.repeat(50);
  console.log('');
  console.log(chalk.cyan(line));
  console.log(chalk.cyan.bold(`  ${sanitize(name)}`));
  console.log(chalk.cyan(`  ${timestamp()}`));
  console.log(chalk.cyan(line));
}

/**
 * Log progress indicator.
 *
 * total <= 0 prints without a bar; current > total clamps to 100%.
 */
export function logProgress(current: number, total: number, message?: string): void {
  const msg = message ? ` ${sanitize(message)}` : '';

  if (total <= 0) {
    console.log(chalk.gray(`  [${' '.repeat(20)}] ${current}/${total}${msg}`));
    return;
  }

  const percent = Math.min(100, Math.max(0, Math.round((current / total) * 100)));
  const filled = Math.floor(percent / 5);
  const bar = '█'.repeat(filled) + '░'.repeat(20 - filled);
  console.log(chalk.gray(`  [${bar}] ${current}/${total} (${percent}%)${msg}`));
}

export function logSuccess(message: string): void {
  console.log(chalk.green(`✓ ${sanitize(message)}`));
}

export function logWarning(message: string): void {
  console.log(chalk.yellow(`⚠ ${sanitize(message)}`));
}

export function logError(message: string): void {
  console.log(chalk.red(`✗ ${sanitize(message)}`));
}

export function logInfo(message: string): void {
  console.log(chalk.white(`  ${sanitize(message)}`));
}

/**
 * Log verbose message (only if verbose mode enabled).
 */
export function logVerbose(message: string): void {
  if (verboseMode) {
    console.log(chalk.gray(`  [verbose] ${sanitize(message)}`));
  }
}

/**
 * Log a horizontal divider line
 */
export function logDivider(): void {
  console.log(chalk.gray('─'.repeat(50)));
}

/**
 * Log an empty line
 */
export function logNewline(): void {
  console.log('');
}

// ============================================
// Specialized Logging
// ============================================

/**
 * Log token resolution result
 */
export function logTokenStatus(valid: boolean, source: string | undefined): void {
  if (valid) {
    logSuccess(`API token configured (${source ?? 'unknown source'})`);
  } else {
    logError('Missing API token:');
    console.log(chalk.red(`  • pass --token or set ${ENV_KEYS.HIKER_API_TOKEN}`));
  }
}

/**
 * Log pipeline configuration summary
 */
export function logConfig(config: {
  query: string;
  maxAccounts: number;
  recentReels: number;
  topK: number;
  concurrency: number;
  outputPrefix: string;
}): void {
  console.log('');
  console.log(chalk.cyan.bold('  Pipeline Configuration:'));
  console.log(chalk.gray('  ─────────────────────────────'));
  console.log(chalk.white(`  Query:         ${sanitize(config.query)}`));
  console.log(chalk.white(`  Max Accounts:  ${config.maxAccounts}`));
  console.log(chalk.white(`  Recent Reels:  ${config.recentReels}`));
  console.log(chalk.white(`  Top K:         ${config.topK}`));
  console.log(chalk.white(`  Concurrency:   ${config.concurrency}`));
  console.log(chalk.white(`  Output:        ${sanitize(config.outputPrefix)}`));
  console.log('');
}

/**
 * Log final pipeline result
 */
export function logPipelineResult(
  success: boolean,
  durationMs: number,
  output: string,
  error?: string
): void {
  console.log('');
  logDivider();

  if (success) {
    logSuccess(`Pipeline completed in ${formatDuration(durationMs)}`);
    console.log(chalk.green(`  Output: ${sanitize(output)}`));
  } else {
    logError(`Pipeline failed after ${formatDuration(durationMs)}`);
    if (error) {
      console.log(chalk.red(`  Error: ${sanitize(error)}`));
    }
  }

  logDivider();
  console.log('');
}
