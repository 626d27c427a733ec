/**
 * Configuration & Environment Variables
 *
 * Handles environment loading, API token resolution, and merging CLI
 * options over the defaults.
 */

import 'dotenv/config';
import type { PipelineConfig } from './types/index.js';
import { DEFAULT_CONFIG } from './types/index.js';
import { logWarning } from './utils/logger.js';

// ============================================
// Environment Variable Names
// ============================================

/**
 * Environment variable names for the API token, in lookup order
 */
export const ENV_KEYS = {
  HIKER_API_TOKEN: 'HIKER_API_TOKEN',
  HIKER_API_KEY: 'HIKER_API_KEY',
} as const;

// ============================================
// Token Access (Sanitized)
// ============================================

/**
 * Result of token resolution
 */
export interface TokenResolution {
  valid: boolean;
  token?: string;
  /** Where the token came from: '--token' or an env variable name */
  source?: string;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value !== undefined && value.trim().length > 0 ? value.trim() : undefined;
}

/**
 * Resolve the API token.
 * Precedence: --token, HIKER_API_TOKEN, HIKER_API_KEY.
 * SECURITY: Tokens are retrieved but never logged.
 *
 * @param cliToken - Value of --token, if given
 */
export function resolveToken(cliToken?: string): TokenResolution {
  const fromCli = nonEmpty(cliToken);
  if (fromCli) {
    return { valid: true, token: fromCli, source: '--token' };
  }

  for (const envKey of Object.values(ENV_KEYS)) {
    const fromEnv = nonEmpty(process.env[envKey]);
    if (fromEnv) {
      return { valid: true, token: fromEnv, source: envKey };
    }
  }

  return { valid: false };
}

/**
 * Resolve the API token and throw if none is configured.
 *
 * @throws Error naming the missing environment variable
 */
export function requireToken(cliToken?: string): string {
  const result = resolveToken(cliToken);
  if (!result.valid || !result.token) {
    throw new Error(
      `Missing required API key: set ${ENV_KEYS.HIKER_API_TOKEN} or pass --token.\n` +
        `See .env.example for reference.`
    );
  }
  return result.token;
}

// ============================================
// Configuration Building
// ============================================

/**
 * CLI options that can be parsed from command line
 */
export interface CliOptions {
  query?: string;
  maxAccounts?: string;
  recentReels?: string;
  topK?: string;
  outputPrefix?: string;
  concurrency?: string;
  errorLog?: string;
  timeout?: string;
  verbose?: boolean;
  dryRun?: boolean;
}

/**
 * Parse an integer option.
 * Falls back to the default (with a warning) on non-numeric input or
 * values below `min`.
 *
 * @param value - Raw option string
 * @param fallback - Default used on invalid input
 * @param flag - Flag name for the warning
 * @param min - Smallest accepted value
 */
export function parseIntOption(
  value: string | undefined,
  fallback: number,
  flag: string,
  min: number
): number {
  if (value === undefined) {
    return fallback;
  }

  const trimmed = value.trim();
  const parsed = /^-?\d+$/.test(trimmed) ? parseInt(trimmed, 10) : NaN;
  if (isNaN(parsed) || parsed < min) {
    logWarning(`Invalid ${flag} value '${value}'. Using default: ${fallback}`);
    return fallback;
  }

  return parsed;
}

/**
 * Build a complete PipelineConfig from CLI options.
 *
 * Merging order (later overrides earlier):
 * 1. DEFAULT_CONFIG
 * 2. Explicit CLI options
 *
 * @param options - Parsed CLI options
 * @returns Complete, resolved PipelineConfig
 */
export function buildConfig(options: CliOptions): PipelineConfig {
  const config: PipelineConfig = { ...DEFAULT_CONFIG };

  if (options.query !== undefined) {
    config.query = options.query.trim();
  }

  config.maxAccounts = parseIntOption(
    options.maxAccounts,
    DEFAULT_CONFIG.maxAccounts,
    '--max-accounts',
    0
  );
  config.recentReels = parseIntOption(
    options.recentReels,
    DEFAULT_CONFIG.recentReels,
    '--recent-reels',
    0
  );
  config.topK = parseIntOption(options.topK, DEFAULT_CONFIG.topK, '--top-k', 0);
  config.concurrency = parseIntOption(
    options.concurrency,
    DEFAULT_CONFIG.concurrency,
    '--concurrency',
    1
  );
  config.timeoutSeconds = parseIntOption(
    options.timeout,
    DEFAULT_CONFIG.timeoutSeconds,
    '--timeout',
    1
  );

  if (options.outputPrefix !== undefined && options.outputPrefix.trim().length > 0) {
    config.outputPrefix = options.outputPrefix.trim();
  }

  if (options.errorLog !== undefined && options.errorLog.trim().length > 0) {
    config.errorLogPath = options.errorLog.trim();
  }

  if (options.verbose !== undefined) {
    config.verbose = options.verbose;
  }

  if (options.dryRun !== undefined) {
    config.dryRun = options.dryRun;
  }

  if (config.topK > config.recentReels) {
    logWarning(
      `--top-k (${config.topK}) exceeds --recent-reels (${config.recentReels}). ` +
        `At most ${config.recentReels} reels per account will be written.`
    );
  }

  return config;
}

// ============================================
// Re-exports for convenience
// ============================================

export { DEFAULT_CONFIG } from './types/index.js';
export type { PipelineConfig } from './types/index.js';
