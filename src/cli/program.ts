/**
 * Commander Program Definition
 *
 * Configures the CLI program and its options.
 * This file focuses only on Commander setup - no pipeline execution logic.
 */

import { Command } from 'commander';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import type { CliOptions } from '../config.js';
import { DEFAULT_CONFIG } from '../config.js';
import { logWarning } from '../utils/logger.js';

// Get package.json version
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packageJsonPath = join(__dirname, '..', '..', 'package.json');

function getVersion(): string {
  try {
    const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    if (
      typeof packageJson === 'object' &&
      packageJson !== null &&
      'version' in packageJson &&
      typeof packageJson.version === 'string'
    ) {
      return packageJson.version;
    }
    return '1.0.0';
  } catch {
    return '1.0.0';
  }
}

/**
 * Create and configure the Commander program.
 *
 * @returns Configured Commander program instance
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('reel-ranker')
    .description('Find Instagram accounts by keyword and list the top-K reels per account')
    .version(getVersion(), '-V, --version', 'Show version number')

    // Search
    .requiredOption('--query <keyword>', 'Search keyword')
    .option('--max-accounts <n>', 'Max accounts kept from search', String(DEFAULT_CONFIG.maxAccounts))

    // Reels
    .option('--recent-reels <n>', 'Recent reels fetched per account', String(DEFAULT_CONFIG.recentReels))
    .option('--top-k <n>', 'Reels kept per account', String(DEFAULT_CONFIG.topK))

    // Auth
    .option('--token <token>', 'HikerAPI token (or HIKER_API_TOKEN env)')

    // Output
    .option('--output-prefix <path>', 'Output path prefix', DEFAULT_CONFIG.outputPrefix)
    .option('--error-log <path>', 'JSONL file for API failures', DEFAULT_CONFIG.errorLogPath)

    // Performance
    .option('--concurrency <n>', 'Accounts processed in parallel', String(DEFAULT_CONFIG.concurrency))
    .option('--timeout <seconds>', 'Pipeline timeout in seconds', String(DEFAULT_CONFIG.timeoutSeconds))

    // Debug
    .option('--verbose', 'Show detailed progress')
    .option('--dry-run', 'Validate config and exit without running pipeline')

    .addHelpText(
      'after',
      `
Examples:
  $ npx tsx src/index.ts --query "street food"

  # Fewer accounts, top 5 reels each
  $ npx tsx src/index.ts --query "yoga" --max-accounts 50 --top-k 5

  # Custom output location
  $ npx tsx src/index.ts --query "coffee" --output-prefix outputs/coffee

Output:
  <prefix>_accounts.jsonl   one { account, top_reels } object per line
  <prefix>_accounts.csv     one row per account
  <prefix>_reels.csv        one row per ranked reel
  <prefix>_status.json      run summary
`
    );

  return program;
}

/**
 * Commander options as returned by program.opts().
 * External code should use CliOptions from config.ts (the normalized form).
 */
interface CommanderOptions {
  query?: string;
  maxAccounts?: string;
  recentReels?: string;
  topK?: string;
  token?: string;
  outputPrefix?: string;
  errorLog?: string;
  concurrency?: string;
  timeout?: string;
  verbose?: boolean;
  dryRun?: boolean;
}

/**
 * Result of parsing CLI options
 */
export interface ParsedCliResult {
  options: CliOptions;
  /** --token value; kept out of CliOptions so it never reaches the status file */
  token?: string;
}

const STRING_OPTIONS = [
  'query',
  'maxAccounts',
  'recentReels',
  'topK',
  'token',
  'outputPrefix',
  'errorLog',
  'concurrency',
  'timeout',
] as const;

const BOOLEAN_OPTIONS = ['verbose', 'dryRun'] as const;

/**
 * Copy Commander's option bag into a typed object, dropping values of an
 * unexpected type.
 */
function readCommanderOptions(opts: Record<string, unknown>): CommanderOptions {
  const result: CommanderOptions = {};
  let unexpected = false;

  for (const key of STRING_OPTIONS) {
    const value = opts[key];
    if (typeof value === 'string') {
      result[key] = value;
    } else if (value !== undefined) {
      unexpected = true;
    }
  }

  for (const key of BOOLEAN_OPTIONS) {
    const value = opts[key];
    if (typeof value === 'boolean') {
      result[key] = value;
    } else if (value !== undefined) {
      unexpected = true;
    }
  }

  if (unexpected) {
    logWarning('Unexpected option types detected. Some options may be ignored.');
  }

  return result;
}

/**
 * Parse Commander options to the CliOptions interface.
 *
 * @param opts - Raw options from Commander
 * @returns Normalized options and the CLI token, if any
 */
export function parseCliOptions(opts: Record<string, unknown>): ParsedCliResult {
  const { token, ...rest } = readCommanderOptions(opts);

  const options: CliOptions = {
    query: rest.query,
    maxAccounts: rest.maxAccounts,
    recentReels: rest.recentReels,
    topK: rest.topK,
    outputPrefix: rest.outputPrefix,
    errorLog: rest.errorLog,
    concurrency: rest.concurrency,
    timeout: rest.timeout,
    verbose: rest.verbose,
    dryRun: rest.dryRun,
  };

  return { options, token };
}
