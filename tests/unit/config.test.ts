/**
 * Configuration Unit Tests
 *
 * Tests for token resolution and option parsing.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  resolveToken,
  requireToken,
  parseIntOption,
  buildConfig,
  DEFAULT_CONFIG,
  type CliOptions,
} from '../../src/config.js';
import { logWarning } from '../../src/utils/logger.js';

// Mock logger to prevent console output during tests
vi.mock('../../src/utils/logger.js', () => ({
  logWarning: vi.fn(),
  logVerbose: vi.fn(),
  logInfo: vi.fn(),
  logError: vi.fn(),
  logSuccess: vi.fn(),
  setVerbose: vi.fn(),
}));

// ============================================
// Token Resolution
// ============================================

describe('resolveToken', () => {
  beforeEach(() => {
    vi.stubEnv('HIKER_API_TOKEN', '');
    vi.stubEnv('HIKER_API_KEY', '');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('prefers the --token value', () => {
    vi.stubEnv('HIKER_API_TOKEN', 'env-token');
    expect(resolveToken('cli-token')).toEqual({
      valid: true,
      token: 'cli-token',
      source: '--token',
    });
  });

  it('reads HIKER_API_TOKEN before HIKER_API_KEY', () => {
    vi.stubEnv('HIKER_API_TOKEN', 'primary-token');
    vi.stubEnv('HIKER_API_KEY', 'secondary-token');
    expect(resolveToken()).toEqual({
      valid: true,
      token: 'primary-token',
      source: 'HIKER_API_TOKEN',
    });
  });

  it('falls back to HIKER_API_KEY', () => {
    vi.stubEnv('HIKER_API_KEY', '  secondary-token  ');
    expect(resolveToken()).toEqual({
      valid: true,
      token: 'secondary-token',
      source: 'HIKER_API_KEY',
    });
  });

  it('ignores blank values', () => {
    vi.stubEnv('HIKER_API_TOKEN', '   ');
    expect(resolveToken('  ')).toEqual({ valid: false });
  });

  it('requireToken throws when nothing is configured', () => {
    expect(() => requireToken()).toThrow('Missing required API key');
  });

  it('requireToken returns the resolved token', () => {
    expect(requireToken('test-token')).toBe('test-token');
  });
});

// ============================================
// Option Parsing
// ============================================

describe('parseIntOption', () => {
  beforeEach(() => {
    vi.mocked(logWarning).mockClear();
  });

  it('returns the fallback for undefined without warning', () => {
    expect(parseIntOption(undefined, 7, '--top-k', 0)).toBe(7);
    expect(logWarning).not.toHaveBeenCalled();
  });

  it('parses integers at or above the minimum', () => {
    expect(parseIntOption('0', 7, '--top-k', 0)).toBe(0);
    expect(parseIntOption(' 25 ', 7, '--top-k', 0)).toBe(25);
  });

  it('warns and falls back on invalid input', () => {
    expect(parseIntOption('abc', 7, '--top-k', 0)).toBe(7);
    expect(logWarning).toHaveBeenCalledWith("Invalid --top-k value 'abc'. Using default: 7");
  });

  it('rejects decimals and values below the minimum', () => {
    expect(parseIntOption('2.5', 10, '--concurrency', 1)).toBe(10);
    expect(parseIntOption('0', 10, '--concurrency', 1)).toBe(10);
    expect(parseIntOption('-3', 200, '--max-accounts', 0)).toBe(200);
  });
});

describe('buildConfig', () => {
  beforeEach(() => {
    vi.mocked(logWarning).mockClear();
  });

  it('returns defaults for empty options', () => {
    expect(buildConfig({})).toEqual(DEFAULT_CONFIG);
  });

  it('applies CLI options', () => {
    const options: CliOptions = {
      query: '  street food ',
      maxAccounts: '50',
      recentReels: '30',
      topK: '5',
      outputPrefix: 'outputs/food',
      concurrency: '4',
      errorLog: 'logs/errors.jsonl',
      timeout: '600',
      verbose: true,
      dryRun: true,
    };

    expect(buildConfig(options)).toEqual({
      query: 'street food',
      maxAccounts: 50,
      recentReels: 30,
      topK: 5,
      outputPrefix: 'outputs/food',
      concurrency: 4,
      errorLogPath: 'logs/errors.jsonl',
      timeoutSeconds: 600,
      verbose: true,
      dryRun: true,
    });
  });

  it('keeps the default prefix for a blank value', () => {
    expect(buildConfig({ outputPrefix: '  ' }).outputPrefix).toBe(DEFAULT_CONFIG.outputPrefix);
  });

  it('warns when top-k exceeds recent-reels', () => {
    const config = buildConfig({ recentReels: '3', topK: '5' });

    expect(config.topK).toBe(5);
    expect(logWarning).toHaveBeenCalledWith(
      '--top-k (5) exceeds --recent-reels (3). At most 3 reels per account will be written.'
    );
  });

  it('does not mutate DEFAULT_CONFIG', () => {
    buildConfig({ topK: '2' });
    expect(DEFAULT_CONFIG.topK).toBe(10);
  });
});
