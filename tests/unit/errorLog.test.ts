/**
 * Error Log Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  buildErrorRecord,
  logApiError,
  setErrorLogPath,
  getErrorLogPath,
} from '../../src/utils/errorLog.js';

vi.mock('../../src/utils/logger.js', () => ({
  sanitize: vi.fn((text: string) => text.split('test-token').join('[REDACTED]')),
  logVerbose: vi.fn(),
}));

describe('buildErrorRecord', () => {
  it('records the context and call details', () => {
    const record = buildErrorRecord('user_by_id_v2', { pk: '111', username: 'chef_ana' });

    expect(record.context).toBe('user_by_id_v2');
    expect(record.pk).toBe('111');
    expect(record.username).toBe('chef_ana');
    expect(record.error_type).toBeUndefined();
    expect(Number.isNaN(Date.parse(record.ts))).toBe(false);
  });

  it('describes Error instances', () => {
    const error = new TypeError('bad shape');
    const record = buildErrorRecord('user_clips', {}, error);

    expect(record.error_type).toBe('TypeError');
    expect(record.error_message).toBe('bad shape');
    expect(record.traceback).toContain('TypeError: bad shape');
  });

  it('describes thrown non-errors', () => {
    const record = buildErrorRecord('user_clips', {}, 'oops');

    expect(record.error_type).toBe('string');
    expect(record.error_message).toBe('oops');
    expect(record.traceback).toBeUndefined();
  });
});

describe('logApiError', () => {
  let testDir: string;
  let previousPath: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), 'reel-ranker-errlog-'));
    previousPath = getErrorLogPath();
  });

  afterEach(async () => {
    setErrorLogPath(previousPath);
    await rm(testDir, { recursive: true, force: true });
  });

  it('appends one sanitized JSON line per call', async () => {
    const logPath = join(testDir, 'logs', 'errors.jsonl');
    setErrorLogPath(logPath);

    await expect(
      logApiError('fbsearch_accounts_v3', { query: 'yoga', page: 1 }, new Error('HTTP 500'))
    ).resolves.toBe(true);
    await logApiError('user_by_id_v2_state_false', {
      pk: '111',
      payload: { state: false, error: 'key test-token rejected' },
    });

    const lines = (await readFile(logPath, 'utf-8')).trimEnd().split('\n');
    expect(lines).toHaveLength(2);

    const first: unknown = JSON.parse(lines[0]);
    expect(first).toMatchObject({
      context: 'fbsearch_accounts_v3',
      query: 'yoga',
      page: 1,
      error_type: 'Error',
      error_message: 'HTTP 500',
    });

    const second: unknown = JSON.parse(lines[1]);
    expect(second).toMatchObject({
      context: 'user_by_id_v2_state_false',
      pk: '111',
      payload: { state: false, error: 'key [REDACTED] rejected' },
    });
  });

  it('returns false when the file cannot be written', async () => {
    // A directory cannot be appended to
    setErrorLogPath(testDir);

    await expect(logApiError('user_clips', { user_id: '1' })).resolves.toBe(false);
  });
});
