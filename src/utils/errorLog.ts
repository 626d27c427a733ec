/**
 * API Error Log
 *
 * Appends one JSON line per failed upstream call so failures can be
 * inspected after a best-effort run. Writing is fire-and-report: a failed
 * append is logged at verbose level and never interrupts the pipeline.
 */

import { appendFile, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { DEFAULT_CONFIG } from '../types/index.js';
import { logVerbose, sanitize } from './logger.js';

let errorLogPath: string = DEFAULT_CONFIG.errorLogPath;

/**
 * Set the file that receives error records.
 */
export function setErrorLogPath(path: string): void {
  errorLogPath = path;
}

export function getErrorLogPath(): string {
  return errorLogPath;
}

/**
 * One line of the error log.
 */
export interface ErrorLogRecord {
  ts: string;
  context: string;
  error_type?: string;
  error_message?: string;
  traceback?: string;
  [key: string]: unknown;
}

/**
 * Build an error record from call details and an optional error.
 *
 * @param context - Name of the failing call (e.g. "fbsearch_accounts_v3")
 * @param info - Call details (ids, query, payload)
 * @param error - Thrown value, if any
 */
export function buildErrorRecord(
  context: string,
  info: Record<string, unknown>,
  error?: unknown
): ErrorLogRecord {
  const record: ErrorLogRecord = {
    ts: new Date().toISOString(),
    context,
    ...info,
  };

  if (error !== undefined) {
    if (error instanceof Error) {
      record.error_type = error.name;
      record.error_message = error.message;
      record.traceback = error.stack ?? `${error.name}: ${error.message}`;
    } else {
      record.error_type = typeof error;
      record.error_message = String(error);
    }
  }

  return record;
}

/**
 * Append a debug record to the error log.
 *
 * @returns true when the record was written
 */
export async function logApiError(
  context: string,
  info: Record<string, unknown>,
  error?: unknown
): Promise<boolean> {
  const record = buildErrorRecord(context, info, error);
  const line = sanitize(JSON.stringify(record)) + '\n';

  try {
    await mkdir(dirname(errorLogPath), { recursive: true });
    await appendFile(errorLogPath, line, 'utf-8');
    return true;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logVerbose(`Could not append to ${errorLogPath}: ${message}`);
    return false;
  }
}
