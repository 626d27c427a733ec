/**
 * File Writer
 *
 * Handles all file output: the accounts JSONL, the two CSV tables and the
 * run status file. All files share one base path derived from the
 * --output-prefix option.
 *
 * SECURITY: Includes path traversal protection to prevent writing outside cwd.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { basename, dirname, extname, isAbsolute, join, relative, resolve } from 'node:path';
import { createObjectCsvStringifier } from 'csv-writer';
import type { z } from 'zod';
import type { AccountWithReels, OutputPaths, PipelineStatus } from '../types/index.js';
import {
  ACCOUNT_CSV_FIELDS,
  REEL_CSV_FIELDS,
  AccountWithReelsSchema,
  PipelineStatusSchema,
} from '../schemas/index.js';
import { logError, logVerbose } from './logger.js';

// ============================================
// Path Security
// ============================================

/**
 * Validate that an output path does not escape the working directory.
 *
 * @param userPath - The path provided by the user
 * @returns The validated path (unchanged if valid)
 * @throws Error if path traversal is detected
 */
export function validateOutputPath(userPath: string): string {
  const cwd = process.cwd();
  const absolutePath = resolve(cwd, userPath);
  const relativeToCwd = relative(cwd, absolutePath);

  if (relativeToCwd.startsWith('..') || isAbsolute(relativeToCwd)) {
    throw new Error(
      `Invalid output path: path traversal detected. ` +
        `Path must be within the current working directory. ` +
        `Received: "${userPath}"`
    );
  }

  return userPath;
}

// ============================================
// Path Layout
// ============================================

/**
 * Strip a trailing file extension: "out/run.jsonl" → "out/run".
 */
export function stripExtension(prefix: string): string {
  const ext = extname(prefix);
  if (!ext) return prefix;
  return join(dirname(prefix), basename(prefix, ext));
}

/**
 * Derive every output path from the prefix.
 */
export function resolveOutputPaths(prefix: string): OutputPaths {
  const base = stripExtension(prefix);
  return {
    base,
    accountsJsonl: `${base}_accounts.jsonl`,
    accountsCsv: `${base}_accounts.csv`,
    reelsCsv: `${base}_reels.csv`,
    status: `${base}_status.json`,
  };
}

/**
 * Ensure parent directory exists for a file path
 */
async function ensureParentDir(filePath: string): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
}

/**
 * Validate a prefix and create its parent directory.
 *
 * @throws Error if path traversal is detected
 */
export async function ensureOutputBase(prefix: string): Promise<OutputPaths> {
  validateOutputPath(prefix);
  const paths = resolveOutputPaths(prefix);
  await ensureParentDir(paths.base);
  logVerbose(`Output base: ${paths.base}`);
  return paths;
}

// ============================================
// Validation
// ============================================

/**
 * Throw if data does not match the schema.
 */
function assertValid<T>(schema: z.ZodType<T>, data: unknown, filePath: string): void {
  const result = schema.safeParse(data);
  if (!result.success) {
    const errors = result.error.issues
      .map((e) => `${e.path.join('.')}: ${e.message}`)
      .join('; ');
    throw new Error(`Validation failed before writing ${filePath}: ${errors}`);
  }
}

// ============================================
// JSON Writing
// ============================================

/**
 * Write JSON data to file with optional schema validation.
 *
 * @throws Error if validation fails or write fails
 */
export async function writeJSON<T>(
  filePath: string,
  data: T,
  schema?: z.ZodType<T>
): Promise<void> {
  if (schema) {
    assertValid(schema, data, filePath);
  }

  await ensureParentDir(filePath);

  const content = JSON.stringify(data, null, 2);
  await writeFile(filePath, content, 'utf-8');

  logVerbose(`Wrote JSON: ${filePath} (${content.length} bytes)`);
}

/**
 * Write one JSON document per line.
 *
 * @throws Error if any record fails validation or the write fails
 */
export async function writeJSONL<T>(
  filePath: string,
  records: readonly T[],
  schema?: z.ZodType<T>
): Promise<void> {
  if (schema) {
    records.forEach((record, index) => assertValid(schema, record, `${filePath}:${index + 1}`));
  }

  await ensureParentDir(filePath);

  const content = records.map((record) => JSON.stringify(record) + '\n').join('');
  await writeFile(filePath, content, 'utf-8');

  logVerbose(`Wrote JSONL: ${filePath} (${records.length} lines)`);
}

// ============================================
// CSV Writing
// ============================================

/**
 * Render records as CSV with a header row.
 * null and undefined become empty cells.
 *
 * @param records - Rows keyed by field name
 * @param fields - Column order; also the header titles
 */
export function toCsv(
  records: ReadonlyArray<Record<string, unknown>>,
  fields: readonly string[]
): string {
  const stringifier = createObjectCsvStringifier({
    header: fields.map((field) => ({ id: field, title: field })),
  });

  const header = stringifier.getHeaderString() ?? '';
  if (records.length === 0) {
    return header;
  }
  return header + stringifier.stringifyRecords([...records]);
}

/**
 * Write records to a CSV file.
 */
export async function writeCSV(
  filePath: string,
  records: ReadonlyArray<Record<string, unknown>>,
  fields: readonly string[]
): Promise<void> {
  await ensureParentDir(filePath);

  const content = toCsv(records, fields);
  await writeFile(filePath, content, 'utf-8');

  logVerbose(`Wrote CSV: ${filePath} (${records.length} rows)`);
}

// ============================================
// Result Files
// ============================================

/**
 * Write <base>_accounts.jsonl: one { account, top_reels } object per line.
 */
export async function writeAccountsJsonl(
  filePath: string,
  items: readonly AccountWithReels[]
): Promise<void> {
  await writeJSONL(filePath, items, AccountWithReelsSchema);
}

/**
 * Write <base>_accounts.csv: one row per account.
 */
export async function writeAccountsCsv(
  filePath: string,
  items: readonly AccountWithReels[]
): Promise<void> {
  await writeCSV(
    filePath,
    items.map((item) => item.account),
    ACCOUNT_CSV_FIELDS
  );
}

/**
 * Write <base>_reels.csv: one row per ranked reel, grouped by account.
 */
export async function writeReelsCsv(
  filePath: string,
  items: readonly AccountWithReels[]
): Promise<void> {
  await writeCSV(
    filePath,
    items.flatMap((item) => item.top_reels),
    REEL_CSV_FIELDS
  );
}

/**
 * Write <base>_status.json with run metadata.
 */
export async function writePipelineStatus(
  filePath: string,
  status: PipelineStatus
): Promise<void> {
  await writeJSON(filePath, status, PipelineStatusSchema);
}

// ============================================
// Convenience Wrapper
// ============================================

/**
 * Output writer bound to one run's output paths.
 */
export interface OutputWriter {
  readonly paths: OutputPaths;

  writeResults: (items: readonly AccountWithReels[]) => Promise<void>;
  writeStatus: (status: PipelineStatus) => Promise<void>;
}

/**
 * Create an output writer for paths that already exist.
 */
export function createOutputWriterFromPaths(paths: OutputPaths): OutputWriter {
  return {
    paths,

    writeResults: async (items: readonly AccountWithReels[]) => {
      await writeAccountsJsonl(paths.accountsJsonl, items);
      await writeAccountsCsv(paths.accountsCsv, items);
      await writeReelsCsv(paths.reelsCsv, items);
    },

    writeStatus: async (status: PipelineStatus) => {
      await writePipelineStatus(paths.status, status);
    },
  };
}

/**
 * Create an output writer for a pipeline run.
 *
 * @param prefix - --output-prefix value
 */
export async function createOutputWriter(prefix: string): Promise<OutputWriter> {
  const paths = await ensureOutputBase(prefix);
  return createOutputWriterFromPaths(paths);
}

/**
 * Safe write wrapper that logs errors but doesn't throw.
 * Use for non-critical writes that shouldn't fail the pipeline.
 */
export async function safeWrite(
  writeFn: () => Promise<void>,
  description: string
): Promise<boolean> {
  try {
    await writeFn();
    return true;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logError(`Failed to write ${description}: ${message}`);
    return false;
  }
}
