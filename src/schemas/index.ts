// ============================================
// Re-export all schemas and types
// ============================================

// AccountRecord - normalized account
export {
  SCHEMA_VERSION,
  ACCOUNT_CSV_FIELDS,
  AccountRecordSchema,
  type AccountRecord,
} from './account.js';

// ReelRecord - normalized reel and the JSONL line shape
export {
  REEL_CSV_FIELDS,
  ReelRecordSchema,
  AccountWithReelsSchema,
  type ReelRecord,
  type AccountWithReels,
} from './reel.js';

// Pipeline status file
export {
  PipelineConfigSchema,
  RunCountsSchema,
  PipelineStatusSchema,
  type RunCounts,
  type PipelineStatus,
} from './pipelineStatus.js';
