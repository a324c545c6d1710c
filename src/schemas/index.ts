/**
 * Schemas
 *
 * Zod schemas for the files the driver reads and writes.
 *
 * @module schemas
 */

export {
  TRANSCRIPT_RECORD_SCHEMA_VERSION,
  RecordInputSchema,
  TranscriptionSettingsSchema,
  TranscriptRecordSchema,
  type RecordInput,
  type TranscriptionSettings,
  type TranscriptRecord,
} from './transcript-record.js';

export {
  SubstitutionRuleSchema,
  CleanupRulesSchema,
  type SubstitutionRule,
  type CleanupRules,
} from './cleanup-rules.js';
