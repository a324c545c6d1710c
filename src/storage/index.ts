/**
 * Storage Layer
 *
 * File-based persistence for transcripts and their records.
 * All write operations use atomic temp file + rename pattern.
 *
 * @module storage
 */

// Atomic operations
export { atomicWriteText, atomicWriteJson, readJson, fileExists } from './atomic.js';

// Transcript cache
export {
  calculateFileHash,
  hashText,
  canonicalJson,
  selectTranscriptionSettings,
  describeRecordInput,
  computeFingerprint,
  getRecordPath,
  readRecord,
  writeRecord,
  checkCache,
  type CacheDecision,
  type CacheDecisionReason,
  type CacheCheckOptions,
  type RecordDetails,
} from './cache.js';

// Cleanup
export { cleanupDirectory, CleanupTargetError } from './cleanup.js';
