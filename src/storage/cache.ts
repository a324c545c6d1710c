/**
 * Transcript Cache
 *
 * Decides whether an existing transcript can be reused. The transcript is
 * accompanied by a sidecar record (`<transcript>.json`) holding a
 * fingerprint of the input and of the settings that produced it.
 *
 * Modes:
 * - presence: an existing transcript is always reused
 * - fingerprint: reused when the record matches the current input and
 *   settings, or when there is no record at all (transcripts written before
 *   records existed); re-run when the record is stale or unreadable
 *
 * @module storage/cache
 */

import * as crypto from 'node:crypto';
import { createReadStream } from 'node:fs';
import * as fs from 'node:fs/promises';
import type { AppConfig, CacheMode } from '../config/index.js';
import type { ResolvedInput } from '../input/index.js';
import {
  TRANSCRIPT_RECORD_SCHEMA_VERSION,
  TranscriptRecordSchema,
  type RecordInput,
  type TranscriptionSettings,
  type TranscriptRecord,
} from '../schemas/index.js';
import { atomicWriteJson, fileExists, readJson } from './atomic.js';

// ============================================================================
// Types
// ============================================================================

export type CacheDecisionReason =
  | 'missing'
  | 'forced'
  | 'present'
  | 'no-record'
  | 'fingerprint-match'
  | 'fingerprint-mismatch'
  | 'invalid-record';

export interface CacheDecision {
  skip: boolean;
  reason: CacheDecisionReason;
}

// ============================================================================
// Hashing
// ============================================================================

/**
 * SHA-256 of a file, streamed so large media files are not loaded at once.
 *
 * @param filePath - File to hash
 * @returns 64-character lowercase hex digest
 */
export async function calculateFileHash(filePath: string): Promise<string> {
  const hash = crypto.createHash('sha256');
  for await (const chunk of createReadStream(filePath)) {
    hash.update(chunk);
  }
  return hash.digest('hex');
}

/**
 * SHA-256 of a string.
 */
export function hashText(text: string): string {
  return crypto.createHash('sha256').update(text, 'utf-8').digest('hex');
}

/**
 * JSON with object keys sorted, so logically equal values hash equally.
 */
export function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(canonicalJson).join(',')}]`;
  }
  if (value !== null && typeof value === 'object') {
    const entries = Object.entries(value)
      .filter(([, entry]) => entry !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return `{${entries.map(([key, entry]) => `${JSON.stringify(key)}:${canonicalJson(entry)}`).join(',')}}`;
  }
  return JSON.stringify(value);
}

// ============================================================================
// Fingerprint
// ============================================================================

/**
 * Settings from the configuration that affect the transcript text.
 */
export function selectTranscriptionSettings(config: AppConfig): TranscriptionSettings {
  return {
    executable: config.whisper.executable,
    modelPath: config.whisper.modelPath,
    language: config.whisper.language,
    beamSize: config.whisper.beamSize,
    threads: config.whisper.threads,
    audioFormat: config.ytdlp.audioFormat,
    silenceRemoval: { ...config.ffmpeg.silenceRemoval },
  };
}

/**
 * Identity of the input as stored in the record. Local files are hashed.
 */
export async function describeRecordInput(input: ResolvedInput): Promise<RecordInput> {
  if (input.kind === 'remote') {
    return { kind: 'remote', videoId: input.videoId, url: input.url };
  }

  const [stat, sha256] = await Promise.all([fs.stat(input.path), calculateFileHash(input.path)]);
  return { kind: 'local', path: input.path, sizeBytes: stat.size, sha256 };
}

/**
 * Fingerprint over input identity and transcription settings.
 *
 * Local inputs are identified by content, not by path, so moving a file
 * does not invalidate its transcript.
 */
export function computeFingerprint(input: RecordInput, settings: TranscriptionSettings): string {
  const identity =
    input.kind === 'remote'
      ? { kind: 'remote', videoId: input.videoId }
      : { kind: 'local', sizeBytes: input.sizeBytes, sha256: input.sha256 };

  return hashText(canonicalJson({ input: identity, settings }));
}

// ============================================================================
// Records
// ============================================================================

/**
 * Sidecar record path for a transcript.
 */
export function getRecordPath(transcriptPath: string): string {
  return `${transcriptPath}.json`;
}

/**
 * Load a transcript's record.
 *
 * @returns The record, null when there is none
 * @throws Error if the record exists but is not valid
 */
export async function readRecord(transcriptPath: string): Promise<TranscriptRecord | null> {
  const recordPath = getRecordPath(transcriptPath);
  if (!(await fileExists(recordPath))) {
    return null;
  }
  const data = await readJson(recordPath);
  return TranscriptRecordSchema.parse(data);
}

export interface RecordDetails {
  input: RecordInput;
  settings: TranscriptionSettings;
  fingerprint: string;
  transcript: string;
  title?: string;
  uploadDate?: string;
}

/**
 * Write the sidecar record for a finished transcript.
 */
export async function writeRecord(
  transcriptPath: string,
  details: RecordDetails
): Promise<TranscriptRecord> {
  const record: TranscriptRecord = TranscriptRecordSchema.parse({
    schemaVersion: TRANSCRIPT_RECORD_SCHEMA_VERSION,
    input: details.input,
    settings: details.settings,
    fingerprint: details.fingerprint,
    transcriptSha256: hashText(details.transcript),
    title: details.title,
    uploadDate: details.uploadDate,
    createdAt: new Date().toISOString(),
  });
  await atomicWriteJson(getRecordPath(transcriptPath), record);
  return record;
}

// ============================================================================
// Decision
// ============================================================================

export interface CacheCheckOptions {
  mode: CacheMode;
  /** Ignore any existing transcript */
  force?: boolean;
  /**
   * Produces the current fingerprint. Only called in fingerprint mode when
   * a record exists, so local files are not hashed needlessly.
   */
  fingerprint: () => Promise<string>;
}

/**
 * Decide whether the pipeline can be skipped for a transcript path.
 */
export async function checkCache(
  transcriptPath: string,
  options: CacheCheckOptions
): Promise<CacheDecision> {
  if (!(await fileExists(transcriptPath))) {
    return { skip: false, reason: 'missing' };
  }
  if (options.force) {
    return { skip: false, reason: 'forced' };
  }
  if (options.mode === 'presence') {
    return { skip: true, reason: 'present' };
  }

  let record: TranscriptRecord | null;
  try {
    record = await readRecord(transcriptPath);
  } catch {
    return { skip: false, reason: 'invalid-record' };
  }

  if (record === null) {
    return { skip: true, reason: 'no-record' };
  }

  const current = await options.fingerprint();
  return current === record.fingerprint
    ? { skip: true, reason: 'fingerprint-match' }
    : { skip: false, reason: 'fingerprint-mismatch' };
}
