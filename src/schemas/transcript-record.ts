/**
 * Transcript Record Schema
 *
 * Sidecar written next to every transcript produced by a completed run.
 * It records what produced the transcript so a later run can tell a current
 * transcript from a stale one.
 *
 * @module schemas/transcript-record
 */

import { z } from 'zod';

export const TRANSCRIPT_RECORD_SCHEMA_VERSION = 1;

const Sha256Schema = z.string().regex(/^[a-f0-9]{64}$/, 'must be a lowercase hex SHA-256');

/**
 * Input identity stored in the record.
 */
export const RecordInputSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('local'),
    path: z.string().min(1),
    sizeBytes: z.number().int().nonnegative(),
    sha256: Sha256Schema,
  }),
  z.object({
    kind: z.literal('remote'),
    videoId: z.string().min(1),
    url: z.string().url(),
  }),
]);

export type RecordInput = z.infer<typeof RecordInputSchema>;

/**
 * Settings that change what the engine produces.
 */
export const TranscriptionSettingsSchema = z.object({
  executable: z.string(),
  modelPath: z.string(),
  language: z.string(),
  beamSize: z.number().int().positive(),
  threads: z.number().int().positive(),
  audioFormat: z.string(),
  silenceRemoval: z.object({
    enabled: z.boolean(),
    thresholdDb: z.number(),
    minDurationSeconds: z.number(),
  }),
});

export type TranscriptionSettings = z.infer<typeof TranscriptionSettingsSchema>;

export const TranscriptRecordSchema = z.object({
  schemaVersion: z.literal(TRANSCRIPT_RECORD_SCHEMA_VERSION),
  input: RecordInputSchema,
  settings: TranscriptionSettingsSchema,
  /** SHA-256 over input identity + settings */
  fingerprint: Sha256Schema,
  /** SHA-256 of the transcript text as written */
  transcriptSha256: Sha256Schema,
  title: z.string().optional(),
  /** YYYYMMDD as reported by yt-dlp */
  uploadDate: z.string().regex(/^\d{8}$/).optional(),
  createdAt: z.string().datetime(),
});

export type TranscriptRecord = z.infer<typeof TranscriptRecordSchema>;
