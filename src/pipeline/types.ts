/**
 * Pipeline Type Definitions
 *
 * Contracts between the transcription pipeline, its callers and the
 * progress output.
 *
 * @module pipeline/types
 */

import type { Writable } from 'node:stream';
import type { DeliveryResult, DeliverySink } from '../delivery/index.js';
import type { ResolvedInput } from '../input/index.js';
import type { CommandSpec, ProcessRunner } from '../process/index.js';
import type { CacheDecisionReason } from '../storage/cache.js';

// ============================================================================
// Stage Names
// ============================================================================

/**
 * Stages reported through lifecycle callbacks, in execution order.
 *
 * - metadata: title and upload date lookup (remote only)
 * - transcribe: the download → transcode → transcribe process chain
 * - postprocess: transcript cleanup
 * - deliver: hand-off to the configured sink
 */
export type StageName = 'metadata' | 'transcribe' | 'postprocess' | 'deliver';

export const STAGE_ORDER: readonly StageName[] = ['metadata', 'transcribe', 'postprocess', 'deliver'];

// ============================================================================
// Logger Interface
// ============================================================================

/**
 * Minimal logger interface for the pipeline.
 * Allows the pipeline to log at various levels without depending on a specific logger.
 */
export interface Logger {
  /** Log debug-level message (typically hidden unless verbose) */
  debug(message: string, ...args: unknown[]): void;

  /** Log informational message */
  info(message: string, ...args: unknown[]): void;

  /** Log warning message */
  warn(message: string, ...args: unknown[]): void;

  /** Log error message */
  error(message: string, ...args: unknown[]): void;
}

// ============================================================================
// Run Options and Dependencies
// ============================================================================

/**
 * Collaborators injected into the pipeline.
 */
export interface PipelineDependencies {
  /** Spawns the external programs */
  runner: ProcessRunner;

  logger?: Logger;

  /** Delivery target; null or absent disables delivery */
  sink?: DeliverySink | null;

  /**
   * Where the transcript is echoed while it is produced.
   * Defaults to process.stdout; null disables the echo.
   */
  stdout?: Writable | null;

  /** Base directory for relative input paths (default: process.cwd()) */
  cwd?: string;
}

export interface RunOptions {
  /** Ignore an existing transcript */
  force?: boolean;

  /** Report the commands that would run without spawning anything */
  dryRun?: boolean;

  /** Aborting kills every running stage */
  signal?: AbortSignal;
}

/**
 * Callback for stage lifecycle events
 */
export interface PipelineCallbacks {
  /** Called when a stage starts */
  onStageStart?: (stage: StageName) => void;
  /** Called when a stage completes successfully */
  onStageComplete?: (stage: StageName, durationMs: number) => void;
  /** Called when a stage fails */
  onStageError?: (stage: StageName, error: Error) => void;
  /** Called when a stage is not run */
  onStageSkip?: (stage: StageName, reason: string) => void;
}

// ============================================================================
// Results
// ============================================================================

/**
 * Title and upload date reported by yt-dlp.
 */
export interface VideoMetadata {
  title: string;
  /** `YYYYMMDD`, absent when yt-dlp did not report a usable date */
  uploadDate?: string;
}

/**
 * Timing information for a run
 */
export interface PipelineTiming {
  /** ISO8601 timestamp when the run started */
  startedAt: string;
  /** ISO8601 timestamp when the run completed */
  completedAt: string;
  /** Total duration in milliseconds */
  durationMs: number;
  /** Duration per executed stage in milliseconds */
  perStage: Partial<Record<StageName, number>>;
}

export type PipelineStatus = 'completed' | 'cached' | 'dry-run';

/**
 * Result of one transcription run
 */
export interface PipelineResult {
  status: PipelineStatus;
  input: ResolvedInput;
  /** Transcript path, whether produced now or earlier */
  outputPath: string;
  /** Why the cache check did or did not skip the run */
  cacheReason: CacheDecisionReason;
  stagesExecuted: StageName[];
  stagesSkipped: StageName[];
  metadata?: VideoMetadata;
  /** Cleaned transcript path, when post-processing ran */
  cleanedPath?: string;
  /** Sink outcome, when delivery ran */
  delivery?: DeliveryResult;
  /** Commands spawned, or that would be spawned in a dry run */
  commands: CommandSpec[];
  timing: PipelineTiming;
}
