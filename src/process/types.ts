/**
 * Process Type Definitions
 *
 * Contracts for running the external programs the driver wires together.
 * The pipeline talks to a {@link ProcessRunner}, never to child_process
 * directly, so tests can substitute an in-process fake.
 *
 * @module process/types
 */

import type { Writable } from 'node:stream';

// ============================================================================
// Stage Names
// ============================================================================

/**
 * Names of the pipeline stages that run as subprocesses.
 *
 * - metadata: yt-dlp title / upload date lookup (remote only)
 * - download: yt-dlp best-audio stream to stdout (remote only)
 * - transcode: ffmpeg resample to 16 kHz mono PCM WAV
 * - transcribe: whisper.cpp reading PCM from stdin
 * - deliver: platform automation for the notes sink
 */
export type ProcessStage = 'metadata' | 'download' | 'transcode' | 'transcribe' | 'deliver';

/**
 * A single program invocation.
 */
export interface CommandSpec {
  /** Stage this command belongs to */
  stage: ProcessStage;
  /** Executable name or path */
  file: string;
  /** Arguments, passed without shell interpretation */
  args: string[];
}

/**
 * A destination for the last stage's stdout.
 */
export interface PipelineOutput {
  stream: Writable;
  /**
   * End the stream when the pipeline finishes. Leave false for shared
   * streams such as process.stdout.
   */
  end: boolean;
}

export interface PipelineRunOptions {
  /** Where the final stage's stdout goes (tee) */
  outputs: PipelineOutput[];
  /** Aborting kills every stage */
  signal?: AbortSignal;
}

export interface CaptureOptions {
  signal?: AbortSignal;
}

/**
 * Runs external programs.
 */
export interface ProcessRunner {
  /**
   * Run one command to completion and return its stdout.
   *
   * @throws StageFailedError if the command exits non-zero or cannot start
   */
  capture(command: CommandSpec, options?: CaptureOptions): Promise<string>;

  /**
   * Run commands as a pipe chain: stdout of each feeds stdin of the next.
   * Resolves once every stage exited successfully and every output that
   * should be ended has finished.
   *
   * @throws StageFailedError for the first stage that fails; the rest are killed
   * @throws PipelineAbortedError if the signal aborts
   */
  pipeline(commands: CommandSpec[], options: PipelineRunOptions): Promise<void>;
}

// ============================================================================
// Errors
// ============================================================================

/**
 * A stage exited non-zero or could not be started.
 */
export class StageFailedError extends Error {
  constructor(
    public readonly stage: ProcessStage,
    public readonly exitCode: number | null,
    public readonly command: string,
    detail?: string
  ) {
    super(
      `${stage} stage failed` +
        (exitCode === null ? '' : ` with exit code ${exitCode}`) +
        `: ${command}` +
        (detail ? `\n${detail}` : '')
    );
    this.name = 'StageFailedError';
  }
}

/**
 * The pipeline was cancelled through its AbortSignal.
 */
export class PipelineAbortedError extends Error {
  constructor(message = 'Pipeline aborted') {
    super(message);
    this.name = 'PipelineAbortedError';
  }
}

/**
 * Render a command for logs and dry runs, quoting arguments with spaces.
 */
export function formatCommand(command: CommandSpec): string {
  return [command.file, ...command.args]
    .map((part) => (/[\s"'$`\\|&;<>()*?[\]]/.test(part) ? `'${part.replace(/'/g, `'\\''`)}'` : part))
    .join(' ');
}

/**
 * Render a pipe chain.
 */
export function formatPipeline(commands: CommandSpec[]): string {
  return commands.map(formatCommand).join(' \\\n  | ');
}
