/**
 * Progress Formatters
 *
 * CLI progress display utilities including:
 * - Spinner for short operations (requirement check, metadata lookup)
 * - Stage progress display with checkmarks
 *
 * Everything here writes to stderr: stdout carries the transcript echo.
 * Uses the ora library for terminal spinners.
 *
 * @module cli/formatters/progress
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';
import type { PipelineCallbacks, StageName } from '../../pipeline/types.js';

// ============================================================================
// Stage Labels
// ============================================================================

const STAGE_LABELS: Record<StageName, string> = {
  metadata: 'Metadata',
  transcribe: 'Transcription',
  postprocess: 'Cleanup',
  deliver: 'Delivery',
};

/**
 * The transcribe stage echoes text to the terminal, so it gets a plain
 * status line instead of a spinner.
 */
const SPINNER_STAGES: ReadonlySet<StageName> = new Set(['metadata', 'postprocess', 'deliver']);

function stderrIsTTY(): boolean {
  return process.stderr.isTTY === true;
}

// ============================================================================
// Spinner Class
// ============================================================================

/**
 * Spinner on stderr that appends the elapsed time on success.
 * Disabled when stderr is not a TTY.
 *
 * @example
 * ```typescript
 * const spinner = createSpinner('Checking requirements...').start();
 *
 * try {
 *   await assertRequirements(config, locator);
 *   spinner.succeed('Requirements met');
 * } catch (err) {
 *   spinner.fail('Missing requirements');
 * }
 * ```
 */
export class ProgressSpinner {
  private spinner: Ora;
  private startTime: number = 0;

  constructor(text: string) {
    this.spinner = ora({
      text,
      color: 'cyan',
      isEnabled: stderrIsTTY(),
      stream: process.stderr,
    });
  }

  start(): this {
    this.startTime = Date.now();
    this.spinner.start();
    return this;
  }

  succeed(text?: string): this {
    const duration = Date.now() - this.startTime;
    const durationStr = duration > 0 ? chalk.dim(` (${formatDuration(duration)})`) : '';
    this.spinner.succeed((text ?? this.spinner.text) + durationStr);
    return this;
  }

  fail(text?: string): this {
    this.spinner.fail(text);
    return this;
  }
}

// ============================================================================
// Stage Progress Display
// ============================================================================

/**
 * Pipeline stage progress on stderr: spinners for short stages on a TTY,
 * one status line per event otherwise.
 *
 * @example
 * ```typescript
 * const progress = new StageProgressDisplay();
 * pipeline.setCallbacks(progress.callbacks());
 * await pipeline.run(source);
 * ```
 */
export class StageProgressDisplay {
  private readonly isTTY = stderrIsTTY();
  private currentSpinner: ProgressSpinner | null = null;

  startStage(name: StageName): void {
    if (this.isTTY && SPINNER_STAGES.has(name)) {
      this.currentSpinner = new ProgressSpinner(`${STAGE_LABELS[name]}...`).start();
    } else {
      console.error(`[*] ${STAGE_LABELS[name]}...`);
    }
  }

  completeStage(name: StageName, durationMs: number): void {
    if (this.currentSpinner) {
      this.currentSpinner.succeed(`${STAGE_LABELS[name]} complete`);
      this.currentSpinner = null;
    } else {
      console.error(`[+] ${STAGE_LABELS[name]} (${formatDuration(durationMs)})`);
    }
  }

  failStage(name: StageName): void {
    if (this.currentSpinner) {
      this.currentSpinner.fail(`${STAGE_LABELS[name]} failed`);
      this.currentSpinner = null;
    } else {
      console.error(`[X] ${STAGE_LABELS[name]} failed`);
    }
  }

  /**
   * Skips are only shown in non-TTY output.
   */
  skipStage(name: StageName, reason?: string): void {
    if (!this.isTTY) {
      console.error(`[-] ${STAGE_LABELS[name]} (skipped${reason ? `: ${reason}` : ''})`);
    }
  }

  /**
   * Pipeline callbacks that drive this display.
   */
  callbacks(): Required<PipelineCallbacks> {
    return {
      onStageStart: (stage) => this.startStage(stage),
      onStageComplete: (stage, durationMs) => this.completeStage(stage, durationMs),
      onStageError: (stage) => this.failStage(stage),
      onStageSkip: (stage, reason) => this.skipStage(stage, reason),
    };
  }
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Format a duration in milliseconds to human-readable string.
 *
 * @param ms - Duration in milliseconds
 * @returns Formatted duration string
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }

  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`;
  }

  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = Math.round(seconds % 60);
  return `${minutes}m ${remainingSeconds}s`;
}

/**
 * Create a spinner for a single operation.
 */
export function createSpinner(text: string): ProgressSpinner {
  return new ProgressSpinner(text);
}

/**
 * Create a stage progress display.
 */
export function createStageProgress(): StageProgressDisplay {
  return new StageProgressDisplay();
}
