/**
 * Base Command
 *
 * Provides common functionality for all CLI commands including:
 * - Global option handling (verbose, quiet, no-color)
 * - Consistent error reporting and exit codes
 * - Output utilities (debug, info, warn, error)
 *
 * All diagnostics go to stderr; stdout is reserved for transcript text and
 * command listings.
 *
 * @module cli/base-command
 */

import chalk from 'chalk';
import { InputError } from '../input/index.js';
import type { Logger } from '../pipeline/index.js';
import { PipelineAbortedError } from '../process/index.js';
import { MissingDependencyError } from '../tools/index.js';
import { formatMissingTools } from './formatters/requirements.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Global CLI options available to all commands.
 */
export interface GlobalOptions {
  /** Enable verbose output for debugging */
  verbose?: boolean;
  /** Suppress all non-essential output */
  quiet?: boolean;
  /** Disable colored output */
  color?: boolean; // commander inverts --no-color to color: false
}

// ============================================================================
// Exit Codes
// ============================================================================

/**
 * Standard exit codes for the CLI.
 */
export const EXIT_CODES = {
  /** Successful execution, including an already-cached transcript */
  SUCCESS: 0,
  /** Missing dependency, stage failure, configuration or delivery error */
  ERROR: 1,
  /** Invalid usage or arguments */
  USAGE_ERROR: 2,
  /** Interrupted by SIGINT/SIGTERM */
  CANCELLED: 130,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Map an error to the exit code the CLI reports for it.
 */
export function exitCodeForError(error: unknown): ExitCode {
  if (error instanceof InputError) {
    return EXIT_CODES.USAGE_ERROR;
  }
  if (error instanceof PipelineAbortedError) {
    return EXIT_CODES.CANCELLED;
  }
  return EXIT_CODES.ERROR;
}

// ============================================================================
// BaseCommand Class
// ============================================================================

/**
 * Base command class providing common CLI functionality.
 *
 * All command handlers receive a BaseCommand instance to access
 * consistent logging, error reporting, and options.
 *
 * @example
 * ```typescript
 * async function handleCheck(base: BaseCommand): Promise<ExitCode> {
 *   base.info('Checking requirements...');
 *   try {
 *     await assertRequirements(config, locator);
 *     base.success('All tools found');
 *     return EXIT_CODES.SUCCESS;
 *   } catch (err) {
 *     return base.report(err);
 *   }
 * }
 * ```
 */
export class BaseCommand {
  /** Global options from CLI */
  readonly options: GlobalOptions;

  /** Whether colored output is enabled */
  private readonly useColor: boolean;

  /**
   * Create a new BaseCommand instance.
   *
   * @param options - Global CLI options
   */
  constructor(options: GlobalOptions) {
    this.options = options;
    this.useColor = options.color !== false && process.stderr.isTTY === true;

    // Configure chalk based on color preference
    if (!this.useColor) {
      chalk.level = 0;
    }
  }

  // ==========================================================================
  // Output Methods
  // ==========================================================================

  /**
   * Log a debug message (only visible in verbose mode).
   *
   * @param message - Message to log
   * @param args - Additional arguments to log
   */
  debug(message: string, ...args: unknown[]): void {
    if (this.options.verbose) {
      console.error(chalk.dim(`[DEBUG] ${message}`), ...args);
    }
  }

  /**
   * Log an informational message (hidden in quiet mode).
   *
   * @param message - Message to log
   * @param args - Additional arguments to log
   */
  info(message: string, ...args: unknown[]): void {
    if (!this.options.quiet) {
      console.error(message, ...args);
    }
  }

  /**
   * Log a warning message (always visible).
   *
   * @param message - Warning message
   * @param args - Additional arguments to log
   */
  warn(message: string, ...args: unknown[]): void {
    console.error(chalk.yellow(`Warning: ${message}`), ...args);
  }

  /**
   * Log an error message (always visible). In verbose mode the stack of
   * an accompanying error is printed too.
   *
   * @param message - Error message
   * @param cause - Error behind the message
   */
  error(message: string, cause?: unknown): void {
    console.error(chalk.red(`Error: ${message}`));

    if (this.options.verbose && cause instanceof Error && cause.stack) {
      console.error(chalk.dim(cause.stack));
    }
  }

  /**
   * Log a success message with green checkmark.
   *
   * @param message - Success message
   */
  success(message: string): void {
    if (!this.options.quiet) {
      console.error(chalk.green(`${this.useColor ? '\u2714' : '[OK]'} ${message}`));
    }
  }

  /**
   * Log a failure message with red X.
   *
   * @param message - Failure message
   */
  fail(message: string): void {
    console.error(chalk.red(`${this.useColor ? '\u2718' : '[FAIL]'} ${message}`));
  }

  /**
   * Print a blank line (hidden in quiet mode).
   */
  blank(): void {
    if (!this.options.quiet) {
      console.error();
    }
  }

  /**
   * Report an error and return the exit code it maps to.
   *
   * Missing tools are listed with their installation hints; an interrupted
   * run gets a short notice instead of an error.
   */
  report(error: unknown): ExitCode {
    const code = exitCodeForError(error);

    if (error instanceof MissingDependencyError) {
      this.error(error.message);
      console.error(formatMissingTools(error.tools));
    } else if (error instanceof PipelineAbortedError) {
      this.warn('Interrupted, partial output removed');
    } else if (error instanceof Error) {
      this.error(error.message, error);
    } else {
      this.error(String(error));
    }

    return code;
  }

  // ==========================================================================
  // Utility Methods
  // ==========================================================================

  /**
   * Adapter for code that takes a {@link Logger}.
   */
  toLogger(): Logger {
    return {
      debug: (message, ...args) => this.debug(message, ...args),
      info: (message, ...args) => this.info(message, ...args),
      warn: (message, ...args) => this.warn(message, ...args),
      error: (message, ...args) => this.error(message, args[0]),
    };
  }

  /**
   * Check if verbose mode is enabled.
   */
  isVerbose(): boolean {
    return this.options.verbose === true;
  }

  /**
   * Check if quiet mode is enabled.
   */
  isQuiet(): boolean {
    return this.options.quiet === true;
  }
}

// ============================================================================
// Lookup
// ============================================================================

/**
 * Get the base command from a commander Command instance.
 * Used by subcommand handlers to access shared functionality.
 *
 * @param cmd - Commander command instance
 * @returns The stored BaseCommand, or a default one
 */
export function getBaseCommand(cmd: { opts(): Record<string, unknown> }): BaseCommand {
  const base = cmd.opts()['_baseCommand'];
  if (!(base instanceof BaseCommand)) {
    // Create a default one if not available (for testing)
    return new BaseCommand({});
  }
  return base;
}
