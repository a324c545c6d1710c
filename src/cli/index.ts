#!/usr/bin/env node
/**
 * vodscript CLI
 *
 * Main entry point for the vodscript CLI tool.
 * Uses commander for command parsing and execution.
 *
 * Usage:
 *   vodscript --help
 *   vodscript https://www.youtube.com/watch?v=abc123
 *   vodscript transcribe talk.mp4 --postprocess --deliver file
 *   vodscript check
 *
 * @module cli
 */

import { Command, CommanderError } from 'commander';
import { VERSION } from './version.js';
import { BaseCommand, EXIT_CODES, type GlobalOptions } from './base-command.js';
import { registerCommands } from './commands/index.js';
import type { CliDependencies } from './commands/context.js';

// ============================================================================
// Main Program Setup
// ============================================================================

/**
 * Create and configure the main CLI program.
 *
 * Parse errors are thrown as CommanderError instead of exiting, so callers
 * decide the exit code.
 *
 * @param deps - Collaborators passed to every command
 * @returns Configured commander Program instance
 */
export function createProgram(deps: CliDependencies = {}): Command {
  const program = new Command();

  // Program metadata
  program
    .name('vodscript')
    .description('Transcribe online videos and local media files with whisper.cpp')
    .version(VERSION, '-V, --version', 'Display version number');

  // Global options (available to all commands)
  program
    .option('-v, --verbose', 'Enable verbose output for debugging')
    .option('-q, --quiet', 'Suppress all non-essential output')
    .option('--no-color', 'Disable colored output');

  // Create base command helper with global options
  program.hook('preAction', (thisCommand) => {
    const opts = thisCommand.opts<GlobalOptions>();

    // Validate mutually exclusive flags
    if (opts.verbose && opts.quiet) {
      thisCommand.error('Cannot use both --verbose and --quiet flags', {
        exitCode: EXIT_CODES.USAGE_ERROR,
      });
    }

    // Store base command in program for subcommands to access
    thisCommand.setOptionValue('_baseCommand', new BaseCommand(opts));
  });

  // Subcommands copy this setting when they are created
  program.exitOverride();

  // Register all subcommands
  registerCommands(program, deps);

  return program;
}

/**
 * Exit code for an error thrown while parsing arguments.
 */
export function exitCodeForParseError(error: CommanderError): number {
  return error.exitCode === 0 ? EXIT_CODES.SUCCESS : EXIT_CODES.USAGE_ERROR;
}

/**
 * Main CLI entry point.
 * Parses arguments, runs the command and sets process.exitCode.
 *
 * @param argv - Full argument vector (default: process.argv)
 */
export async function main(argv: string[] = process.argv): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      // commander already printed the message
      process.exitCode = exitCodeForParseError(error);
      return;
    }
    throw error;
  }
}

// Run if executed directly
if (require.main === module) {
  main().catch((error: unknown) => {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = EXIT_CODES.ERROR;
  });
}
